import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir, tmpdir } from "node:os";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface MfaConfig {
  /** SQLite file holding imported public keys. */
  dbPath: string;
  /** Seconds before an unsolved challenge is rejected. */
  solveWindowSeconds: number;
  /** Where the armored challenge file is written for `gpg -d`. */
  tempDir: string;
}

export const CONFIG_DIR = join(homedir(), ".pgp-mfa");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

const fileConfigSchema = z
  .object({
    dbPath: z.string().min(1),
    solveWindowSeconds: z.number().positive(),
    tempDir: z.string().min(1),
  })
  .partial()
  .strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

const ENV_KEYS: Record<keyof MfaConfig, string> = {
  dbPath: "PGP_MFA_DB_PATH",
  solveWindowSeconds: "PGP_MFA_SOLVE_WINDOW_SECONDS",
  tempDir: "PGP_MFA_TEMP_DIR",
};

const DEFAULTS: MfaConfig = {
  dbPath: join(CONFIG_DIR, "pgp-mfa.db"),
  solveWindowSeconds: 60,
  tempDir: tmpdir(),
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configFile?: string;
}

function readFileConfig(path: string): FileConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`failed to read config file ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`config file ${path} is not valid JSON`, { cause: err });
  }

  const parsed = fileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`invalid config file ${path}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function parseSeconds(value: string): number {
  return value.trim().length === 0 ? Number.NaN : Number(value);
}

export function loadConfig(overrides?: Partial<MfaConfig>, options: LoadConfigOptions = {}): MfaConfig {
  const env = options.env ?? process.env;
  const fileConfig = readFileConfig(options.configFile ?? CONFIG_FILE);
  const envWindow = env[ENV_KEYS.solveWindowSeconds];

  return {
    dbPath: overrides?.dbPath ?? env[ENV_KEYS.dbPath] ?? fileConfig.dbPath ?? DEFAULTS.dbPath,
    solveWindowSeconds:
      overrides?.solveWindowSeconds ??
      (envWindow !== undefined ? parseSeconds(envWindow) : undefined) ??
      fileConfig.solveWindowSeconds ??
      DEFAULTS.solveWindowSeconds,
    tempDir: overrides?.tempDir ?? env[ENV_KEYS.tempDir] ?? fileConfig.tempDir ?? DEFAULTS.tempDir,
  };
}

export type ConfigSource = "env" | "file" | "default";

export interface ConfigEntry<T> {
  value: T;
  source: ConfigSource;
}

export type MfaConfigWithSources = { [K in keyof MfaConfig]: ConfigEntry<MfaConfig[K]> };

function entry<T>(
  envVal: string | undefined,
  fromEnv: (raw: string) => T,
  fileVal: T | undefined,
  fallback: T
): ConfigEntry<T> {
  if (envVal !== undefined) return { value: fromEnv(envVal), source: "env" };
  if (fileVal !== undefined) return { value: fileVal, source: "file" };
  return { value: fallback, source: "default" };
}

export function loadConfigWithSources(options: LoadConfigOptions = {}): MfaConfigWithSources {
  const env = options.env ?? process.env;
  const fileConfig = readFileConfig(options.configFile ?? CONFIG_FILE);

  return {
    dbPath: entry(env[ENV_KEYS.dbPath], (raw) => raw, fileConfig.dbPath, DEFAULTS.dbPath),
    solveWindowSeconds: entry(
      env[ENV_KEYS.solveWindowSeconds],
      parseSeconds,
      fileConfig.solveWindowSeconds,
      DEFAULTS.solveWindowSeconds
    ),
    tempDir: entry(env[ENV_KEYS.tempDir], (raw) => raw, fileConfig.tempDir, DEFAULTS.tempDir),
  };
}

export function validateConfig(config: MfaConfig): string | null {
  if (!config.dbPath) return `Missing dbPath (set ${ENV_KEYS.dbPath})`;
  if (!Number.isFinite(config.solveWindowSeconds) || config.solveWindowSeconds <= 0) {
    return `Invalid solveWindowSeconds (set ${ENV_KEYS.solveWindowSeconds} to a positive number)`;
  }
  if (!config.tempDir) return `Missing tempDir (set ${ENV_KEYS.tempDir})`;
  return null;
}
