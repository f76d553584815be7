import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { KeyRepository } from "@pgp-mfa/core";
import type { MfaConfig } from "./config.js";
import { gracefulShutdown } from "./graceful-shutdown.js";
import { SqliteKeyRepository } from "./keyRepository.js";
import { OpenPgpProvider } from "./openpgp.js";

export interface MfaContext {
  config: MfaConfig;
  repository: KeyRepository;
  provider: OpenPgpProvider;
  dispose(): void;
}

export interface CreateContextOpts {
  /** Use an already open repository instead of opening `config.dbPath`. */
  repository?: KeyRepository;
}

/** Open the key repository once for the process; it is closed on exit or signal. */
export function createContext(config: MfaConfig, opts?: CreateContextOpts): MfaContext {
  let repository = opts?.repository;
  if (!repository) {
    if (config.dbPath !== ":memory:") {
      mkdirSync(dirname(config.dbPath), { recursive: true, mode: 0o700 });
    }
    repository = SqliteKeyRepository.open(config.dbPath);
  }

  const opened = repository;
  const release = gracefulShutdown(() => opened.close());

  return {
    config,
    repository: opened,
    provider: new OpenPgpProvider(),
    dispose: release,
  };
}
