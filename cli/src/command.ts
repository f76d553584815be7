import type { ParsedArgs } from "minimist";

export type Command =
  | { kind: "help" }
  | { kind: "import"; source: string }
  | { kind: "list" }
  | { kind: "remove"; fingerprint: string }
  | { kind: "challenge"; length: number; keyId?: string }
  | { kind: "config" };

export type CommandKind = Command["kind"];

export type ChallengeCommand = Extract<Command, { kind: "challenge" }>;

export const USAGE: Record<CommandKind, string> = {
  help: "pgp-mfa help",
  import: "pgp-mfa import <key-file>",
  list: "pgp-mfa list",
  remove: "pgp-mfa remove <fingerprint>",
  challenge: "pgp-mfa challenge <length> [key-id]",
  config: "pgp-mfa config",
};

export const HELP = `pgp-mfa - challenge-response second factor over OpenPGP

Usage:
  pgp-mfa import <key-file>            Import a public key (armored or binary, - for stdin)
  pgp-mfa list                         List imported keys, newest first
  pgp-mfa remove <fingerprint>         Delete an imported key
  pgp-mfa challenge <length> [key-id]  Encrypt a random challenge and wait for its solution
                                       (length: power of two, 1-512; without key-id you
                                       are asked to select a key)
  pgp-mfa config                       Show resolved configuration and sources
  pgp-mfa help                         Show this help

Environment:
  PGP_MFA_DB_PATH               Key database (default: ~/.pgp-mfa/pgp-mfa.db)
  PGP_MFA_SOLVE_WINDOW_SECONDS  Seconds to solve a challenge (default: 60)
  PGP_MFA_TEMP_DIR              Directory for the challenge file (default: system temp)
`;

export class UsageError extends Error {
  constructor(
    message: string,
    public readonly usage: string
  ) {
    super(message);
    this.name = "UsageError";
  }
}

function isCommandKind(value: string): value is CommandKind {
  return Object.prototype.hasOwnProperty.call(USAGE, value);
}

/** Map positional arguments onto one of the known commands. */
export function parseCommand(argv: Pick<ParsedArgs, "_">): Command {
  const [name, ...args] = argv._.map(String);

  if (name === undefined) return { kind: "help" };
  if (!isCommandKind(name)) {
    throw new UsageError(`unknown command '${name}'`, HELP);
  }

  switch (name) {
    case "help":
    case "list":
    case "config":
      return { kind: name };
    case "import":
      if (args.length !== 1) throw new UsageError("expected exactly one key file", USAGE.import);
      return { kind: "import", source: args[0] };
    case "remove":
      if (args.length !== 1) throw new UsageError("expected a fingerprint", USAGE.remove);
      return { kind: "remove", fingerprint: args[0] };
    case "challenge": {
      if (args.length < 1 || args.length > 2) {
        throw new UsageError("expected a challenge length", USAGE.challenge);
      }
      const length = /^\d+$/.test(args[0]) ? Number(args[0]) : Number.NaN;
      return args[1] === undefined
        ? { kind: "challenge", length }
        : { kind: "challenge", length, keyId: args[1] };
    }
  }
}
