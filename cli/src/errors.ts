export type KeyImportReason =
  | "open_failed"
  | "read_failed"
  | "private"
  | "expired"
  | "no_encryption_key"
  | "already_imported";

const KEY_IMPORT_MESSAGES: Record<KeyImportReason, string> = {
  open_failed: "failed to open key file",
  read_failed: "failed to read key",
  private: "key is private, only public keys are accepted",
  expired: "key has expired, cannot import",
  no_encryption_key: "key has no usable encryption subkey",
  already_imported: "key already imported",
};

export class KeyImportError extends Error {
  constructor(
    public readonly reason: KeyImportReason,
    options?: { cause?: unknown; fingerprint?: string }
  ) {
    super(
      options?.fingerprint
        ? `${KEY_IMPORT_MESSAGES[reason]}: ${options.fingerprint}`
        : KEY_IMPORT_MESSAGES[reason],
      { cause: options?.cause }
    );
    this.name = "KeyImportError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
