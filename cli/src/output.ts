export function outputSuccess(data: unknown): never {
  console.log(JSON.stringify({ ok: true, data }, null, 2));
  process.exit(0);
}

export function outputError(error: string, details?: unknown): never {
  console.error(JSON.stringify({ ok: false, error, details }, null, 2));
  process.exit(1);
}

/** Diagnostic line on stderr, kept apart from the JSON result on stdout. */
export function logStatus(message: string): void {
  console.error(`[pgp-mfa] ${message}`);
}
