import { readFile } from "node:fs/promises";
import type { KeyRepository } from "@pgp-mfa/core";
import type { Key } from "openpgp";
import { KeyImportError } from "./errors.js";
import { logStatus } from "./output.js";
import { expirationOf, parseKey, summarizeKey, type KeySummary } from "./openpgp.js";

export interface ImportKeyArgs {
  /** Path to an armored or binary key file, or "-" for stdin. */
  source: string;
  repository: KeyRepository;
  now?: () => Date;
  readStdin?: () => Promise<Uint8Array>;
}

async function readProcessStdin(): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

async function readSource(args: ImportKeyArgs): Promise<Uint8Array> {
  try {
    if (args.source === "-") {
      return await (args.readStdin ?? readProcessStdin)();
    }
    return await readFile(args.source);
  } catch (err) {
    throw new KeyImportError("open_failed", { cause: err });
  }
}

async function checkImportable(key: Key, now: Date): Promise<void> {
  if (key.isPrivate()) {
    throw new KeyImportError("private", { fingerprint: key.getFingerprint() });
  }

  const expiresAt = await expirationOf(key);
  if (expiresAt && expiresAt.getTime() <= now.getTime()) {
    throw new KeyImportError("expired", { fingerprint: key.getFingerprint() });
  }

  try {
    await key.getEncryptionKey(undefined, now);
  } catch (err) {
    throw new KeyImportError("no_encryption_key", { cause: err, fingerprint: key.getFingerprint() });
  }
}

/** Validate a public key and store it under its fingerprint. */
export async function importKey(args: ImportKeyArgs): Promise<KeySummary> {
  const data = await readSource(args);
  const now = (args.now ?? (() => new Date()))();

  let key: Key;
  try {
    key = await parseKey(data);
  } catch (err) {
    throw new KeyImportError("read_failed", { cause: err });
  }

  await checkImportable(key, now);

  const summary = await summarizeKey(key);
  logStatus(`importing key: ${summary.fingerprint}`);
  await args.repository.add({
    fingerprint: summary.fingerprint,
    publicKey: key.toPublic().write(),
    createdAt: now,
  });
  logStatus("key imported successfully!");
  return summary;
}
