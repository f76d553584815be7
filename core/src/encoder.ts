import { EncodeError } from "./errors.js";
import type { ChallengeSecret } from "./secret.js";

/** Encryption scoped to a single recipient key. */
export interface EncryptionContext {
  encrypt(plaintext: Uint8Array): Promise<Uint8Array>;
  /** Text-safe encoding of a ciphertext produced by {@link encrypt}. */
  armor(ciphertext: Uint8Array): Promise<string>;
}

export interface EncryptionProvider<K> {
  createContext(recipient: K): Promise<EncryptionContext>;
}

export interface EncryptedChallenge {
  raw: Uint8Array;
  armored: string;
}

export async function encodeChallenge<K>(
  provider: EncryptionProvider<K>,
  recipient: K,
  secret: ChallengeSecret
): Promise<EncryptedChallenge> {
  let context: EncryptionContext;
  try {
    context = await provider.createContext(recipient);
  } catch (err) {
    throw new EncodeError("context", err);
  }

  const plaintext = secret.copyBytes();
  let raw: Uint8Array;
  try {
    raw = await context.encrypt(plaintext);
  } catch (err) {
    throw new EncodeError("encrypt", err);
  } finally {
    plaintext.fill(0);
  }

  let armored: string;
  try {
    armored = await context.armor(raw);
  } catch (err) {
    throw new EncodeError("armor", err);
  }

  return { raw, armored };
}
