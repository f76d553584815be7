import { randomBytes } from "node:crypto";
import { ChallengeLengthError, EntropyError } from "./errors.js";
import { ChallengeSecret } from "./secret.js";

/** Display alphabet every challenge character is drawn from. */
export const CHALLENGE_CHARSET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-_+/\\'\"!@#$%^&*()[]{}<>?,.;:";

export const MIN_CHALLENGE_LENGTH = 1;
export const MAX_CHALLENGE_LENGTH = 512;

/** Source of cryptographically secure random bytes. */
export type RandomSource = (size: number) => Uint8Array;

const CHARSET_CODES = Uint8Array.from(CHALLENGE_CHARSET, (c) => c.charCodeAt(0));

/**
 * Reject lengths outside 1..512 (ERR_CHALLENGE_LENGTH) before checking for a
 * power of two (ERR_CHALLENGE_POW).
 */
export function validateChallengeLength(length: number): void {
  if (
    !Number.isInteger(length) ||
    length < MIN_CHALLENGE_LENGTH ||
    length > MAX_CHALLENGE_LENGTH
  ) {
    throw new ChallengeLengthError("ERR_CHALLENGE_LENGTH", length);
  }
  if ((length & (length - 1)) !== 0) {
    throw new ChallengeLengthError("ERR_CHALLENGE_POW", length);
  }
}

/**
 * Draw `length` random bytes and fold each one onto the charset by modulo.
 * The modulo reduction is slightly biased towards the first characters; at
 * these lengths the entropy loss is negligible.
 */
export function generateChallenge(
  length: number,
  randomSource: RandomSource = randomBytes
): ChallengeSecret {
  validateChallengeLength(length);

  let raw: Uint8Array;
  try {
    raw = randomSource(length);
  } catch (err) {
    throw new EntropyError("failed to generate challenge", { cause: err });
  }
  if (raw.length < length) {
    throw new EntropyError(
      `failed to generate challenge: random source returned ${raw.length} of ${length} bytes`
    );
  }

  const buffer = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    buffer[i] = CHARSET_CODES[raw[i] % CHARSET_CODES.length];
  }
  raw.fill(0);

  const secret = new ChallengeSecret(buffer);
  buffer.fill(0);
  return secret;
}
