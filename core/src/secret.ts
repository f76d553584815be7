import { timingSafeEqual } from "node:crypto";
import { inspect } from "node:util";

const REDACTED = "[challenge secret]";

/**
 * Compare two byte strings without an early exit on the first differing byte.
 * Inputs of different length are rejected after a full-length comparison of
 * `expected` against itself, so only the length mismatch is observable.
 */
export function constantTimeEquals(expected: Uint8Array, candidate: Uint8Array): boolean {
  if (expected.length !== candidate.length) {
    timingSafeEqual(expected, expected);
    return false;
  }
  return timingSafeEqual(expected, candidate);
}

/**
 * The plaintext of a challenge. Printing, serializing or inspecting it yields a
 * placeholder; the bytes leave only through {@link copyBytes} (for encryption)
 * and are read only by {@link matches}.
 */
export class ChallengeSecret {
  private readonly bytes: Uint8Array;
  private isWiped = false;

  constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  get length(): number {
    return this.bytes.length;
  }

  get wiped(): boolean {
    return this.isWiped;
  }

  /** Constant-time comparison. A wiped secret matches nothing. */
  matches(candidate: Uint8Array): boolean {
    const equal = constantTimeEquals(this.bytes, candidate);
    return equal && !this.isWiped;
  }

  /** Fresh copy of the plaintext; the caller owns and should zero it. */
  copyBytes(): Uint8Array {
    if (this.isWiped) {
      throw new Error("challenge secret has been wiped");
    }
    return Uint8Array.from(this.bytes);
  }

  wipe(): void {
    this.bytes.fill(0);
    this.isWiped = true;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}
