import type { EncryptedChallenge } from "./encoder.js";
import type { ChallengeSecret } from "./secret.js";

export const DEFAULT_SOLVE_WINDOW_MS = 60_000;

export type VerificationOutcome = "matched" | "mismatched" | "expired";

export type SessionState = "pending" | "matched" | "expired";

export interface ChallengeSessionOptions {
  /** Time after opening before an unsolved challenge is rejected. */
  solveWindowMs?: number;
  nowFn?: () => number;
}

const encoder = new TextEncoder();

/**
 * One authentication attempt: the secret, its encrypted form and a fixed
 * deadline. Reaching `matched` or `expired` is final and wipes the secret.
 */
export class ChallengeSession {
  private current: SessionState = "pending";

  private constructor(
    private readonly secret: ChallengeSecret,
    readonly encrypted: EncryptedChallenge,
    readonly createdAt: number,
    readonly expiresAt: number,
    private readonly nowFn: () => number
  ) {}

  static open(
    secret: ChallengeSecret,
    encrypted: EncryptedChallenge,
    options: ChallengeSessionOptions = {}
  ): ChallengeSession {
    const nowFn = options.nowFn ?? (() => Date.now());
    const solveWindowMs = options.solveWindowMs ?? DEFAULT_SOLVE_WINDOW_MS;
    if (!Number.isFinite(solveWindowMs) || solveWindowMs <= 0) {
      throw new RangeError(`solve window must be a positive number of milliseconds, got ${solveWindowMs}`);
    }
    const createdAt = nowFn();
    return new ChallengeSession(secret, encrypted, createdAt, createdAt + solveWindowMs, nowFn);
  }

  get state(): SessionState {
    return this.current;
  }

  get expiresAtDate(): Date {
    return new Date(this.expiresAt);
  }

  isExpired(): boolean {
    return this.nowFn() >= this.expiresAt;
  }

  /**
   * Expiry is checked before comparing, so a correct but late candidate is
   * still `expired`.
   */
  verify(candidate: string | Uint8Array): VerificationOutcome {
    if (this.current !== "pending") {
      return this.current;
    }

    if (this.isExpired()) {
      this.finish("expired");
      return "expired";
    }

    const bytes = typeof candidate === "string" ? encoder.encode(candidate) : candidate;
    if (this.secret.matches(bytes)) {
      this.finish("matched");
      return "matched";
    }
    return "mismatched";
  }

  /** Abandon the attempt. A pending session ends as expired. */
  terminate(): void {
    if (this.current === "pending") {
      this.finish("expired");
    }
  }

  private finish(state: Exclude<SessionState, "pending">): void {
    this.current = state;
    this.secret.wipe();
  }
}
