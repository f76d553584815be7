import { CandidateReadError } from "./errors.js";
import type { ChallengeSession } from "./session.js";

/** Resolves to the next candidate, or null once the input is closed. */
export type CandidateSource = () => Promise<string | null>;

export type LoopOutcome = "matched" | "expired" | "abandoned";

export type LoopEvent =
  | { type: "prompt"; attempts: number }
  | { type: "mismatched"; attempts: number }
  | { type: "matched"; attempts: number }
  | { type: "expired"; attempts: number }
  | { type: "abandoned"; attempts: number };

export interface VerificationLoopOptions {
  session: ChallengeSession;
  readCandidate: CandidateSource;
  /** Observational only; never changes the outcome. */
  onEvent?: (event: LoopEvent) => void;
}

export interface VerificationLoopResult {
  outcome: LoopOutcome;
  /** Non-blank candidates submitted, including the final one. */
  attempts: number;
}

export function describeLoopEvent(event: LoopEvent): string {
  switch (event.type) {
    case "prompt":
      return "enter your solution";
    case "mismatched":
      return "incorrect!";
    case "matched":
      return "challenge solved!";
    case "expired":
      return "challenge has expired, solution rejected";
    case "abandoned":
      return "input closed, challenge abandoned";
  }
}

/**
 * Read candidates until one matches or the session expires. Mismatches loop
 * back for another try; there is no attempt limit here.
 */
export async function runVerificationLoop(
  options: VerificationLoopOptions
): Promise<VerificationLoopResult> {
  const { session, readCandidate, onEvent } = options;
  let attempts = 0;

  try {
    for (;;) {
      onEvent?.({ type: "prompt", attempts });

      let input: string | null;
      try {
        input = await readCandidate();
      } catch (err) {
        throw new CandidateReadError(err);
      }

      if (input === null) {
        onEvent?.({ type: "abandoned", attempts });
        return { outcome: "abandoned", attempts };
      }

      const candidate = input.trim();
      if (candidate.length === 0) continue;

      attempts += 1;
      const outcome = session.verify(candidate);
      onEvent?.({ type: outcome, attempts });

      if (outcome !== "mismatched") {
        return { outcome, attempts };
      }
    }
  } finally {
    session.terminate();
  }
}
