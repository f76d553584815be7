export type ChallengeLengthCode = "ERR_CHALLENGE_LENGTH" | "ERR_CHALLENGE_POW";

export class ChallengeLengthError extends Error {
  constructor(
    public readonly code: ChallengeLengthCode,
    public readonly length: number
  ) {
    super(
      code === "ERR_CHALLENGE_LENGTH"
        ? "challenge length must be a power of two between 1 and 512"
        : "challenge length must be a power of two"
    );
    this.name = "ChallengeLengthError";
  }
}

export class EntropyError extends Error {
  readonly code = "ERR_ENTROPY";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EntropyError";
  }
}

/** Where the encryption provider gave up: building the context, encrypting, or armoring. */
export type EncodeStage = "context" | "encrypt" | "armor";

const ENCODE_STAGE_MESSAGES: Record<EncodeStage, string> = {
  context: "failed to create encryption context",
  encrypt: "failed to encrypt challenge",
  armor: "failed to armor challenge",
};

export class EncodeError extends Error {
  constructor(
    public readonly stage: EncodeStage,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${ENCODE_STAGE_MESSAGES[stage]}: ${detail}`, { cause });
    this.name = "EncodeError";
  }
}

export type KeyLookupReason = "not_found" | "ambiguous" | "invalid_selection";

export class KeyLookupError extends Error {
  constructor(
    public readonly reason: KeyLookupReason,
    message: string
  ) {
    super(message);
    this.name = "KeyLookupError";
  }
}

export class CandidateReadError extends Error {
  readonly code = "ERR_CANDIDATE_READ";

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`failed to read input: ${detail}`, { cause });
    this.name = "CandidateReadError";
  }
}
