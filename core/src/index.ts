export {
  CHALLENGE_CHARSET,
  MIN_CHALLENGE_LENGTH,
  MAX_CHALLENGE_LENGTH,
  generateChallenge,
  validateChallengeLength,
} from "./generator.js";
export { ChallengeSecret, constantTimeEquals } from "./secret.js";
export { encodeChallenge } from "./encoder.js";
export { ChallengeSession, DEFAULT_SOLVE_WINDOW_MS } from "./session.js";
export { runVerificationLoop, describeLoopEvent } from "./loop.js";
export { issueChallenge } from "./issue.js";
export { lookupKey, matchFingerprint, normalizeFingerprint, selectKey } from "./keys.js";
export {
  CandidateReadError,
  ChallengeLengthError,
  EncodeError,
  EntropyError,
  KeyLookupError,
} from "./errors.js";
export type { RandomSource } from "./generator.js";
export type { EncryptedChallenge, EncryptionContext, EncryptionProvider } from "./encoder.js";
export type {
  ChallengeSessionOptions,
  SessionState,
  VerificationOutcome,
} from "./session.js";
export type {
  CandidateSource,
  LoopEvent,
  LoopOutcome,
  VerificationLoopOptions,
  VerificationLoopResult,
} from "./loop.js";
export type { IssueChallengeArgs } from "./issue.js";
export type { KeyRepository, LookupKeyArgs, SelectionSource, StoredKey } from "./keys.js";
export type {
  ChallengeLengthCode,
  EncodeStage,
  KeyLookupReason,
} from "./errors.js";
