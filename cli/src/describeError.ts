import {
  CandidateReadError,
  ChallengeLengthError,
  EncodeError,
  EntropyError,
  KeyLookupError,
} from "@pgp-mfa/core";
import { ConfigError, KeyImportError } from "./errors.js";

export interface ErrorDescription {
  message: string;
  details?: Record<string, unknown>;
}

function causeOf(err: Error): string | undefined {
  return err.cause instanceof Error ? err.cause.message : undefined;
}

/** Flatten a thrown value into the message and machine-readable details of an error result. */
export function describeError(err: unknown): ErrorDescription {
  if (err instanceof ChallengeLengthError) {
    return { message: err.message, details: { code: err.code, length: err.length } };
  }
  if (err instanceof EncodeError) {
    return { message: err.message, details: { stage: err.stage } };
  }
  if (err instanceof KeyLookupError) {
    return { message: err.message, details: { reason: err.reason } };
  }
  if (err instanceof KeyImportError) {
    return { message: err.message, details: { reason: err.reason, cause: causeOf(err) } };
  }
  if (err instanceof EntropyError || err instanceof CandidateReadError) {
    return { message: err.message, details: { code: err.code } };
  }
  if (err instanceof ConfigError) {
    return { message: err.message, details: { cause: causeOf(err) } };
  }
  if (err instanceof Error) {
    return { message: err.message, details: causeOf(err) ? { cause: causeOf(err) } : undefined };
  }
  return { message: String(err) };
}
