import {
  describeLoopEvent,
  issueChallenge,
  lookupKey,
  runVerificationLoop,
  validateChallengeLength,
  type LoopOutcome,
} from "@pgp-mfa/core";
import type { PublicKey } from "openpgp";
import type { ChallengeCommand } from "../command.js";
import type { MfaContext } from "../context.js";
import { solveCommand, writeChallengeFile, type ChallengeFile } from "../challengeFile.js";
import { parsePublicKey } from "../openpgp.js";
import { logStatus, outputError, outputSuccess } from "../output.js";
import { createTerminalIo, type ChallengeIo } from "../prompt.js";

export interface ChallengeReport {
  outcome: LoopOutcome;
  attempts: number;
  fingerprint: string;
  expiresAt: string;
}

export interface RunChallengeOpts {
  io?: ChallengeIo;
  nowFn?: () => number;
  /** Receives the armored challenge and the instructions meant for stdout. */
  print?: (line: string) => void;
}

async function loadRecipient(fingerprint: string, data: Uint8Array): Promise<PublicKey> {
  try {
    return await parsePublicKey(data);
  } catch (err) {
    throw new Error(`failed to parse stored key ${fingerprint}`, { cause: err });
  }
}

/**
 * Issue one challenge to the selected key and read solutions until it is
 * solved, expires or the input closes.
 */
export async function runChallenge(
  ctx: MfaContext,
  command: ChallengeCommand,
  opts: RunChallengeOpts = {}
): Promise<ChallengeReport> {
  validateChallengeLength(command.length);

  const io = opts.io ?? createTerminalIo();
  const print = opts.print ?? ((line: string) => console.log(line));

  try {
    return await challengeWith(ctx, command, io, print, opts.nowFn);
  } finally {
    io.close?.();
  }
}

async function challengeWith(
  ctx: MfaContext,
  command: ChallengeCommand,
  io: ChallengeIo,
  print: (line: string) => void,
  nowFn: (() => number) | undefined
): Promise<ChallengeReport> {
  const stored = await lookupKey(ctx.repository, { fingerprint: command.keyId, select: io.selectKey });
  const recipient = await loadRecipient(stored.fingerprint, stored.publicKey);

  const session = await issueChallenge({
    length: command.length,
    recipient,
    provider: ctx.provider,
    solveWindowMs: ctx.config.solveWindowSeconds * 1000,
    nowFn,
  });
  const expiresAt = session.expiresAtDate.toISOString();

  let file: ChallengeFile | null = null;
  try {
    print(session.encrypted.armored);
    try {
      file = await writeChallengeFile(ctx.config.tempDir, session.encrypted.armored);
      print(`solve with: ${solveCommand(file)}`);
    } catch (err) {
      logStatus(`warning: could not write challenge file: ${err instanceof Error ? err.message : String(err)}`);
    }
    print(`challenge will expire at ${expiresAt}`);

    const result = await runVerificationLoop({
      session,
      readCandidate: io.readCandidate,
      onEvent: (event) => {
        if (event.type !== "prompt") console.error(describeLoopEvent(event));
      },
    });

    return { ...result, fingerprint: stored.fingerprint, expiresAt };
  } finally {
    session.terminate();
    await file?.remove();
  }
}

export async function handleChallenge(
  ctx: MfaContext,
  command: ChallengeCommand,
  opts: RunChallengeOpts = {}
): Promise<never> {
  const report = await runChallenge(ctx, command, opts);

  switch (report.outcome) {
    case "matched":
      return outputSuccess({ message: "challenge solved", ...report });
    case "expired":
      return outputError("challenge has expired, late solutions are rejected", report);
    case "abandoned":
      return outputError("challenge abandoned: input closed before a solution was accepted", report);
  }
}
