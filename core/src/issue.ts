import { encodeChallenge, type EncryptionProvider } from "./encoder.js";
import { generateChallenge, type RandomSource } from "./generator.js";
import { ChallengeSession } from "./session.js";

export interface IssueChallengeArgs<K> {
  length: number;
  recipient: K;
  provider: EncryptionProvider<K>;
  solveWindowMs?: number;
  nowFn?: () => number;
  randomSource?: RandomSource;
}

/** Generate a secret, encrypt it to the recipient and open a session on it. */
export async function issueChallenge<K>(args: IssueChallengeArgs<K>): Promise<ChallengeSession> {
  const secret = generateChallenge(args.length, args.randomSource);
  try {
    const encrypted = await encodeChallenge(args.provider, args.recipient, secret);
    return ChallengeSession.open(secret, encrypted, {
      solveWindowMs: args.solveWindowMs,
      nowFn: args.nowFn,
    });
  } catch (err) {
    secret.wipe();
    throw err;
  }
}
