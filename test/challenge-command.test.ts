import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import { readKey } from "openpgp";
import { ChallengeLengthError, KeyLookupError, type StoredKey } from "../core/src/index.js";
import { runChallenge } from "../cli/src/commands/challenge.js";
import { createContext, type MfaContext } from "../cli/src/context.js";
import { SqliteKeyRepository } from "../cli/src/keyRepository.js";
import { createClock, catchRejection, decryptArmored, generateTestKeyPair, type TestKeyPair } from "./helpers.js";

let pair: TestKeyPair;
let fingerprint: string;
let tempDir: string;

beforeAll(async () => {
  pair = await generateTestKeyPair();
  fingerprint = pair.privateKey.getFingerprint();
  tempDir = mkdtempSync(join(tmpdir(), "pgp-mfa-challenge-test-"));
});

afterAll(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe("runChallenge", () => {
  let ctx: MfaContext;
  let printed: string[];
  let errors: string[];

  const print = (line: string) => {
    printed.push(line);
  };

  /** Decrypts the printed challenge the way the key holder would. */
  const solve = () => decryptArmored(printed[0], pair.privateKey);

  beforeEach(async () => {
    printed = [];
    errors = [];
    vi.spyOn(console, "error").mockImplementation((line: unknown) => {
      errors.push(String(line));
    });

    const repository = SqliteKeyRepository.open(":memory:");
    await repository.add({
      fingerprint,
      publicKey: (await readKey({ armoredKey: pair.publicArmored })).write(),
      createdAt: new Date("2025-03-01T00:00:00.000Z"),
    });
    ctx = createContext({ dbPath: ":memory:", solveWindowSeconds: 60, tempDir }, { repository });
  });

  afterEach(() => {
    ctx.dispose();
    vi.restoreAllMocks();
  });

  it("accepts the decrypted solution", async () => {
    const selectKey = vi.fn(async (_candidates: readonly StoredKey[]) => 0);

    const report = await runChallenge(
      ctx,
      { kind: "challenge", length: 16 },
      { io: { selectKey, readCandidate: solve }, print }
    );

    expect(report).toMatchObject({ outcome: "matched", attempts: 1, fingerprint });
    expect(selectKey).toHaveBeenCalledTimes(1);
    expect(selectKey.mock.calls[0][0].map((k) => k.fingerprint)).toEqual([fingerprint]);
    expect(printed[0].startsWith("-----BEGIN PGP MESSAGE-----")).toBe(true);
    expect(printed[2]).toBe(`challenge will expire at ${report.expiresAt}`);
    expect(errors).toEqual(["challenge solved!"]);
  });

  it("produces a solution of the requested length", async () => {
    let solution = "";
    await runChallenge(
      ctx,
      { kind: "challenge", length: 64, keyId: fingerprint },
      {
        io: {
          selectKey: async () => 0,
          readCandidate: async () => {
            solution = await solve();
            return solution;
          },
        },
        print,
      }
    );

    expect(solution).toHaveLength(64);
  });

  it("keeps asking after a wrong answer", async () => {
    const answers = [async () => "wrong answer", solve];

    const report = await runChallenge(
      ctx,
      { kind: "challenge", length: 8, keyId: fingerprint },
      { io: { selectKey: async () => 0, readCandidate: async () => (answers.shift() ?? solve)() }, print }
    );

    expect(report).toMatchObject({ outcome: "matched", attempts: 2 });
    expect(errors).toEqual(["incorrect!", "challenge solved!"]);
  });

  it("uses the key id instead of asking", async () => {
    const selectKey = vi.fn(async (_candidates: readonly StoredKey[]) => 0);

    const report = await runChallenge(
      ctx,
      { kind: "challenge", length: 8, keyId: fingerprint.slice(-16).toUpperCase() },
      { io: { selectKey, readCandidate: solve }, print }
    );

    expect(report.outcome).toBe("matched");
    expect(selectKey).not.toHaveBeenCalled();
  });

  it("rejects a correct solution after the deadline", async () => {
    const clock = createClock();

    const report = await runChallenge(
      ctx,
      { kind: "challenge", length: 16, keyId: fingerprint },
      {
        io: {
          selectKey: async () => 0,
          readCandidate: async () => {
            const solution = await solve();
            clock.advance(60_000);
            return solution;
          },
        },
        nowFn: clock.nowFn,
        print,
      }
    );

    expect(report).toEqual({
      outcome: "expired",
      attempts: 1,
      fingerprint,
      expiresAt: "2023-11-14T22:14:20.000Z",
    });
    expect(errors).toEqual(["challenge has expired, solution rejected"]);
  });

  it("reports closed input as abandoned", async () => {
    const report = await runChallenge(
      ctx,
      { kind: "challenge", length: 16, keyId: fingerprint },
      { io: { selectKey: async () => 0, readCandidate: async () => null }, print }
    );

    expect(report).toMatchObject({ outcome: "abandoned", attempts: 0 });
  });

  it("writes the challenge file while waiting and removes it afterwards", async () => {
    let path = "";
    let contents = "";

    await runChallenge(
      ctx,
      { kind: "challenge", length: 16, keyId: fingerprint },
      {
        io: {
          selectKey: async () => 0,
          readCandidate: async () => {
            path = printed[1].replace("solve with: gpg -dq --batch < ", "");
            contents = readFileSync(path, "utf-8");
            return solve();
          },
        },
        print,
      }
    );

    expect(path.startsWith(join(tempDir, "pgp-mfa-challenge-"))).toBe(true);
    expect(contents).toBe(`${printed[0]}\n`);
    expect(existsSync(path)).toBe(false);
  });

  it("validates the length before touching the keys", async () => {
    const selectKey = vi.fn(async (_candidates: readonly StoredKey[]) => 0);

    const err = await catchRejection(
      runChallenge(ctx, { kind: "challenge", length: 15 }, { io: { selectKey, readCandidate: solve }, print })
    );

    expect(err).toBeInstanceOf(ChallengeLengthError);
    expect(err).toMatchObject({ code: "ERR_CHALLENGE_POW" });
    expect(selectKey).not.toHaveBeenCalled();
    expect(printed).toEqual([]);
  });

  it("fails for an unknown key id without issuing a challenge", async () => {
    const err = await catchRejection(
      runChallenge(
        ctx,
        { kind: "challenge", length: 16, keyId: "0000000000000000" },
        { io: { selectKey: async () => 0, readCandidate: solve }, print }
      )
    );

    expect(err).toBeInstanceOf(KeyLookupError);
    expect(err).toMatchObject({ reason: "not_found", message: "no key found for 0000000000000000" });
    expect(printed).toEqual([]);
  });
});
