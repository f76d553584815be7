/**
 * Shared test utilities: a reversible fake encryption provider, scripted
 * candidate input, an in-memory key repository and OpenPGP test keys.
 */

import { decrypt, generateKey, readMessage, readPrivateKey, type PrivateKey } from "openpgp";
import type {
  CandidateSource,
  EncryptionProvider,
  KeyRepository,
  StoredKey,
} from "../core/src/index.js";

const decoder = new TextDecoder();

export const NOW_BASE_MS = 1_700_000_000_000;

/** Manually advanced clock. */
export function createClock(start = NOW_BASE_MS) {
  const ref = { value: start };
  return {
    ref,
    nowFn: () => ref.value,
    advance: (ms: number) => {
      ref.value += ms;
    },
  };
}

/** "Encrypts" by reversing the bytes; `fakeDecrypt` recovers the plaintext. */
export const reversingProvider: EncryptionProvider<string> = {
  async createContext(recipient: string) {
    return {
      async encrypt(plaintext: Uint8Array) {
        return Uint8Array.from(plaintext).reverse();
      },
      async armor(ciphertext: Uint8Array) {
        return `-----BEGIN FAKE MESSAGE-----\n${recipient}\n${Buffer.from(ciphertext).toString("base64")}\n-----END FAKE MESSAGE-----`;
      },
    };
  },
};

export function fakeDecrypt(raw: Uint8Array): string {
  return decoder.decode(Uint8Array.from(raw).reverse());
}

/** Candidate source that replays `items` and then reports closed input. */
export function scriptedInput(items: Array<string | (() => string)>): CandidateSource {
  let index = 0;
  return async () => {
    if (index >= items.length) return null;
    const item = items[index++];
    return typeof item === "function" ? item() : item;
  };
}

export class InMemoryKeyRepository implements KeyRepository {
  private readonly records = new Map<string, StoredKey>();
  closed = false;

  constructor(keys: StoredKey[] = []) {
    for (const key of keys) this.records.set(key.fingerprint, key);
  }

  async add(key: StoredKey): Promise<void> {
    this.records.set(key.fingerprint, key);
  }

  async get(fingerprint: string): Promise<StoredKey | undefined> {
    return this.records.get(fingerprint);
  }

  async list(): Promise<StoredKey[]> {
    return [...this.records.values()].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async remove(fingerprint: string): Promise<boolean> {
    return this.records.delete(fingerprint);
  }

  close(): void {
    this.closed = true;
  }
}

export function storedKey(fingerprint: string, createdAtMs: number): StoredKey {
  return { fingerprint, publicKey: new Uint8Array([1, 2, 3]), createdAt: new Date(createdAtMs) };
}

export interface TestKeyPair {
  publicArmored: string;
  privateArmored: string;
  privateKey: PrivateKey;
}

export async function generateTestKeyPair(
  options: { keyExpirationTime?: number; date?: Date; withEncryptionSubkey?: boolean } = {}
): Promise<TestKeyPair> {
  const { publicKey, privateKey } = await generateKey({
    userIDs: [{ name: "Test User", email: "test@example.com" }],
    format: "armored",
    ...(options.keyExpirationTime !== undefined ? { keyExpirationTime: options.keyExpirationTime } : {}),
    ...(options.date ? { date: options.date } : {}),
    ...(options.withEncryptionSubkey === false ? { subkeys: [] } : {}),
  });
  return {
    publicArmored: publicKey,
    privateArmored: privateKey,
    privateKey: await readPrivateKey({ armoredKey: privateKey }),
  };
}

export async function decryptArmored(armored: string, privateKey: PrivateKey): Promise<string> {
  const message = await readMessage({ armoredMessage: armored });
  const { data } = await decrypt({ message, decryptionKeys: privateKey, format: "binary" });
  return decoder.decode(data);
}

/** Run `fn` and return what it threw. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

export async function catchRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected promise to reject");
}
