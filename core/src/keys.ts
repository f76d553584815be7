import { KeyLookupError } from "./errors.js";

export interface StoredKey {
  /** Lowercase hex fingerprint. */
  fingerprint: string;
  /** Binary public key packet data. */
  publicKey: Uint8Array;
  createdAt: Date;
}

export interface KeyRepository {
  add(key: StoredKey): Promise<void>;
  get(fingerprint: string): Promise<StoredKey | undefined>;
  /** Newest first. */
  list(): Promise<StoredKey[]>;
  remove(fingerprint: string): Promise<boolean>;
  close(): void;
}

/** Picks an index out of the candidates it is shown. */
export type SelectionSource = (candidates: readonly StoredKey[]) => Promise<number | string>;

export interface LookupKeyArgs {
  fingerprint?: string;
  select: SelectionSource;
}

const MIN_SUFFIX_LENGTH = 8;

export function normalizeFingerprint(input: string): string {
  const compact = input.replace(/\s+/g, "").toLowerCase();
  return compact.startsWith("0x") ? compact.slice(2) : compact;
}

/**
 * Exact fingerprint match, falling back to a unique suffix match so a key ID
 * (the last 16 hex digits) also works.
 */
export function matchFingerprint<T extends { fingerprint: string }>(
  candidates: readonly T[],
  query: string
): T {
  const wanted = normalizeFingerprint(query);
  if (!/^[0-9a-f]+$/.test(wanted)) {
    throw new KeyLookupError("not_found", `invalid fingerprint: ${query}`);
  }

  const exact = candidates.find((c) => c.fingerprint === wanted);
  if (exact) return exact;

  if (wanted.length >= MIN_SUFFIX_LENGTH) {
    const matches = candidates.filter((c) => c.fingerprint.endsWith(wanted));
    if (matches.length === 1) return matches[0];
    if (matches.length > 1) {
      throw new KeyLookupError(
        "ambiguous",
        `key id ${wanted} matches ${matches.length} keys, use the full fingerprint`
      );
    }
  }

  throw new KeyLookupError("not_found", `no key found for ${wanted}`);
}

export function selectKey<T>(candidates: readonly T[], selection: number | string): T {
  const index =
    typeof selection === "number"
      ? selection
      : /^\s*\d+\s*$/.test(selection)
        ? Number(selection)
        : Number.NaN;

  if (!Number.isInteger(index) || index < 0 || index >= candidates.length) {
    throw new KeyLookupError("invalid_selection", `invalid choice: ${String(selection).trim()}`);
  }
  return candidates[index];
}

/**
 * Resolve the recipient key: by fingerprint when one is given, otherwise by
 * letting `select` choose among every stored key, newest first.
 */
export async function lookupKey(repository: KeyRepository, args: LookupKeyArgs): Promise<StoredKey> {
  if (args.fingerprint) {
    const direct = await repository.get(normalizeFingerprint(args.fingerprint));
    if (direct) return direct;
    return matchFingerprint(await repository.list(), args.fingerprint);
  }

  const candidates = await repository.list();
  if (candidates.length === 0) {
    throw new KeyLookupError("not_found", "no keys imported, run 'pgp-mfa import <key-file>' first");
  }
  return selectKey(candidates, await args.select(candidates));
}
