import Database from "better-sqlite3";
import type { KeyRepository, StoredKey } from "@pgp-mfa/core";
import { KeyImportError } from "./errors.js";

interface KeyRow {
  fingerprint: string;
  pub_key: Buffer;
  created_at: number;
}

function toStoredKey(row: KeyRow): StoredKey {
  return {
    fingerprint: row.fingerprint,
    publicKey: new Uint8Array(row.pub_key),
    createdAt: new Date(row.created_at),
  };
}

/** Public keys by fingerprint in a single SQLite file. */
export class SqliteKeyRepository implements KeyRepository {
  private constructor(private readonly db: Database.Database) {}

  /** Open (or create) the database; pass ":memory:" for a throwaway store. */
  static open(path: string): SqliteKeyRepository {
    const db = new Database(path);
    db.exec(`CREATE TABLE IF NOT EXISTS keys (
      fingerprint VARCHAR(40) NOT NULL PRIMARY KEY,
      pub_key BLOB NOT NULL,
      created_at INTEGER NOT NULL
    )`);
    return new SqliteKeyRepository(db);
  }

  async add(key: StoredKey): Promise<void> {
    const result = this.db
      .prepare<[string, Buffer, number]>(
        "INSERT INTO keys (fingerprint, pub_key, created_at) VALUES (?, ?, ?) ON CONFLICT(fingerprint) DO NOTHING"
      )
      .run(key.fingerprint.toLowerCase(), Buffer.from(key.publicKey), key.createdAt.getTime());
    if (result.changes === 0) {
      throw new KeyImportError("already_imported", { fingerprint: key.fingerprint });
    }
  }

  async get(fingerprint: string): Promise<StoredKey | undefined> {
    const row = this.db
      .prepare<[string], KeyRow>("SELECT fingerprint, pub_key, created_at FROM keys WHERE fingerprint = ?")
      .get(fingerprint.toLowerCase());
    return row ? toStoredKey(row) : undefined;
  }

  async list(): Promise<StoredKey[]> {
    const rows = this.db
      .prepare<[], KeyRow>(
        "SELECT fingerprint, pub_key, created_at FROM keys ORDER BY created_at DESC, rowid DESC"
      )
      .all();
    return rows.map(toStoredKey);
  }

  async remove(fingerprint: string): Promise<boolean> {
    const result = this.db
      .prepare<[string]>("DELETE FROM keys WHERE fingerprint = ?")
      .run(fingerprint.toLowerCase());
    return result.changes > 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
