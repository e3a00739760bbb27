import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { StorageError } from "../errors.js";
import { CREATE_EMBED_TOKENS_TABLE, CREATE_IMMUTABLE_TRIGGER } from "./schema.js";

export interface TokenStoreOptions {
  /** How long a write waits on a locked database before failing. */
  busyTimeoutMs?: number;
}

export class TokenStoreClient {
  readonly db: BetterSqlite3.Database;

  constructor(dbPath: string, options: TokenStoreOptions = {}) {
    try {
      this.db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 });
      this.db.pragma("journal_mode = WAL");
      this.db.exec(CREATE_EMBED_TOKENS_TABLE);
      this.db.exec(CREATE_IMMUTABLE_TRIGGER);
    } catch (err) {
      throw new StorageError(`Failed to open token store at ${dbPath}`, err);
    }
  }

  close(): void {
    this.db.close();
  }
}
