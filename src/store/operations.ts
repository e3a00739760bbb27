import { randomUUID } from "node:crypto";
import type BetterSqlite3 from "better-sqlite3";
import { StorageError } from "../errors.js";

export interface EmbedToken {
  id: string;
  token: string;
  query: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface NewEmbedToken {
  token: string;
  query: string;
  createdAt: Date;
  expiresAt: Date;
}

interface EmbedTokenRow {
  id: string;
  embed_token: string;
  cypher_query: string;
  created_at: string;
  expires_at: string;
}

function toEmbedToken(row: EmbedTokenRow): EmbedToken {
  return {
    id: row.id,
    token: row.embed_token,
    query: row.cypher_query,
    createdAt: new Date(row.created_at),
    expiresAt: new Date(row.expires_at),
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Persist a new token. The insert is a single statement, so it either
 * commits as a whole or leaves nothing behind.
 */
export function insertEmbedToken(db: BetterSqlite3.Database, item: NewEmbedToken): EmbedToken {
  const row: EmbedTokenRow = {
    id: randomUUID(),
    embed_token: item.token,
    cypher_query: item.query,
    created_at: item.createdAt.toISOString(),
    expires_at: item.expiresAt.toISOString(),
  };

  try {
    db.prepare<EmbedTokenRow>(
      `INSERT INTO embed_tokens (id, embed_token, cypher_query, created_at, expires_at)
       VALUES (@id, @embed_token, @cypher_query, @created_at, @expires_at)`,
    ).run(row);
  } catch (err) {
    throw new StorageError(`Failed to insert embed token: ${errorMessage(err)}`, err);
  }

  return toEmbedToken(row);
}

export function findEmbedToken(db: BetterSqlite3.Database, token: string): EmbedToken | null {
  let row: EmbedTokenRow | undefined;
  try {
    row = db
      .prepare<{ token: string }, EmbedTokenRow>(
        `SELECT id, embed_token, cypher_query, created_at, expires_at
         FROM embed_tokens WHERE embed_token = @token LIMIT 1`,
      )
      .get({ token });
  } catch (err) {
    throw new StorageError(`Failed to look up embed token: ${errorMessage(err)}`, err);
  }

  return row ? toEmbedToken(row) : null;
}
