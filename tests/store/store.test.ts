import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { TokenStoreClient } from "../../src/store/client.js";
import { findEmbedToken, insertEmbedToken } from "../../src/store/operations.js";
import { CREATE_EMBED_TOKENS_TABLE } from "../../src/store/schema.js";
import { StorageError } from "../../src/errors.js";

const createdAt = new Date("2026-03-01T12:00:00.000Z");
const expiresAt = new Date("2026-03-08T12:00:00.000Z");

describe("TokenStoreClient", () => {
  let client: TokenStoreClient;

  beforeEach(() => {
    client = new TokenStoreClient(":memory:");
  });

  afterEach(() => {
    client.close();
  });

  it("creates the embed_tokens table", () => {
    const tables = client.db
      .prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name='embed_tokens'`)
      .all() as Array<{ name: string }>;
    expect(tables).toEqual([{ name: "embed_tokens" }]);
  });

  it("applies the schema idempotently", () => {
    expect(() => client.db.exec(CREATE_EMBED_TOKENS_TABLE)).not.toThrow();
  });
});

describe("Token store operations", () => {
  let client: TokenStoreClient;

  beforeEach(() => {
    client = new TokenStoreClient(":memory:");
  });

  afterEach(() => {
    if (client.db.open) client.close();
  });

  describe("insertEmbedToken", () => {
    it("persists the record and returns it with a generated id", () => {
      const record = insertEmbedToken(client.db, {
        token: "tok-1",
        query: "MATCH (n) RETURN n",
        createdAt,
        expiresAt,
      });

      expect(record.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(record.token).toBe("tok-1");
      expect(record.query).toBe("MATCH (n) RETURN n");
      expect(record.createdAt.toISOString()).toBe("2026-03-01T12:00:00.000Z");
      expect(record.expiresAt.toISOString()).toBe("2026-03-08T12:00:00.000Z");
    });

    it("stores timestamps as ISO-8601 UTC text", () => {
      insertEmbedToken(client.db, { token: "tok-1", query: "RETURN 1", createdAt, expiresAt });

      const row = client.db
        .prepare(`SELECT created_at, expires_at FROM embed_tokens WHERE embed_token = ?`)
        .get("tok-1") as { created_at: string; expires_at: string };
      expect(row).toEqual({
        created_at: "2026-03-01T12:00:00.000Z",
        expires_at: "2026-03-08T12:00:00.000Z",
      });
    });

    it("rejects a duplicate token with StorageError and keeps the original", () => {
      insertEmbedToken(client.db, { token: "dup", query: "RETURN 1", createdAt, expiresAt });

      expect(() =>
        insertEmbedToken(client.db, { token: "dup", query: "RETURN 2", createdAt, expiresAt }),
      ).toThrow(StorageError);

      expect(findEmbedToken(client.db, "dup")?.query).toBe("RETURN 1");
      const count = client.db.prepare(`SELECT COUNT(*) AS n FROM embed_tokens`).get() as { n: number };
      expect(count.n).toBe(1);
    });

    it("rejects an expiry that is not after creation", () => {
      expect(() =>
        insertEmbedToken(client.db, {
          token: "tok-bad",
          query: "RETURN 1",
          createdAt,
          expiresAt: createdAt,
        }),
      ).toThrow(StorageError);
      expect(findEmbedToken(client.db, "tok-bad")).toBeNull();
    });

    it("wraps failures on a closed database in StorageError", () => {
      client.close();
      expect(() =>
        insertEmbedToken(client.db, { token: "tok-1", query: "RETURN 1", createdAt, expiresAt }),
      ).toThrow(StorageError);
    });
  });

  describe("findEmbedToken", () => {
    it("returns null when no row matches", () => {
      expect(findEmbedToken(client.db, "missing")).toBeNull();
    });

    it("returns the stored record", () => {
      const inserted = insertEmbedToken(client.db, {
        token: "tok-2",
        query: "MATCH (p:Person) RETURN p",
        createdAt,
        expiresAt,
      });

      expect(findEmbedToken(client.db, "tok-2")).toEqual(inserted);
    });

    it("wraps failures on a closed database in StorageError", () => {
      client.close();
      expect(() => findEmbedToken(client.db, "tok-2")).toThrow(StorageError);
    });
  });

  describe("immutability", () => {
    it("refuses updates to stored rows", () => {
      insertEmbedToken(client.db, { token: "tok-3", query: "RETURN 1", createdAt, expiresAt });

      expect(() =>
        client.db.prepare(`UPDATE embed_tokens SET cypher_query = 'RETURN 2'`).run(),
      ).toThrow(/immutable/);
      expect(findEmbedToken(client.db, "tok-3")?.query).toBe("RETURN 1");
    });
  });
});
