// Timestamps are ISO-8601 UTC strings of fixed width, so text comparison
// in the CHECK constraint orders them chronologically.
export const CREATE_EMBED_TOKENS_TABLE = `
CREATE TABLE IF NOT EXISTS embed_tokens (
  id TEXT PRIMARY KEY,
  embed_token TEXT UNIQUE NOT NULL,
  cypher_query TEXT NOT NULL,
  created_at TEXT NOT NULL,
  expires_at TEXT NOT NULL,
  CHECK (expires_at > created_at)
);
`;

export const CREATE_IMMUTABLE_TRIGGER = `
CREATE TRIGGER IF NOT EXISTS embed_tokens_immutable
BEFORE UPDATE ON embed_tokens
BEGIN
  SELECT RAISE(ABORT, 'embed_tokens rows are immutable');
END;
`;
