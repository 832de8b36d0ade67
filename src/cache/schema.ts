/**
 * Command cache schema.
 */

export const CACHE_SCHEMA_VERSION = 1;

export const CACHE_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS command_cache (
    key TEXT PRIMARY KEY,
    command TEXT NOT NULL,
    cwd TEXT NOT NULL,
    total INTEGER NOT NULL,
    tempfile TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    hits INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_command_cache_created ON command_cache(created_at);

  CREATE TABLE IF NOT EXISTS schema_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;
