/**
 * Command Output Cache
 *
 * Remembers where the spilled output of an expensive candidate command
 * lives, so the next session for the same command and directory can skip
 * running it. Entries whose temp file disappeared are discarded on lookup.
 */
import Database from 'better-sqlite3';
import { createHash } from 'crypto';
import { existsSync, mkdirSync, unlinkSync } from 'fs';
import { dirname } from 'path';
import { CACHE_SCHEMA_SQL, CACHE_SCHEMA_VERSION } from './schema.js';

export interface CacheEntry {
  command: string[];
  cwd: string;
  total: number;
  tempfile: string;
  createdAt: number;
  hits: number;
}

interface CacheRow {
  key: string;
  command: string;
  cwd: string;
  total: number;
  tempfile: string;
  created_at: number;
  hits: number;
}

export function cacheKey(argv: readonly string[], cwd: string): string {
  return createHash('sha256').update(JSON.stringify([argv, cwd])).digest('hex');
}

function parseCommand(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.map(String) : [];
}

function toEntry(row: CacheRow): CacheEntry {
  return {
    command: parseCommand(row.command),
    cwd: row.cwd,
    total: row.total,
    tempfile: row.tempfile,
    createdAt: row.created_at,
    hits: row.hits,
  };
}

export class CommandCache {
  private readonly db: Database.Database;
  private readonly fileExists: (path: string) => boolean;

  constructor(db: Database.Database, options: { fileExists?: (path: string) => boolean } = {}) {
    this.db = db;
    this.fileExists = options.fileExists ?? existsSync;
    this.db.exec(CACHE_SCHEMA_SQL);
    this.db
      .prepare(`INSERT OR REPLACE INTO schema_meta (key, value) VALUES ('version', ?)`)
      .run(String(CACHE_SCHEMA_VERSION));
  }

  /** Open (creating if needed) the cache database at `dbPath`. */
  static open(dbPath: string): CommandCache {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    return new CommandCache(db);
  }

  lookup(argv: readonly string[], cwd: string): CacheEntry | null {
    const key = cacheKey(argv, cwd);
    const row = this.db.prepare(`SELECT * FROM command_cache WHERE key = ?`).get(key) as CacheRow | undefined;
    if (!row) return null;

    if (!this.fileExists(row.tempfile)) {
      this.db.prepare(`DELETE FROM command_cache WHERE key = ?`).run(key);
      return null;
    }

    this.db.prepare(`UPDATE command_cache SET hits = hits + 1 WHERE key = ?`).run(key);
    return toEntry({ ...row, hits: row.hits + 1 });
  }

  store(argv: readonly string[], cwd: string, total: number, tempfile: string, now = Date.now()): CacheEntry {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO command_cache (key, command, cwd, total, tempfile, created_at, hits)
         VALUES (?, ?, ?, ?, ?, ?, 0)`,
      )
      .run(cacheKey(argv, cwd), JSON.stringify(argv), cwd, total, tempfile, now);
    return { command: [...argv], cwd, total, tempfile, createdAt: now, hits: 0 };
  }

  remove(argv: readonly string[], cwd: string): boolean {
    const result = this.db.prepare(`DELETE FROM command_cache WHERE key = ?`).run(cacheKey(argv, cwd));
    return result.changes > 0;
  }

  list(limit = 50): CacheEntry[] {
    const rows = this.db
      .prepare(`SELECT * FROM command_cache ORDER BY created_at DESC LIMIT ?`)
      .all(limit) as CacheRow[];
    return rows.map(toEntry);
  }

  /**
   * Remove entries older than `maxAgeMs`, deleting their temp files.
   * Returns the number of entries removed.
   */
  prune(maxAgeMs: number, now = Date.now()): number {
    const cutoff = now - maxAgeMs;
    const rows = this.db
      .prepare(`SELECT tempfile FROM command_cache WHERE created_at < ?`)
      .all(cutoff) as Array<Pick<CacheRow, 'tempfile'>>;
    for (const { tempfile } of rows) {
      if (this.fileExists(tempfile)) {
        try {
          unlinkSync(tempfile);
        } catch (e) {
          console.error('[swiftpick:cache] Failed to remove spilled output:', e);
        }
      }
    }
    return this.db.prepare(`DELETE FROM command_cache WHERE created_at < ?`).run(cutoff).changes;
  }

  close(): void {
    this.db.close();
  }
}
