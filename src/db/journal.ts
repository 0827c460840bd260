import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { ToolFailureKind } from '../mcp-client/errors.js';
import type { JournalEntry } from '../mcp-client/types.js';

export const REDACTED = '**REDACTED**';

const SECRET_KEY = /token|secret|password|passwd|authorization|api[_-]?key|credential/i;

export interface CallRecord {
  toolName: string;
  args: Record<string, unknown>;
  success: boolean;
  errorKind?: ToolFailureKind;
  error?: string;
  durationMs: number;
}

interface JournalRow {
  id: number;
  timestamp: string;
  tool_name: string;
  arguments: string;
  success: number;
  error_kind: ToolFailureKind | null;
  error: string | null;
  duration_ms: number;
}

/**
 * SQLite journal of tool calls, read back by diagnostics
 */
export class CallJournal {
  private readonly db: Database.Database;

  constructor(readonly location: string) {
    if (location !== ':memory:') {
      const dir = path.dirname(path.resolve(location));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        console.error(`[CallJournal] Created data directory: ${dir}`);
      }
    }

    try {
      this.db = new Database(location);
      this.initSchema();
    } catch (e) {
      console.error(`[CallJournal] Failed to initialize database at ${location}:`, e);
      throw e;
    }
  }

  private initSchema(): void {
    // WAL keeps readers off the writer's back
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tool_calls (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        tool_name TEXT NOT NULL,
        arguments TEXT NOT NULL,
        success INTEGER NOT NULL,
        error_kind TEXT,
        error TEXT,
        duration_ms INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tool_calls_tool_name ON tool_calls(tool_name);
    `);
  }

  record(call: CallRecord): void {
    const stmt = this.db.prepare(`
      INSERT INTO tool_calls (timestamp, tool_name, arguments, success, error_kind, error, duration_ms)
      VALUES (@timestamp, @tool_name, @arguments, @success, @error_kind, @error, @duration_ms)
    `);
    stmt.run({
      timestamp: new Date().toISOString(),
      tool_name: call.toolName,
      arguments: JSON.stringify(redactSecrets(call.args)),
      success: call.success ? 1 : 0,
      error_kind: call.errorKind ?? null,
      error: call.error ?? null,
      duration_ms: Math.round(call.durationMs),
    });
  }

  /**
   * Most recent calls first
   */
  recent(limit = 20): JournalEntry[] {
    const stmt = this.db.prepare<[number], JournalRow>(`
      SELECT * FROM tool_calls ORDER BY id DESC LIMIT ?
    `);
    return stmt.all(limit).map(toEntry);
  }

  /**
   * Keep only the most recent `keep` calls; returns the number removed
   */
  prune(keep: number): number {
    const stmt = this.db.prepare(`
      DELETE FROM tool_calls
      WHERE id NOT IN (
        SELECT id FROM tool_calls ORDER BY id DESC LIMIT ?
      )
    `);
    return stmt.run(keep).changes;
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM tool_calls').get();
    return row?.count ?? 0;
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function toEntry(row: JournalRow): JournalEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    toolName: row.tool_name,
    args: row.arguments,
    success: row.success === 1,
    errorKind: row.error_kind,
    error: row.error,
    durationMs: row.duration_ms,
  };
}

/**
 * Copy of a value with every secret-looking key's value replaced
 */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (typeof value === 'object' && value !== null) {
    const redacted: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      redacted[key] = SECRET_KEY.test(key) ? REDACTED : redactSecrets(inner);
    }
    return redacted;
  }
  return value;
}
