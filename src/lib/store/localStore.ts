import Database from 'better-sqlite3';
import { IN_MEMORY_DB } from '@/lib/config';
import type { FeedbackEntry, Session } from '@/types/database';
import { parseFeedbackEntry } from './feedbackCodec';
import { parseSession, serializeSession } from './sessionCodec';
import type { SessionStore } from './types';

interface SessionRow {
  data: string;
}

interface FeedbackRow {
  data: string;
}

/**
 * Initialize the database schema.
 */
function initSchema(database: Database.Database): void {
  // Sessions table - latest copy of each session document
  database.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      session_id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  // Feedback table - one row per answered question
  database.exec(`
    CREATE TABLE IF NOT EXISTS feedback (
      feedback_id TEXT PRIMARY KEY,
      category TEXT,
      is_correct INTEGER NOT NULL,
      data TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions(updated_at);
    CREATE INDEX IF NOT EXISTS idx_feedback_created_at ON feedback(created_at);
  `);
}

/**
 * In-process copy of every session this server has handled. Kept in memory
 * by default, so it lives exactly as long as the process.
 */
export class LocalFallbackStore implements SessionStore {
  readonly name = 'local';
  private readonly db: Database.Database;

  constructor(dbPath = IN_MEMORY_DB) {
    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY_DB) {
      // Enable WAL mode for better performance
      this.db.pragma('journal_mode = WAL');
    }
    initSchema(this.db);
  }

  async get(sessionId: string): Promise<Session | null> {
    const row = this.db.prepare('SELECT data FROM sessions WHERE session_id = ?').get(sessionId) as
      | SessionRow
      | undefined;
    if (!row) {
      return null;
    }

    const session = parseSession(row.data);
    if (!session) {
      console.warn(`[store] Ignoring corrupt local session ${sessionId}`);
    }
    return session;
  }

  async put(session: Session, json: string = serializeSession(session)): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO sessions (session_id, data, updated_at)
        VALUES (?, ?, ?)
        ON CONFLICT(session_id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at
      `
      )
      .run(session.sessionId, json, session.updatedAt);
  }

  async delete(sessionId: string): Promise<void> {
    this.db.prepare('DELETE FROM sessions WHERE session_id = ?').run(sessionId);
  }

  /**
   * Delete sessions last updated before `cutoff` (ISO timestamp).
   * Returns the number of rows removed.
   */
  deleteOlderThan(cutoff: string): number {
    return this.db.prepare('DELETE FROM sessions WHERE updated_at < ?').run(cutoff).changes;
  }

  countSessions(): number {
    const row = this.db.prepare('SELECT COUNT(*) as count FROM sessions').get() as { count: number };
    return row.count;
  }

  putFeedback(entry: FeedbackEntry): void {
    this.db
      .prepare(
        `
        INSERT OR IGNORE INTO feedback (feedback_id, category, is_correct, data, created_at)
        VALUES (?, ?, ?, ?, ?)
      `
      )
      .run(entry.feedback_id, entry.category, entry.is_correct ? 1 : 0, JSON.stringify(entry), entry.timestamp);
  }

  listFeedback(): FeedbackEntry[] {
    const rows = this.db.prepare('SELECT data FROM feedback ORDER BY created_at ASC').all() as FeedbackRow[];
    const entries: FeedbackEntry[] = [];
    for (const row of rows) {
      const entry = parseFeedbackEntry(row.data);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  countFeedback(): number {
    const row = this.db.prepare('SELECT COUNT(*) as count FROM feedback').get() as { count: number };
    return row.count;
  }

  /**
   * Close the database connection.
   * Call this when shutting down the application.
   */
  close(): void {
    this.db.close();
  }
}
