import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  identity         TEXT PRIMARY KEY,
  session_start    INTEGER NOT NULL,
  messages_sent    INTEGER NOT NULL DEFAULT 0,
  flagged_messages INTEGER NOT NULL DEFAULT 0,
  warnings_issued  INTEGER NOT NULL DEFAULT 0,
  last_activity    INTEGER NOT NULL,
  last_user_agent  TEXT NOT NULL DEFAULT '',
  is_blocked       INTEGER NOT NULL DEFAULT 0 CHECK(is_blocked IN (0, 1)),
  block_reason     TEXT NOT NULL DEFAULT '',
  block_expires    INTEGER,
  CHECK(is_blocked = 0 OR block_reason <> '')
);

CREATE TABLE IF NOT EXISTS message_log (
  id                  INTEGER PRIMARY KEY AUTOINCREMENT,
  identity            TEXT NOT NULL,
  timestamp           INTEGER NOT NULL,
  content             TEXT NOT NULL,
  is_flagged          INTEGER NOT NULL DEFAULT 0,
  flag_reasons        TEXT NOT NULL DEFAULT '[]',
  user_agent          TEXT NOT NULL DEFAULT '',
  response_latency_ms INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_message_log_identity ON message_log(identity, timestamp);
CREATE INDEX IF NOT EXISTS idx_message_log_timestamp ON message_log(timestamp);

CREATE TABLE IF NOT EXISTS moderation_actions (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  identity    TEXT NOT NULL,
  action_type TEXT NOT NULL CHECK(action_type IN ('block','unblock')),
  reason      TEXT NOT NULL,
  timestamp   INTEGER NOT NULL,
  actor       TEXT NOT NULL,
  expires_at  INTEGER
);
CREATE INDEX IF NOT EXISTS idx_moderation_actions_identity ON moderation_actions(identity, id);
`;

export interface SessionRow {
  identity: string;
  session_start: number;
  messages_sent: number;
  flagged_messages: number;
  warnings_issued: number;
  last_activity: number;
  last_user_agent: string;
  is_blocked: number;
  block_reason: string;
  block_expires: number | null;
}

export interface MessageLogRow {
  id: number;
  identity: string;
  timestamp: number;
  content: string;
  is_flagged: number;
  flag_reasons: string;
  user_agent: string;
  response_latency_ms: number;
}

export interface ModerationActionRow {
  id: number;
  identity: string;
  action_type: "block" | "unblock";
  reason: string;
  timestamp: number;
  actor: string;
  expires_at: number | null;
}

export class ModerationDB {
  private db: Database.Database;

  constructor(stateDir: string, filename = "moderation.db") {
    this.db = new Database(join(stateDir, filename));
    this.db.pragma("journal_mode = WAL");
    // CLI commands write to the same file while the gateway runs
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  /** Runs fn inside one SQLite transaction; nested calls become savepoints. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
