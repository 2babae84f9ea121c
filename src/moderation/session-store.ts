import type { ModerationDB, SessionRow } from "./db.js";
import type { Session } from "./types.js";

export class SessionStore {
  private readonly db;

  constructor(moderationDb: ModerationDB) {
    this.db = moderationDb.raw();
  }

  get(identity: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT * FROM sessions WHERE identity = ?")
      .get(identity);
    return row ? toSession(row) : null;
  }

  getOrCreate(identity: string): Session {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO sessions (identity, session_start, last_activity)
         VALUES (?, ?, ?)
         ON CONFLICT(identity) DO NOTHING`,
      )
      .run(identity, now, now);
    return this.require(identity);
  }

  /** Counts one processed message; the first message creates the session. */
  recordMessage(identity: string, userAgent: string): Session {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO sessions (identity, session_start, messages_sent, last_activity, last_user_agent)
         VALUES (?, ?, 1, ?, ?)
         ON CONFLICT(identity) DO UPDATE SET
           messages_sent = sessions.messages_sent + 1,
           last_activity = excluded.last_activity,
           last_user_agent = excluded.last_user_agent`,
      )
      .run(identity, now, now, userAgent);
    return this.require(identity);
  }

  /** Returns the flagged-message total after the increment. */
  recordFlag(identity: string): number {
    const now = Date.now();
    const row = this.db
      .prepare<[string, number, number], { flagged_messages: number }>(
        `INSERT INTO sessions (identity, session_start, flagged_messages, last_activity)
         VALUES (?, ?, 1, ?)
         ON CONFLICT(identity) DO UPDATE SET
           flagged_messages = sessions.flagged_messages + 1
         RETURNING flagged_messages`,
      )
      .get(identity, now, now);
    if (!row) {
      throw new Error(`Failed to record flag for ${identity}`);
    }
    return row.flagged_messages;
  }

  setBlock(identity: string, reason: string, expiresAt: number | null): void {
    this.db
      .prepare(
        `UPDATE sessions SET is_blocked = 1, block_reason = ?, block_expires = ?
         WHERE identity = ?`,
      )
      .run(reason, expiresAt, identity);
  }

  clearBlock(identity: string): void {
    this.db
      .prepare(
        `UPDATE sessions SET is_blocked = 0, block_reason = '', block_expires = NULL
         WHERE identity = ?`,
      )
      .run(identity);
  }

  /**
   * Clears the block only if the row is still blocked with an expiry before
   * `now`. Returns true when this call performed the unblock.
   */
  clearExpiredBlock(identity: string, now: number): boolean {
    const result = this.db
      .prepare(
        `UPDATE sessions SET is_blocked = 0, block_reason = '', block_expires = NULL
         WHERE identity = ? AND is_blocked = 1
           AND block_expires IS NOT NULL AND block_expires < ?`,
      )
      .run(identity, now);
    return result.changes > 0;
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM sessions")
      .get();
    return row?.total ?? 0;
  }

  /** Blocked sessions whose block has not lapsed at `now`. */
  countBlocked(now: number): number {
    const row = this.db
      .prepare<[number], { total: number }>(
        `SELECT COUNT(*) AS total FROM sessions
         WHERE is_blocked = 1 AND (block_expires IS NULL OR block_expires >= ?)`,
      )
      .get(now);
    return row?.total ?? 0;
  }

  private require(identity: string): Session {
    const session = this.get(identity);
    if (!session) {
      throw new Error(`Session missing after write: ${identity}`);
    }
    return session;
  }
}

function toSession(row: SessionRow): Session {
  return {
    identity: row.identity,
    sessionStart: row.session_start,
    messagesSent: row.messages_sent,
    flaggedMessages: row.flagged_messages,
    warningsIssued: row.warnings_issued,
    lastActivity: row.last_activity,
    lastUserAgent: row.last_user_agent,
    isBlocked: row.is_blocked === 1,
    blockReason: row.block_reason,
    blockExpires: row.block_expires,
  };
}
