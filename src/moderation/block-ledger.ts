import type { ModerationDB, ModerationActionRow } from "./db.js";
import type { SessionStore } from "./session-store.js";
import type { ModerationAction, ModerationActionType } from "./types.js";

const HOUR_MS = 3_600_000;

export const AUTO_EXPIRE_ACTOR = "auto_expire";

export interface BlockStatus {
  readonly blocked: boolean;
  readonly reason: string;
}

export interface ListActionsParams {
  identity?: string;
  limit?: number;
}

/**
 * Block state lives on the session row; every change to it is mirrored as
 * an append-only moderation action.
 */
export class BlockLedger {
  private readonly raw;

  constructor(
    private readonly db: ModerationDB,
    private readonly sessions: SessionStore,
  ) {
    this.raw = db.raw();
  }

  isBlocked(identity: string): BlockStatus {
    const session = this.sessions.get(identity);
    if (!session || !session.isBlocked) {
      return { blocked: false, reason: "" };
    }

    const now = Date.now();
    if (session.blockExpires !== null && now > session.blockExpires) {
      // Only the caller whose conditional update lands writes the audit row
      this.db.transaction(() => {
        if (this.sessions.clearExpiredBlock(identity, now)) {
          this.append(identity, "unblock", "Block expired", AUTO_EXPIRE_ACTOR, null, now);
        }
      });
      return { blocked: false, reason: "" };
    }

    return { blocked: true, reason: session.blockReason };
  }

  /** durationHours of 0 or undefined blocks until an explicit unblock. */
  block(
    identity: string,
    reason: string,
    durationHours: number | undefined,
    actor: string,
  ): ModerationAction {
    if (reason.trim() === "") {
      throw new Error("Block reason must not be empty");
    }
    const now = Date.now();
    const expiresAt =
      durationHours !== undefined && durationHours > 0
        ? now + Math.round(durationHours * HOUR_MS)
        : null;

    return this.db.transaction(() => {
      this.sessions.getOrCreate(identity);
      this.sessions.setBlock(identity, reason, expiresAt);
      return this.append(identity, "block", reason, actor, expiresAt, now);
    });
  }

  unblock(
    identity: string,
    actor: string,
    reason = "Manual unblock",
  ): ModerationAction {
    const now = Date.now();
    return this.db.transaction(() => {
      this.sessions.clearBlock(identity);
      return this.append(identity, "unblock", reason, actor, null, now);
    });
  }

  /**
   * The newest `limit` actions. One identity's history reads oldest first;
   * the global feed reads newest first.
   */
  listActions(params: ListActionsParams = {}): ModerationAction[] {
    const limit = params.limit ?? 100;
    if (params.identity === undefined) {
      return this.raw
        .prepare<[number], ModerationActionRow>(
          "SELECT * FROM moderation_actions ORDER BY id DESC LIMIT ?",
        )
        .all(limit)
        .map(toAction);
    }
    return this.raw
      .prepare<[string, number], ModerationActionRow>(
        "SELECT * FROM moderation_actions WHERE identity = ? ORDER BY id DESC LIMIT ?",
      )
      .all(params.identity, limit)
      .reverse()
      .map(toAction);
  }

  private append(
    identity: string,
    actionType: ModerationActionType,
    reason: string,
    actor: string,
    expiresAt: number | null,
    timestamp: number,
  ): ModerationAction {
    const result = this.raw
      .prepare(
        `INSERT INTO moderation_actions (identity, action_type, reason, timestamp, actor, expires_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(identity, actionType, reason, timestamp, actor, expiresAt);
    return {
      id: Number(result.lastInsertRowid),
      identity,
      actionType,
      reason,
      timestamp,
      actor,
      expiresAt,
    };
  }
}

function toAction(row: ModerationActionRow): ModerationAction {
  return {
    id: row.id,
    identity: row.identity,
    actionType: row.action_type,
    reason: row.reason,
    timestamp: row.timestamp,
    actor: row.actor,
    expiresAt: row.expires_at,
  };
}
