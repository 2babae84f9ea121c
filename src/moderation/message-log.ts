import type { ModerationDB, MessageLogRow } from "./db.js";
import type { MessageLogEntry } from "./types.js";

export interface AppendMessageParams {
  identity: string;
  content: string;
  isFlagged: boolean;
  flagReasons: string[];
  userAgent?: string;
  timestamp?: number;
}

export interface ListMessagesParams {
  identity?: string;
  since?: number;
  limit?: number;
}

export class MessageLog {
  private readonly db;

  constructor(moderationDb: ModerationDB) {
    this.db = moderationDb.raw();
  }

  append(params: AppendMessageParams): number {
    const result = this.db
      .prepare(
        `INSERT INTO message_log (identity, timestamp, content, is_flagged, flag_reasons, user_agent)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.identity,
        params.timestamp ?? Date.now(),
        params.content,
        params.isFlagged ? 1 : 0,
        JSON.stringify(params.flagReasons),
        params.userAgent ?? "",
      );
    return Number(result.lastInsertRowid);
  }

  get(id: number): MessageLogEntry | null {
    const row = this.db
      .prepare<[number], MessageLogRow>("SELECT * FROM message_log WHERE id = ?")
      .get(id);
    return row ? toEntry(row) : null;
  }

  /** Entries strictly newer than `since`, newest first. */
  list(params: ListMessagesParams): MessageLogEntry[] {
    const conditions: string[] = [];
    const values: Array<string | number> = [];

    if (params.identity !== undefined) {
      conditions.push("identity = ?");
      values.push(params.identity);
    }
    if (params.since !== undefined) {
      conditions.push("timestamp > ?");
      values.push(params.since);
    }

    const where =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = params.limit ?? 100;

    const rows = this.db
      .prepare<Array<string | number>, MessageLogRow>(
        `SELECT * FROM message_log ${where} ORDER BY timestamp DESC, id DESC LIMIT ?`,
      )
      .all(...values, limit);
    return rows.map(toEntry);
  }

  countSince(identity: string, since: number): number {
    const row = this.db
      .prepare<[string, number], { total: number }>(
        "SELECT COUNT(*) AS total FROM message_log WHERE identity = ? AND timestamp > ?",
      )
      .get(identity, since);
    return row?.total ?? 0;
  }

  /** Totals over the whole log, or over one identity's rows. */
  totals(identity?: string): { total: number; flagged: number } {
    const where = identity !== undefined ? "WHERE identity = ?" : "";
    const row = this.db
      .prepare<string[], { total: number; flagged: number | null }>(
        `SELECT COUNT(*) AS total, SUM(is_flagged) AS flagged FROM message_log ${where}`,
      )
      .get(...(identity !== undefined ? [identity] : []));
    return { total: row?.total ?? 0, flagged: row?.flagged ?? 0 };
  }

  setLatency(id: number, latencyMs: number): boolean {
    const result = this.db
      .prepare("UPDATE message_log SET response_latency_ms = ? WHERE id = ?")
      .run(Math.round(latencyMs), id);
    return result.changes > 0;
  }
}

/** Cuts text to at most `max` code points. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join("");
}

function parseReasons(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed)
    ? parsed.filter((r): r is string => typeof r === "string")
    : [];
}

function toEntry(row: MessageLogRow): MessageLogEntry {
  return {
    id: row.id,
    identity: row.identity,
    timestamp: row.timestamp,
    content: row.content,
    isFlagged: row.is_flagged === 1,
    flagReasons: parseReasons(row.flag_reasons),
    userAgent: row.user_agent,
    responseLatencyMs: row.response_latency_ms,
  };
}
