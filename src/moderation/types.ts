export interface Session {
  readonly identity: string;
  readonly sessionStart: number;
  readonly messagesSent: number;
  readonly flaggedMessages: number;
  /** Reserved: stored and reported, never incremented. */
  readonly warningsIssued: number;
  readonly lastActivity: number;
  readonly lastUserAgent: string;
  readonly isBlocked: boolean;
  readonly blockReason: string;
  /** null means the block lasts until an explicit unblock. */
  readonly blockExpires: number | null;
}

export interface MessageLogEntry {
  readonly id: number;
  readonly identity: string;
  readonly timestamp: number;
  readonly content: string;
  readonly isFlagged: boolean;
  readonly flagReasons: string[];
  readonly userAgent: string;
  readonly responseLatencyMs: number;
}

export type ModerationActionType = "block" | "unblock";

export interface ModerationAction {
  readonly id: number;
  readonly identity: string;
  readonly actionType: ModerationActionType;
  readonly reason: string;
  readonly timestamp: number;
  readonly actor: string;
  readonly expiresAt: number | null;
}

export interface ModerationConfig {
  readonly maxMessagesPerWindow: number;
  readonly windowMinutes: number;
  readonly autoBlockThreshold: number;
  readonly blockDurationHours: number;
  /** Reserved alongside Session.warningsIssued. */
  readonly warningThreshold: number;
  readonly maxStoredMessageLength: number;
  readonly maxUserAgentLength: number;
}

export interface FilterRules {
  readonly words: readonly string[];
  readonly patterns: readonly string[];
}

export interface Classification {
  readonly flagged: boolean;
  readonly reasons: string[];
}

export interface IdentityContext {
  readonly identity: string;
  readonly userAgent?: string;
}

export type DecisionReason = ModerationDecision["reason"];

export type ModerationDecision =
  | {
      allowed: true;
      reason: "approved";
      message: string;
      entryId: number;
      session: Session;
    }
  | { allowed: false; reason: "user_blocked"; message: string }
  | {
      allowed: false;
      reason: "rate_limited";
      message: string;
      retryAfter: number;
    }
  | {
      allowed: false;
      reason: "content_flagged";
      message: string;
      entryId: number;
      flags: string[];
      autoBlocked: boolean;
    }
  | {
      allowed: false;
      reason: "invalid_input" | "internal_error";
      message: string;
    };

export interface IdentityStats {
  readonly identity: string;
  readonly sessionStart: number;
  readonly totalMessages: number;
  readonly flaggedMessages: number;
  readonly warningsIssued: number;
  readonly isBlocked: boolean;
  readonly blockReason: string;
  readonly blockExpires: number | null;
  readonly lastActivity: number;
  readonly lastUserAgent: string;
}

export interface AggregateStats {
  readonly totalUsers: number;
  readonly totalMessages: number;
  readonly flaggedMessages: number;
  readonly blockedUsers: number;
  readonly flaggedPercentage: number;
}

export interface ActivityEntry {
  readonly id: number;
  readonly identity: string;
  readonly timestamp: number;
  readonly preview: string;
  readonly isFlagged: boolean;
  readonly flagReasons: string[];
}
