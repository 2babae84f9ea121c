import type { Logger } from "../logging/logger.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { BlockLedger, type ListActionsParams } from "./block-ledger.js";
import { ContentClassifier, publicFlags } from "./classifier.js";
import type { ModerationDB } from "./db.js";
import { MessageLog, truncate } from "./message-log.js";
import { RateLimiter } from "./rate-limiter.js";
import { SessionStore } from "./session-store.js";
import type {
  FilterRulesPatch,
  ModerationConfigPatch,
  ModerationSettings,
} from "./settings.js";
import type {
  ActivityEntry,
  AggregateStats,
  DecisionReason,
  FilterRules,
  IdentityContext,
  IdentityStats,
  ModerationAction,
  ModerationConfig,
  ModerationDecision,
} from "./types.js";

/**
 * Fixed hint sent with rate-limit denials, independent of the configured
 * window length.
 */
export const RATE_LIMIT_RETRY_AFTER_SECONDS = 3600;

export const SYSTEM_ACTOR = "system";

const PREVIEW_LENGTH = 100;

const DECISION_REASONS: readonly DecisionReason[] = [
  "approved",
  "user_blocked",
  "rate_limited",
  "content_flagged",
  "invalid_input",
  "internal_error",
];

export interface ModerationGateDeps {
  db: ModerationDB;
  settings: ModerationSettings;
  logger: Logger;
}

export class ModerationGate {
  readonly sessions: SessionStore;
  readonly log: MessageLog;
  readonly ledger: BlockLedger;
  readonly limiter: RateLimiter;
  readonly classifier: ContentClassifier;

  private readonly db: ModerationDB;
  private readonly settings: ModerationSettings;
  private readonly logger: Logger;
  private readonly mutex = new KeyedMutex();
  private readonly counts = new Map<DecisionReason, number>(
    DECISION_REASONS.map((r): [DecisionReason, number] => [r, 0]),
  );
  private closed = false;

  constructor(deps: ModerationGateDeps) {
    this.db = deps.db;
    this.settings = deps.settings;
    this.logger = deps.logger;
    this.sessions = new SessionStore(deps.db);
    this.log = new MessageLog(deps.db);
    this.ledger = new BlockLedger(deps.db, this.sessions);
    this.limiter = new RateLimiter(this.log, () => this.settings.getConfig());
    this.classifier = new ContentClassifier(this.settings.getFilters());
  }

  async moderate(
    context: IdentityContext,
    text: string,
  ): Promise<ModerationDecision> {
    const identity = context.identity.trim();
    if (identity === "") {
      return this.finish(identity, {
        allowed: false,
        reason: "invalid_input",
        message: "Missing client identity.",
      });
    }
    if (text.trim() === "") {
      return this.finish(identity, {
        allowed: false,
        reason: "invalid_input",
        message: "Message must not be empty.",
      });
    }
    if (this.closed) {
      return this.finish(identity, internalError());
    }

    try {
      const decision = await this.mutex.run(identity, () =>
        this.evaluate(identity, context.userAgent ?? "", text),
      );
      return this.finish(identity, decision);
    } catch (err) {
      this.logger.error({ err, identity }, "Moderation failed, denying message");
      return this.finish(identity, internalError());
    }
  }

  private evaluate(
    identity: string,
    userAgent: string,
    text: string,
  ): ModerationDecision {
    const block = this.ledger.isBlocked(identity);
    if (block.blocked) {
      return {
        allowed: false,
        reason: "user_blocked",
        message: `Your access has been temporarily restricted: ${block.reason}`,
      };
    }

    const rate = this.limiter.check(identity);
    if (rate.limited) {
      return {
        allowed: false,
        reason: "rate_limited",
        message: rate.detail,
        retryAfter: RATE_LIMIT_RETRY_AFTER_SECONDS,
      };
    }

    const verdict = this.classifier.classify(text);
    const config = this.settings.getConfig();
    const agent = truncate(userAgent, config.maxUserAgentLength);

    const { session, entryId } = this.db.transaction(() => ({
      session: this.sessions.recordMessage(identity, agent),
      entryId: this.log.append({
        identity,
        content: truncate(text, config.maxStoredMessageLength),
        isFlagged: verdict.flagged,
        flagReasons: verdict.reasons,
        userAgent: agent,
      }),
    }));

    if (!verdict.flagged) {
      return {
        allowed: true,
        reason: "approved",
        message: "Message approved.",
        entryId,
        session,
      };
    }

    const autoBlocked = this.db.transaction(() => {
      const flagged = this.sessions.recordFlag(identity);
      if (
        flagged < config.autoBlockThreshold ||
        this.sessions.get(identity)?.isBlocked
      ) {
        return false;
      }
      this.ledger.block(
        identity,
        `Auto-blocked after ${flagged} flagged messages`,
        config.blockDurationHours,
        SYSTEM_ACTOR,
      );
      this.logger.warn({ identity, flagged }, "Identity auto-blocked");
      return true;
    });

    return {
      allowed: false,
      reason: "content_flagged",
      message:
        "Your message contains inappropriate content. Please keep conversations respectful and on-topic.",
      entryId,
      flags: publicFlags(verdict.reasons),
      autoBlocked,
    };
  }

  private finish(
    identity: string,
    decision: ModerationDecision,
  ): ModerationDecision {
    this.counts.set(decision.reason, (this.counts.get(decision.reason) ?? 0) + 1);
    if (decision.allowed) {
      this.logger.debug({ identity }, "Message approved");
    } else {
      this.logger.info({ identity, reason: decision.reason }, "Message denied");
    }
    return decision;
  }

  // ── Administration ──

  async block(
    identity: string,
    reason: string,
    durationHours?: number,
    actor = "admin",
  ): Promise<ModerationAction> {
    this.assertOpen();
    const action = await this.mutex.run(identity, () =>
      this.ledger.block(identity, reason, durationHours, actor),
    );
    this.logger.info(
      { identity, actor, expiresAt: action.expiresAt },
      "Identity blocked",
    );
    return action;
  }

  async unblock(identity: string, actor = "admin"): Promise<ModerationAction> {
    this.assertOpen();
    const action = await this.mutex.run(identity, () =>
      this.ledger.unblock(identity, actor),
    );
    this.logger.info({ identity, actor }, "Identity unblocked");
    return action;
  }

  getStats(): AggregateStats;
  getStats(identity: string): IdentityStats | null;
  getStats(identity?: string): AggregateStats | IdentityStats | null {
    if (identity === undefined) {
      const totals = this.log.totals();
      return {
        totalUsers: this.sessions.count(),
        totalMessages: totals.total,
        flaggedMessages: totals.flagged,
        blockedUsers: this.sessions.countBlocked(Date.now()),
        flaggedPercentage:
          totals.total > 0 ? (totals.flagged / totals.total) * 100 : 0,
      };
    }

    const session = this.sessions.get(identity);
    if (!session) return null;
    const totals = this.log.totals(identity);
    return {
      identity: session.identity,
      sessionStart: session.sessionStart,
      totalMessages: totals.total,
      flaggedMessages: totals.flagged,
      warningsIssued: session.warningsIssued,
      isBlocked: session.isBlocked,
      blockReason: session.blockReason,
      blockExpires: session.blockExpires,
      lastActivity: session.lastActivity,
      lastUserAgent: session.lastUserAgent,
    };
  }

  /** Log entries from the last `hours`, newest first. */
  getRecentActivity(hours = 24, limit = 100): ActivityEntry[] {
    const since = Date.now() - hours * 3_600_000;
    return this.log.list({ since, limit }).map((entry) => ({
      id: entry.id,
      identity: entry.identity,
      timestamp: entry.timestamp,
      preview: preview(entry.content),
      isFlagged: entry.isFlagged,
      flagReasons: entry.flagReasons,
    }));
  }

  listActions(params: ListActionsParams = {}): ModerationAction[] {
    return this.ledger.listActions(params);
  }

  recordLatency(entryId: number, latencyMs: number): boolean {
    return this.log.setLatency(entryId, latencyMs);
  }

  getConfig(): ModerationConfig {
    return this.settings.getConfig();
  }

  getFilters(): FilterRules {
    return this.settings.getFilters();
  }

  updateConfig(patch: ModerationConfigPatch): Promise<ModerationConfig> {
    return this.settings.updateConfig(patch);
  }

  async updateFilters(patch: FilterRulesPatch): Promise<FilterRules> {
    const rules = await this.settings.updateFilters(patch);
    this.classifier.setRules(this.settings.getFilters());
    return rules;
  }

  async reloadSettings(): Promise<void> {
    await this.settings.load();
    this.classifier.setRules(this.settings.getFilters());
    this.logger.info("Moderation settings reloaded");
  }

  decisionCounts(): Record<DecisionReason, number> {
    return {
      approved: this.counts.get("approved") ?? 0,
      user_blocked: this.counts.get("user_blocked") ?? 0,
      rate_limited: this.counts.get("rate_limited") ?? 0,
      content_flagged: this.counts.get("content_flagged") ?? 0,
      invalid_input: this.counts.get("invalid_input") ?? 0,
      internal_error: this.counts.get("internal_error") ?? 0,
    };
  }

  /** Stops accepting messages and blocks, then waits for in-flight work. */
  async close(): Promise<void> {
    this.closed = true;
    await this.mutex.idle();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Moderation gate is closed");
    }
  }
}

function internalError(): ModerationDecision {
  return {
    allowed: false,
    reason: "internal_error",
    message: "Unable to process your message right now. Please try again later.",
  };
}

function preview(content: string): string {
  const chars = Array.from(content);
  return chars.length > PREVIEW_LENGTH
    ? chars.slice(0, PREVIEW_LENGTH).join("") + "..."
    : content;
}
