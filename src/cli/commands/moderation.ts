import { Command, Option } from "clipanion";
import * as t from "typanion";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getStateDir } from "../../config/paths.js";
import { createCliLogger } from "../../logging/logger.js";
import { ModerationDB } from "../../moderation/db.js";
import { ModerationGate } from "../../moderation/gate.js";
import { ModerationSettings } from "../../moderation/settings.js";
import type { AggregateStats, IdentityStats } from "../../moderation/types.js";

const CLI_ACTOR = "cli";

/** Opens the state directory's store for one command and closes it after. */
async function withGate<T>(fn: (gate: ModerationGate) => T | Promise<T>): Promise<T> {
  const config = loadConfig();
  const stateDir = ensureDir(getStateDir());
  const db = new ModerationDB(stateDir);
  const logger = createCliLogger();
  try {
    const settings = new ModerationSettings(stateDir, logger, config.moderation);
    await settings.load();
    const gate = new ModerationGate({ db, settings, logger });
    try {
      return await fn(gate);
    } finally {
      await gate.close();
    }
  } finally {
    db.close();
  }
}

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function formatAggregate(stats: AggregateStats): string {
  return (
    `Identities:  ${stats.totalUsers}\n` +
    `Messages:    ${stats.totalMessages}\n` +
    `Flagged:     ${stats.flaggedMessages} (${stats.flaggedPercentage.toFixed(1)}%)\n` +
    `Blocked:     ${stats.blockedUsers}\n`
  );
}

function formatIdentity(stats: IdentityStats): string {
  let blocked = "no";
  if (stats.isBlocked) {
    const until =
      stats.blockExpires === null ? "indefinitely" : `until ${iso(stats.blockExpires)}`;
    blocked = `yes, ${until} (${stats.blockReason})`;
  }
  return (
    `Identity:       ${stats.identity}\n` +
    `Session start:  ${iso(stats.sessionStart)}\n` +
    `Messages:       ${stats.totalMessages}\n` +
    `Flagged:        ${stats.flaggedMessages}\n` +
    `Blocked:        ${blocked}\n` +
    `Last activity:  ${iso(stats.lastActivity)}\n` +
    `User agent:     ${stats.lastUserAgent || "-"}\n`
  );
}

export class ModerationStatsCommand extends Command {
  static override paths = [["moderation", "stats"]];

  static override usage = Command.Usage({
    description: "Show moderation statistics, overall or for one identity",
    examples: [
      ["Overall statistics", "warden moderation stats"],
      ["One identity", "warden moderation stats 203.0.113.7"],
    ],
  });

  identity = Option.String({ name: "identity", required: false });

  async execute(): Promise<number> {
    return withGate((gate) => {
      if (this.identity === undefined) {
        this.context.stdout.write(formatAggregate(gate.getStats()));
        return 0;
      }
      const stats = gate.getStats(this.identity);
      if (!stats) {
        this.context.stdout.write(`No session for identity: ${this.identity}\n`);
        return 1;
      }
      this.context.stdout.write(formatIdentity(stats));
      return 0;
    });
  }
}

export class ModerationBlockCommand extends Command {
  static override paths = [["moderation", "block"]];

  static override usage = Command.Usage({
    description: "Block an identity",
    examples: [
      ["Block for a day", "warden moderation block 203.0.113.7 --hours 24"],
      ["Block until unblocked", "warden moderation block 203.0.113.7 --reason spam"],
    ],
  });

  identity = Option.String({ name: "identity", required: true });

  reason = Option.String("--reason,-r", {
    description: "Reason recorded with the block",
    required: false,
  });

  hours = Option.String("--hours", {
    description: "Block duration in hours (omit for indefinite)",
    required: false,
    validator: t.isNumber(),
  });

  async execute(): Promise<number> {
    const reason = this.reason ?? "Manual block via CLI";
    const action = await withGate((gate) =>
      gate.block(this.identity, reason, this.hours, CLI_ACTOR),
    );
    const until =
      action.expiresAt === null ? "indefinitely" : `until ${iso(action.expiresAt)}`;
    this.context.stdout.write(`Blocked ${this.identity} ${until}\n`);
    return 0;
  }
}

export class ModerationUnblockCommand extends Command {
  static override paths = [["moderation", "unblock"]];

  static override usage = Command.Usage({
    description: "Lift a block on an identity",
    examples: [["Unblock", "warden moderation unblock 203.0.113.7"]],
  });

  identity = Option.String({ name: "identity", required: true });

  async execute(): Promise<number> {
    await withGate((gate) => gate.unblock(this.identity, CLI_ACTOR));
    this.context.stdout.write(`Unblocked ${this.identity}\n`);
    return 0;
  }
}

export class ModerationActivityCommand extends Command {
  static override paths = [["moderation", "activity"]];

  static override usage = Command.Usage({
    description: "List recent messages, newest first",
    examples: [
      ["Last 24 hours", "warden moderation activity"],
      ["Last hour, at most 10 entries", "warden moderation activity --hours 1 --limit 10"],
    ],
  });

  hours = Option.String("--hours", {
    description: "Look-back window in hours (default 24)",
    required: false,
    validator: t.isNumber(),
  });

  limit = Option.String("--limit", {
    description: "Maximum entries (default 20)",
    required: false,
    validator: t.isNumber(),
  });

  async execute(): Promise<number> {
    const entries = await withGate((gate) =>
      gate.getRecentActivity(this.hours ?? 24, this.limit ?? 20),
    );

    if (entries.length === 0) {
      this.context.stdout.write("No recent activity.\n");
      return 0;
    }

    this.context.stdout.write(`Recent activity (${entries.length}):\n`);
    for (const entry of entries) {
      const status = entry.isFlagged ? "FLAGGED" : "ok";
      this.context.stdout.write(
        `  ${iso(entry.timestamp)}  ${entry.identity}  ${status}\n` +
          `    ${entry.preview}\n`,
      );
      if (entry.flagReasons.length > 0) {
        this.context.stdout.write(`    reasons: ${entry.flagReasons.join(", ")}\n`);
      }
    }
    return 0;
  }
}
