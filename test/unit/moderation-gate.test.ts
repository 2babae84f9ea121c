import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { ModerationDB } from "../../src/moderation/db.js";
import type { ModerationGate } from "../../src/moderation/gate.js";
import { createTestGate } from "../helpers/moderation.js";

const T0 = new Date("2026-03-01T10:00:00Z").getTime();
const HOUR = 3_600_000;

describe("ModerationGate", () => {
  let dir: string;
  let db: ModerationDB;
  let gate: ModerationGate;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
    dir = mkdtempSync(join(tmpdir(), "warden-gate-"));
    ({ db, gate } = await createTestGate(
      dir,
      {
        maxMessagesPerWindow: 3,
        windowMinutes: 60,
        autoBlockThreshold: 2,
        blockDurationHours: 24,
        maxStoredMessageLength: 10,
        maxUserAgentLength: 5,
      },
      { words: ["hack"], patterns: [] },
    ));
  });

  afterEach(async () => {
    vi.useRealTimers();
    await gate.close();
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("approves a clean message and records it", async () => {
    const decision = await gate.moderate(
      { identity: "10.0.0.1", userAgent: "agent/1" },
      "hello",
    );

    expect(decision).toMatchObject({
      allowed: true,
      reason: "approved",
      message: "Message approved.",
    });
    if (decision.reason !== "approved") return;
    expect(decision.session.messagesSent).toBe(1);
    expect(gate.log.get(decision.entryId)).toMatchObject({
      identity: "10.0.0.1",
      content: "hello",
      isFlagged: false,
      userAgent: "agent",
    });
  });

  it("truncates stored content", async () => {
    const decision = await gate.moderate({ identity: "10.0.0.1" }, "abcdefghijklmno");
    if (decision.reason !== "approved") throw new Error(decision.reason);
    expect(gate.log.get(decision.entryId)?.content).toBe("abcdefghij");
  });

  it("rejects a missing identity or empty message without recording", async () => {
    expect(await gate.moderate({ identity: "  " }, "hello")).toEqual({
      allowed: false,
      reason: "invalid_input",
      message: "Missing client identity.",
    });
    expect(await gate.moderate({ identity: "10.0.0.1" }, "   ")).toEqual({
      allowed: false,
      reason: "invalid_input",
      message: "Message must not be empty.",
    });
    expect(gate.log.totals()).toEqual({ total: 0, flagged: 0 });
    expect(gate.sessions.count()).toBe(0);
  });

  it("rate limits without recording the denied message", async () => {
    for (let i = 0; i < 3; i++) {
      expect((await gate.moderate({ identity: "10.0.0.1" }, `msg ${i}`)).allowed).toBe(true);
    }

    expect(await gate.moderate({ identity: "10.0.0.1" }, "one more")).toEqual({
      allowed: false,
      reason: "rate_limited",
      message: "Rate limit exceeded: 3 messages in last 60 minutes",
      retryAfter: 3600,
    });
    expect(gate.sessions.get("10.0.0.1")?.messagesSent).toBe(3);
    expect(gate.log.totals("10.0.0.1").total).toBe(3);
  });

  it("flags content and auto-blocks at the threshold", async () => {
    const first = await gate.moderate({ identity: "10.0.0.1" }, "try to hack");
    expect(first).toMatchObject({
      allowed: false,
      reason: "content_flagged",
      message:
        "Your message contains inappropriate content. Please keep conversations respectful and on-topic.",
      flags: ["inappropriate_language"],
      autoBlocked: false,
    });

    const second = await gate.moderate({ identity: "10.0.0.1" }, "hack again");
    expect(second).toMatchObject({ reason: "content_flagged", autoBlocked: true });

    expect(gate.listActions({ identity: "10.0.0.1" })).toEqual([
      {
        id: 1,
        identity: "10.0.0.1",
        actionType: "block",
        reason: "Auto-blocked after 2 flagged messages",
        timestamp: T0,
        actor: "system",
        expiresAt: T0 + 24 * HOUR,
      },
    ]);

    expect(await gate.moderate({ identity: "10.0.0.1" }, "hello")).toEqual({
      allowed: false,
      reason: "user_blocked",
      message:
        "Your access has been temporarily restricted: Auto-blocked after 2 flagged messages",
    });
  });

  it("keeps internal reasons out of the response but in the log", async () => {
    const decision = await gate.moderate({ identity: "10.0.0.1" }, "hack");
    if (decision.reason !== "content_flagged") throw new Error(decision.reason);
    expect(decision.flags).toEqual(["inappropriate_language"]);
    expect(gate.log.get(decision.entryId)?.flagReasons).toEqual([
      "inappropriate_language:hack",
    ]);
  });

  it("lets an identity through once its block lapses", async () => {
    await gate.block("10.0.0.1", "spam", 1);
    expect((await gate.moderate({ identity: "10.0.0.1" }, "hello")).reason).toBe(
      "user_blocked",
    );

    vi.setSystemTime(T0 + HOUR + 1);
    expect((await gate.moderate({ identity: "10.0.0.1" }, "hello")).reason).toBe(
      "approved",
    );
    expect(gate.listActions({ identity: "10.0.0.1" }).map((a) => a.actor)).toEqual([
      "admin",
      "auto_expire",
    ]);
  });

  it("unblocks on request", async () => {
    await gate.block("10.0.0.1", "spam");
    await gate.unblock("10.0.0.1", "cli");
    expect((await gate.moderate({ identity: "10.0.0.1" }, "hello")).reason).toBe(
      "approved",
    );
  });

  describe("getStats", () => {
    it("aggregates over all identities", async () => {
      await gate.moderate({ identity: "a" }, "hello");
      await gate.moderate({ identity: "a" }, "hack");
      await gate.moderate({ identity: "b" }, "hello");
      await gate.moderate({ identity: "b" }, "hello");
      await gate.block("c", "spam");

      expect(gate.getStats()).toEqual({
        totalUsers: 3,
        totalMessages: 4,
        flaggedMessages: 1,
        blockedUsers: 1,
        flaggedPercentage: 25,
      });
    });

    it("reports zero percent with no messages", () => {
      expect(gate.getStats().flaggedPercentage).toBe(0);
    });

    it("reports one identity", async () => {
      await gate.moderate({ identity: "a", userAgent: "ua" }, "hello");
      expect(gate.getStats("a")).toEqual({
        identity: "a",
        sessionStart: T0,
        totalMessages: 1,
        flaggedMessages: 0,
        warningsIssued: 0,
        isBlocked: false,
        blockReason: "",
        blockExpires: null,
        lastActivity: T0,
        lastUserAgent: "ua",
      });
      expect(gate.getStats("nobody")).toBeNull();
    });
  });

  it("lists recent activity newest first with previews", async () => {
    await gate.updateConfig({ maxStoredMessageLength: 1000 });
    await gate.moderate({ identity: "a" }, "first");
    vi.setSystemTime(T0 + 1000);
    await gate.moderate({ identity: "a" }, "ab".repeat(60));

    const activity = gate.getRecentActivity(1, 10);
    expect(activity).toHaveLength(2);
    expect(activity[0]?.preview).toBe("ab".repeat(50) + "...");
    expect(activity[1]?.preview).toBe("first");

    vi.setSystemTime(T0 + 2 * HOUR);
    expect(gate.getRecentActivity(1, 10)).toEqual([]);
  });

  it("applies filter updates to later messages", async () => {
    await gate.updateFilters({ words: ["spam"] });
    expect((await gate.moderate({ identity: "a" }, "hack")).reason).toBe("approved");
    expect((await gate.moderate({ identity: "a" }, "spam")).reason).toBe("content_flagged");
  });

  it("records latency against a log entry", async () => {
    const decision = await gate.moderate({ identity: "a" }, "hello");
    if (decision.reason !== "approved") throw new Error(decision.reason);
    expect(gate.recordLatency(decision.entryId, 120)).toBe(true);
    expect(gate.recordLatency(decision.entryId + 100, 120)).toBe(false);
  });

  it("counts decisions by reason", async () => {
    await gate.moderate({ identity: "a" }, "hello");
    await gate.moderate({ identity: "a" }, "hack");
    await gate.moderate({ identity: "" }, "hello");

    expect(gate.decisionCounts()).toEqual({
      approved: 1,
      user_blocked: 0,
      rate_limited: 0,
      content_flagged: 1,
      invalid_input: 1,
      internal_error: 0,
    });
  });

  it("denies with internal_error when the store fails", async () => {
    db.close();
    expect(await gate.moderate({ identity: "a" }, "hello")).toEqual({
      allowed: false,
      reason: "internal_error",
      message: "Unable to process your message right now. Please try again later.",
    });
  });

  it("denies with internal_error once closed", async () => {
    await gate.close();
    expect((await gate.moderate({ identity: "a" }, "hello")).reason).toBe("internal_error");
  });

  it("refuses blocks and unblocks once closed", async () => {
    await gate.close();
    await expect(gate.block("a", "spam")).rejects.toThrow("Moderation gate is closed");
    await expect(gate.unblock("a")).rejects.toThrow("Moderation gate is closed");
    expect(gate.listActions()).toEqual([]);
  });
});
