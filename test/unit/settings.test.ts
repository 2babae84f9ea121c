import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  DEFAULT_FILTER_RULES,
  DEFAULT_MODERATION_CONFIG,
  ModerationSettings,
} from "../../src/moderation/settings.js";
import { silentLogger } from "../helpers/moderation.js";

describe("ModerationSettings", () => {
  let dir: string;
  let configPath: string;
  let filtersPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "warden-settings-"));
    configPath = join(dir, "moderation-config.json");
    filtersPath = join(dir, "filters.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function readJson(path: string): unknown {
    return JSON.parse(readFileSync(path, "utf-8"));
  }

  it("writes defaults when files are missing", async () => {
    const settings = new ModerationSettings(dir, silentLogger());
    await settings.load();

    expect(settings.getConfig()).toEqual(DEFAULT_MODERATION_CONFIG);
    expect(settings.getFilters()).toEqual(DEFAULT_FILTER_RULES);
    expect(readJson(configPath)).toEqual(DEFAULT_MODERATION_CONFIG);
    expect(readJson(filtersPath)).toEqual(DEFAULT_FILTER_RULES);
  });

  it("applies the seed over defaults for a fresh directory", async () => {
    const settings = new ModerationSettings(dir, silentLogger(), { autoBlockThreshold: 2 });
    await settings.load();
    expect(settings.getConfig().autoBlockThreshold).toBe(2);
    expect(readJson(configPath)).toMatchObject({ autoBlockThreshold: 2 });
  });

  it("merges stored values over defaults and drops unknown keys", async () => {
    writeFileSync(configPath, JSON.stringify({ windowMinutes: 5, extra: true }));
    writeFileSync(filtersPath, JSON.stringify({ words: ["spam"] }));

    const settings = new ModerationSettings(dir, silentLogger());
    await settings.load();

    expect(settings.getConfig()).toEqual({ ...DEFAULT_MODERATION_CONFIG, windowMinutes: 5 });
    expect(settings.getFilters()).toEqual({ words: ["spam"], patterns: [] });
  });

  it("keeps previous values when a file is malformed", async () => {
    const settings = new ModerationSettings(dir, silentLogger());
    await settings.load();
    await settings.updateConfig({ maxMessagesPerWindow: 7 });

    writeFileSync(configPath, "{not json");
    writeFileSync(filtersPath, JSON.stringify({ patterns: ["("] }));
    await settings.load();

    expect(settings.getConfig().maxMessagesPerWindow).toBe(7);
    expect(settings.getFilters()).toEqual(DEFAULT_FILTER_RULES);
  });

  it("keeps previous values when a file holds invalid numbers", async () => {
    writeFileSync(configPath, JSON.stringify({ windowMinutes: -1 }));
    const settings = new ModerationSettings(dir, silentLogger());
    await settings.load();
    expect(settings.getConfig().windowMinutes).toBe(60);
  });

  describe("updateConfig", () => {
    it("persists a partial update", async () => {
      const settings = new ModerationSettings(dir, silentLogger());
      await settings.load();

      const next = await settings.updateConfig({ blockDurationHours: 1.5 });

      expect(next.blockDurationHours).toBe(1.5);
      expect(next.windowMinutes).toBe(60);
      expect(readJson(configPath)).toMatchObject({ blockDurationHours: 1.5 });
    });

    it("rejects invalid values without changing anything", async () => {
      const settings = new ModerationSettings(dir, silentLogger());
      await settings.load();

      await expect(settings.updateConfig({ autoBlockThreshold: 0 })).rejects.toThrow();
      expect(settings.getConfig().autoBlockThreshold).toBe(5);
      expect(readJson(configPath)).toEqual(DEFAULT_MODERATION_CONFIG);
    });
  });

  it("applies overlapping config edits in turn", async () => {
    const settings = new ModerationSettings(dir, silentLogger());
    await settings.load();

    await Promise.all([
      settings.updateConfig({ windowMinutes: 5 }),
      settings.updateConfig({ maxMessagesPerWindow: 7 }),
    ]);

    expect(settings.getConfig()).toMatchObject({ windowMinutes: 5, maxMessagesPerWindow: 7 });
    expect(readJson(configPath)).toMatchObject({ windowMinutes: 5, maxMessagesPerWindow: 7 });
  });

  it("applies overlapping filter edits in turn", async () => {
    const settings = new ModerationSettings(dir, silentLogger());
    await settings.load();

    await Promise.all([
      settings.updateFilters({ words: ["spam"] }),
      settings.updateFilters({ patterns: ["eggs"] }),
    ]);

    expect(settings.getFilters()).toEqual({ words: ["spam"], patterns: ["eggs"] });
    expect(readJson(filtersPath)).toEqual({ words: ["spam"], patterns: ["eggs"] });
  });

  it("hands out filter rules that cannot be mutated", async () => {
    const settings = new ModerationSettings(dir, silentLogger());
    await settings.load();
    expect(Object.isFrozen(settings.getFilters().words)).toBe(true);

    const next = await settings.updateFilters({ words: ["spam"] });
    expect(Object.isFrozen(next.words)).toBe(true);
    expect(Object.isFrozen(next.patterns)).toBe(true);
    expect(DEFAULT_FILTER_RULES.words).toHaveLength(20);
  });

  describe("updateFilters", () => {
    it("replaces only the lists provided", async () => {
      const settings = new ModerationSettings(dir, silentLogger());
      await settings.load();

      const next = await settings.updateFilters({ words: ["spam"] });

      expect(next).toEqual({ words: ["spam"], patterns: DEFAULT_FILTER_RULES.patterns });
      expect(readJson(filtersPath)).toEqual(next);
    });

    it("rejects an invalid pattern", async () => {
      const settings = new ModerationSettings(dir, silentLogger());
      await settings.load();

      await expect(settings.updateFilters({ patterns: ["[unclosed"] })).rejects.toThrow(
        "Invalid regular expression",
      );
      expect(settings.getFilters()).toEqual(DEFAULT_FILTER_RULES);
    });
  });
});
