import { readFile, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import type { z } from "zod";
import {
  filterRulesSchema,
  moderationConfigFileSchema,
  moderationConfigPatchSchema,
} from "../config/schema.js";
import { isNotFound } from "../config/loader.js";
import type { Logger } from "../logging/logger.js";
import { withFileLock } from "../utils/file-lock.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import type { FilterRules, ModerationConfig } from "./types.js";

export type ModerationConfigPatch = z.infer<typeof moderationConfigPatchSchema>;

export interface FilterRulesPatch {
  words?: readonly string[];
  patterns?: readonly string[];
}

export const DEFAULT_MODERATION_CONFIG: ModerationConfig = {
  maxMessagesPerWindow: 60,
  windowMinutes: 60,
  autoBlockThreshold: 5,
  blockDurationHours: 24,
  warningThreshold: 2,
  maxStoredMessageLength: 1000,
  maxUserAgentLength: 500,
};

export const DEFAULT_FILTER_RULES: FilterRules = freezeRules({
  words: [
    "fuck", "shit", "damn", "bitch", "asshole", "bastard",
    "hate", "stupid", "idiot", "retard", "kill yourself",
    "buy now", "click here", "free money", "viagra",
    "hack", "break", "destroy", "damage", "illegal",
  ],
  patterns: [
    "\\b(fuck|shit|damn)\\w*\\b",
    "\\b(kill\\s+yourself)\\b",
    "\\b(hack\\s+into)\\b",
    "(.)\\1{4,}",
  ],
});

/**
 * Runtime-editable moderation settings backed by two JSON files in the
 * state directory. A file that fails to load leaves the last good values
 * in place.
 */
export class ModerationSettings {
  private config: ModerationConfig;
  private filters: FilterRules = DEFAULT_FILTER_RULES;
  private readonly configPath: string;
  private readonly filtersPath: string;
  // Keyed by file path: each read-merge-write of a settings file runs alone
  private readonly mutex = new KeyedMutex();

  constructor(
    stateDir: string,
    private readonly logger: Logger,
    seed: Partial<ModerationConfig> = {},
  ) {
    mkdirSync(stateDir, { recursive: true });
    this.configPath = join(stateDir, "moderation-config.json");
    this.filtersPath = join(stateDir, "filters.json");
    this.config = { ...DEFAULT_MODERATION_CONFIG, ...seed };
  }

  getConfig(): ModerationConfig {
    return this.config;
  }

  getFilters(): FilterRules {
    return this.filters;
  }

  /** Reads both files, writing the current values for any that are missing. */
  async load(): Promise<void> {
    await this.mutex.run(this.configPath, async () => {
      const config = await this.readSettings(this.configPath, (raw) => ({
        ...this.config,
        ...moderationConfigFileSchema.parse(raw),
      }));
      if (config === "missing") {
        await this.persist(this.configPath, this.config);
      } else if (config) {
        this.config = config;
      }
    });

    await this.mutex.run(this.filtersPath, async () => {
      const filters = await this.readSettings(this.filtersPath, (raw) =>
        freezeRules(filterRulesSchema.parse(raw)),
      );
      if (filters === "missing") {
        await this.persist(this.filtersPath, this.filters);
      } else if (filters) {
        this.filters = filters;
      }
    });
  }

  /** Merges against the latest values, so overlapping edits both apply. */
  updateConfig(patch: ModerationConfigPatch): Promise<ModerationConfig> {
    return this.mutex.run(this.configPath, async () => {
      const next = { ...this.config, ...moderationConfigPatchSchema.parse(patch) };
      await this.persist(this.configPath, next);
      this.config = next;
      this.logger.info({ patch }, "Moderation config updated");
      return next;
    });
  }

  updateFilters(patch: FilterRulesPatch): Promise<FilterRules> {
    return this.mutex.run(this.filtersPath, async () => {
      const next = freezeRules(
        filterRulesSchema.parse({
          words: patch.words ?? this.filters.words,
          patterns: patch.patterns ?? this.filters.patterns,
        }),
      );
      await this.persist(this.filtersPath, next);
      this.filters = next;
      this.logger.info(
        { words: next.words.length, patterns: next.patterns.length },
        "Filter rules updated",
      );
      return next;
    });
  }

  private async readSettings<T>(
    path: string,
    parse: (raw: unknown) => T,
  ): Promise<T | "missing" | null> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return "missing";
      this.logger.error({ err, path }, "Failed to read settings, keeping previous values");
      return null;
    }

    try {
      return parse(JSON.parse(content));
    } catch (err) {
      this.logger.error({ err, path }, "Invalid settings file, keeping previous values");
      return null;
    }
  }

  private async persist(path: string, value: unknown): Promise<void> {
    await withFileLock(path, () =>
      writeFile(path, JSON.stringify(value, null, 2) + "\n"),
    );
  }
}

function freezeRules(rules: FilterRules): FilterRules {
  return {
    words: Object.freeze([...rules.words]),
    patterns: Object.freeze([...rules.patterns]),
  };
}
