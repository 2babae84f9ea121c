import { z } from "zod";
import type { WardenConfig } from "./types.js";

const gatewaySchema = z.object({
  port: z.number().int().positive().default(8787),
  hostname: z.string().default("127.0.0.1"),
  trustForwardedFor: z.boolean().default(true),
});

const adminSchema = z.object({
  token: z.string().min(1).optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const moderationFields = {
  maxMessagesPerWindow: z.number().int().positive(),
  windowMinutes: z.number().int().positive(),
  autoBlockThreshold: z.number().int().positive(),
  blockDurationHours: z.number().min(0),
  warningThreshold: z.number().int().positive(),
  maxStoredMessageLength: z.number().int().positive(),
  maxUserAgentLength: z.number().int().positive(),
};

/** Stored settings: missing keys fall back to defaults, unknown keys are dropped. */
export const moderationConfigFileSchema = z.object(moderationFields).partial();

/** Admin edits: every field optional, unknown keys rejected. */
export const moderationConfigPatchSchema = z
  .object(moderationFields)
  .partial()
  .strict();

export function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, "i");
    return true;
  } catch {
    return false;
  }
}

export const filterRulesSchema = z.object({
  words: z.array(z.string()).default([]),
  patterns: z
    .array(
      z.string().refine(isValidPattern, {
        message: "Invalid regular expression",
      }),
    )
    .default([]),
});

export const wardenConfigSchema = z.object({
  gateway: gatewaySchema.default({}),
  admin: adminSchema.default({}),
  logging: loggingSchema.default({}),
  moderation: moderationConfigPatchSchema.optional(),
});

export function parseConfig(raw: unknown): WardenConfig {
  return wardenConfigSchema.parse(raw);
}
