import { Hono, type Context } from "hono";
import { serve, type HttpBindings } from "@hono/node-server";
import { bearerAuth } from "hono/bearer-auth";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import {
  isValidPattern,
  moderationConfigPatchSchema,
} from "../config/schema.js";
import type { Logger } from "../logging/logger.js";
import type { ModerationGate } from "../moderation/gate.js";
import type { ModerationDecision } from "../moderation/types.js";
import { resolveIdentity } from "./identity.js";

type GatewayEnv = { Bindings: HttpBindings };

const moderateSchema = z.object({
  message: z.string(),
  userAgent: z.string().optional(),
});

const latencySchema = z.object({
  entryId: z.number().int().positive(),
  latencyMs: z.number().min(0),
});

const blockSchema = z.object({
  identity: z.string().trim().min(1),
  reason: z.string().trim().min(1).default("Manual block by admin"),
  durationHours: z.number().min(0).optional(),
});

const unblockSchema = z.object({
  identity: z.string().trim().min(1),
});

const activityQuerySchema = z.object({
  hours: z.coerce.number().positive().default(24),
  limit: z.coerce.number().int().positive().max(1000).default(100),
});

const actionsQuerySchema = z.object({
  identity: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(100),
});

const filtersSchema = z.object({
  words: z.array(z.string()).optional(),
  patterns: z
    .array(z.string().refine(isValidPattern, { message: "Invalid regular expression" }))
    .optional(),
});

export interface GatewayServerDeps {
  gate: ModerationGate;
  logger: Logger;
  port: number;
  hostname: string;
  trustForwardedFor: boolean;
  adminToken?: string;
}

export class GatewayServer {
  readonly app: Hono<GatewayEnv>;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();
  private readonly gate: ModerationGate;
  private readonly logger: Logger;

  constructor(private readonly deps: GatewayServerDeps) {
    this.gate = deps.gate;
    this.logger = deps.logger;
    this.app = new Hono<GatewayEnv>();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.onError((err, c) => {
      if (err instanceof HTTPException) return err.getResponse();
      this.logger.error({ err, path: c.req.path }, "Request failed");
      return c.json({ error: "Internal server error" }, 500);
    });

    if (this.deps.adminToken) {
      this.app.use("/admin/*", bearerAuth({ token: this.deps.adminToken }));
    }

    this.app.get("/health", (c) => {
      const uptime = Date.now() - this.startedAt;
      return c.json({
        status: "ok",
        uptime,
        uptimeHuman: formatUptime(uptime),
        decisions: this.gate.decisionCounts(),
      });
    });

    this.app.get("/metrics", (c) => {
      const stats = this.gate.getStats();
      const lines = [
        `# HELP warden_uptime_seconds Gateway uptime in seconds`,
        `# TYPE warden_uptime_seconds gauge`,
        `warden_uptime_seconds ${Math.round((Date.now() - this.startedAt) / 1000)}`,
        `# HELP warden_decisions_total Moderation decisions since start`,
        `# TYPE warden_decisions_total counter`,
        ...Object.entries(this.gate.decisionCounts()).map(
          ([reason, count]) => `warden_decisions_total{reason="${reason}"} ${count}`,
        ),
        `# HELP warden_identities_total Identities with a session`,
        `# TYPE warden_identities_total gauge`,
        `warden_identities_total ${stats.totalUsers}`,
        `# HELP warden_identities_blocked Identities currently blocked`,
        `# TYPE warden_identities_blocked gauge`,
        `warden_identities_blocked ${stats.blockedUsers}`,
      ];
      c.header("Content-Type", "text/plain; charset=utf-8");
      return c.text(lines.join("\n") + "\n");
    });

    this.app.post("/moderate", async (c) => {
      const parsed = moderateSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const identity = resolveIdentity({
        remoteAddress: c.env?.incoming?.socket.remoteAddress,
        forwardedFor: c.req.header("x-forwarded-for"),
        trustForwardedFor: this.deps.trustForwardedFor,
      });
      const decision = await this.gate.moderate(
        { identity, userAgent: parsed.data.userAgent ?? c.req.header("user-agent") },
        parsed.data.message,
      );
      if (decision.reason === "rate_limited") {
        c.header("Retry-After", String(decision.retryAfter));
      }
      return c.json(decision, statusFor(decision));
    });

    this.app.post("/moderate/latency", async (c) => {
      const parsed = latencySchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const updated = this.gate.recordLatency(parsed.data.entryId, parsed.data.latencyMs);
      if (!updated) {
        return c.json({ error: `Log entry not found: ${parsed.data.entryId}` }, 404);
      }
      return c.json({ ok: true });
    });

    // ── Admin ──

    this.app.get("/admin/stats", (c) => {
      return c.json({
        stats: this.gate.getStats(),
        recentActivity: this.gate.getRecentActivity(24, 50),
      });
    });

    this.app.get("/admin/users/:identity", (c) => {
      const identity = c.req.param("identity");
      const user = this.gate.getStats(identity);
      if (!user) {
        return c.json({ error: `Unknown identity: ${identity}` }, 404);
      }
      return c.json({ user });
    });

    this.app.post("/admin/block", async (c) => {
      const parsed = blockSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const { identity, reason, durationHours } = parsed.data;
      const action = await this.gate.block(identity, reason, durationHours, "admin");
      const span =
        action.expiresAt === null ? "indefinitely" : `for ${durationHours} hours`;
      return c.json({ success: true, message: `${identity} blocked ${span}`, action });
    });

    this.app.post("/admin/unblock", async (c) => {
      const parsed = unblockSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const action = await this.gate.unblock(parsed.data.identity, "admin");
      return c.json({ success: true, message: `${parsed.data.identity} unblocked`, action });
    });

    this.app.get("/admin/activity", (c) => {
      const parsed = activityQuerySchema.safeParse(c.req.query());
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      return c.json({
        activity: this.gate.getRecentActivity(parsed.data.hours, parsed.data.limit),
      });
    });

    this.app.get("/admin/actions", (c) => {
      const parsed = actionsQuerySchema.safeParse(c.req.query());
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      return c.json({ actions: this.gate.listActions(parsed.data) });
    });

    this.app.get("/admin/config", (c) => {
      return c.json({ config: this.gate.getConfig() });
    });

    this.app.post("/admin/config", async (c) => {
      const parsed = moderationConfigPatchSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const config = await this.gate.updateConfig(parsed.data);
      return c.json({ success: true, config });
    });

    this.app.get("/admin/filters", (c) => {
      return c.json(this.gate.getFilters());
    });

    this.app.post("/admin/filters", async (c) => {
      const parsed = filtersSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const filters = await this.gate.updateFilters(parsed.data);
      return c.json({ success: true, filters });
    });

    this.app.post("/admin/reload", async (c) => {
      await this.gate.reloadSettings();
      return c.json({
        success: true,
        config: this.gate.getConfig(),
        filters: this.gate.getFilters(),
      });
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.deps.port,
      hostname: this.deps.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

export function statusFor(decision: ModerationDecision): 200 | 400 | 403 | 429 | 500 {
  switch (decision.reason) {
    case "approved":
      return 200;
    case "invalid_input":
      return 400;
    case "user_blocked":
    case "content_flagged":
      return 403;
    case "rate_limited":
      return 429;
    case "internal_error":
      return 500;
  }
}

async function readJson(c: Context<GatewayEnv>): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    // Malformed bodies fall through to schema validation as undefined
    return undefined;
  }
}

function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
