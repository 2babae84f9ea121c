import { loadConfig } from "../config/loader.js";
import { getStateDir, ensureDir } from "../config/paths.js";
import type { WardenConfig } from "../config/types.js";
import { createLogger, componentLogger, type Logger } from "../logging/logger.js";
import { ModerationDB } from "../moderation/db.js";
import { ModerationGate } from "../moderation/gate.js";
import { ModerationSettings } from "../moderation/settings.js";
import { GatewayServer } from "./server.js";

export interface GatewayContext {
  config: WardenConfig;
  logger: Logger;
  db: ModerationDB;
  settings: ModerationSettings;
  gate: ModerationGate;
  server: GatewayServer;
  shutdown: () => Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startGateway(
  configPath?: string,
): Promise<GatewayContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting Warden gateway...");

  // 3. Ensure state directory
  const stateDir = ensureDir(getStateDir());

  // 4. Open the record store
  const db = new ModerationDB(stateDir);

  // 5. Load runtime settings (config file values only seed a fresh state dir)
  const settings = new ModerationSettings(
    stateDir,
    componentLogger(logger, "settings"),
    config.moderation,
  );
  await settings.load();

  // 6. Build the gate
  const gate = new ModerationGate({
    db,
    settings,
    logger: componentLogger(logger, "moderation"),
  });

  // 7. Start HTTP server
  if (!config.admin.token) {
    logger.warn("admin.token is not set, admin routes are unauthenticated");
  }
  const server = new GatewayServer({
    gate,
    logger: componentLogger(logger, "http"),
    port: config.gateway.port,
    hostname: config.gateway.hostname,
    trustForwardedFor: config.gateway.trustForwardedFor,
    adminToken: config.admin.token,
  });
  await server.start();
  logger.info(
    { port: config.gateway.port, hostname: config.gateway.hostname },
    "HTTP server started",
  );

  // 8. Graceful shutdown
  let shutdownInProgress = false;

  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await server.stop();
    await gate.close();
    db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };

  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);
  process.on("SIGHUP", () => {
    gate.reloadSettings().catch((err) => {
      logger.error({ err }, "Settings reload failed");
    });
  });

  logger.info("Warden gateway started");
  return { config, logger, db, settings, gate, server, shutdown };
}
