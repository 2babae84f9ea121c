import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { isNotFound, loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import type { WardenConfig } from "../../config/types.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (admin token redacted)",
    examples: [["Show config", "warden config show"]],
  });

  async execute(): Promise<number> {
    let config: WardenConfig;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    const redacted = {
      ...config,
      admin: config.admin.token ? { token: "***REDACTED***" } : {},
    };
    this.context.stdout.write(JSON.stringify(redacted, null, 2) + "\n");
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "warden config validate"],
      ["Validate specific file", "warden config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const substituted = substituteEnv(content);
      const raw = JSON.parse(substituted) as unknown;
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
  }
}
