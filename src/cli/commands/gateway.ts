import { Command, Option } from "clipanion";
import { createRequire } from "node:module";
const require = createRequire(import.meta.url);
const pkg = require("../../../package.json") as { version: string };
import { startGateway } from "../../gateway/lifecycle.js";
import { printBanner } from "../banner.js";

export class GatewayRunCommand extends Command {
  static override paths = [["gateway", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the Warden moderation gateway",
    examples: [
      ["Start with default config", "warden gateway run"],
      ["Start with custom config", "warden gateway run --config ./warden.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    printBanner(pkg.version);

    try {
      await startGateway(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start gateway: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
    // The HTTP server keeps the process alive until a shutdown signal
    return 0;
  }
}
