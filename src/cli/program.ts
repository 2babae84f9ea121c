import { Cli } from "clipanion";
import { GatewayRunCommand } from "./commands/gateway.js";
import {
  ModerationActivityCommand,
  ModerationBlockCommand,
  ModerationStatsCommand,
  ModerationUnblockCommand,
} from "./commands/moderation.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Warden",
    binaryName: "warden",
    binaryVersion: "0.1.0",
  });

  cli.register(GatewayRunCommand);

  // Moderation commands
  cli.register(ModerationStatsCommand);
  cli.register(ModerationBlockCommand);
  cli.register(ModerationUnblockCommand);
  cli.register(ModerationActivityCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
