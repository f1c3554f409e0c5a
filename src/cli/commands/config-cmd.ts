import { Command, Option } from "clipanion";
import { loadConfig, readConfig } from "../../config/loader.js";
import { resolvePaths } from "../../config/paths.js";
import { errorMessage } from "../shared.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration with defaults applied",
    examples: [["Show config", "tradeoff config show"]],
  });

  async execute(): Promise<number> {
    try {
      const config = loadConfig();
      this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
      return 0;
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "tradeoff config validate"],
      ["Validate specific file", "tradeoff config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? resolvePaths().configPath;

    try {
      if (readConfig(configPath) === undefined) {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
