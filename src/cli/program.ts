import { Cli } from "clipanion";
import { DecideCommand } from "./commands/decide.js";
import { CouncilCommand } from "./commands/council.js";
import { BurnoutCommand } from "./commands/burnout.js";
import { ReportCommand } from "./commands/report.js";
import {
  HistoryClearCommand,
  HistoryExportCommand,
  HistoryListCommand,
} from "./commands/history.js";
import { SimulateCommand } from "./commands/simulate.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Trade-off Engine",
    binaryName: "tradeoff",
    binaryVersion: "0.1.0",
  });

  // Daily cycle
  cli.register(DecideCommand);
  cli.register(CouncilCommand);

  // Review
  cli.register(BurnoutCommand);
  cli.register(ReportCommand);

  // History
  cli.register(HistoryListCommand);
  cli.register(HistoryClearCommand);
  cli.register(HistoryExportCommand);

  cli.register(SimulateCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
