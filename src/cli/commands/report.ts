import { Command, Option } from "clipanion";
import { CATEGORIES } from "../../engine/types.js";
import { DEFAULT_USER, errorMessage, openSession, type Session } from "../shared.js";

export class ReportCommand extends Command {
  static override paths = [["report"]];

  static override usage = Command.Usage({
    description: "Show the weekly adherence report",
    examples: [["Weekly report", "tradeoff report --user alice"]],
  });

  user = Option.String("--user", DEFAULT_USER, { description: "User id" });
  insight = Option.Boolean("--insight", false, { description: "Add a narrative weekly insight" });

  async execute(): Promise<number> {
    let session: Session | undefined;
    try {
      session = openSession();
      const report = session.pipeline.weeklyReport(this.user);

      if (report.status === "insufficient_data") {
        this.context.stdout.write("Not enough history for a weekly report.\n");
        return 0;
      }

      this.context.stdout.write(`Weekly report (${report.totalDecisions} decisions)\n`);
      for (const category of CATEGORIES) {
        const rates = report.categories[category];
        this.context.stdout.write(`  ${category}: ${rates.skipRate}% skipped, ${rates.downgradeRate}% downgraded\n`);
      }
      for (const recommendation of report.recommendations) {
        this.context.stdout.write(`  * ${recommendation}\n`);
      }

      if (this.insight) {
        this.context.stdout.write(`\n${await session.pipeline.weeklyInsight(this.user)}\n`);
      }
      return 0;
    } catch (err) {
      this.context.stdout.write(`Report failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      session?.close();
    }
  }
}
