import { Command, Option } from "clipanion";
import { DEFAULT_USER, errorMessage, openSession, type Session } from "../shared.js";

export class BurnoutCommand extends Command {
  static override paths = [["burnout"]];

  static override usage = Command.Usage({
    description: "Forecast burnout risk from stored history",
    examples: [["Forecast", "tradeoff burnout --user alice"]],
  });

  user = Option.String("--user", DEFAULT_USER, { description: "User id" });

  async execute(): Promise<number> {
    let session: Session | undefined;
    try {
      session = openSession();
      const forecast = await session.pipeline.forecast(this.user);

      const crisis = forecast.daysToCrisis === null ? "n/a" : `${forecast.daysToCrisis} days`;
      this.context.stdout.write(
        `Burnout risk: ${forecast.riskScore}/100 (${forecast.severity})\n` +
          `Days to crisis: ${crisis}\n` +
          `Factors: ${forecast.primaryFactors.join(", ")}\n` +
          `Intervention needed: ${forecast.interventionNeeded ? "yes" : "no"}\n`,
      );
      return 0;
    } catch (err) {
      this.context.stdout.write(`Forecast failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      session?.close();
    }
  }
}
