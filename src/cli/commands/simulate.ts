import { Command, Option } from "clipanion";
import { z } from "zod";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import { SCENARIOS, isScenarioId, simulateWeek, categoriesWithAction } from "../../simulation/simulator.js";
import { errorMessage } from "../shared.js";

export class SimulateCommand extends Command {
  static override paths = [["simulate"]];

  static override usage = Command.Usage({
    description: "Simulate a week of decisions over synthetic wearable data",
    details: `Scenarios: ${Object.keys(SCENARIOS).join(", ")}.`,
    examples: [
      ["Default scenario", "tradeoff simulate"],
      ["Gradual burnout with a fixed seed", "tradeoff simulate --scenario gradual_burnout --seed 7"],
    ],
  });

  scenario = Option.String("--scenario", "burnout_recovery", { description: "Scenario id" });
  days = Option.String("--days", "7", { description: "Days to simulate" });
  seed = Option.String("--seed", "42", { description: "Random seed" });
  json = Option.Boolean("--json", false, { description: "Print the summary as JSON" });

  async execute(): Promise<number> {
    try {
      if (!isScenarioId(this.scenario)) {
        this.context.stdout.write(
          `Unknown scenario: ${this.scenario} (expected one of ${Object.keys(SCENARIOS).join(", ")})\n`,
        );
        return 1;
      }
      const days = z.coerce.number().int().min(1).max(60).parse(this.days);
      const seed = z.coerce.number().int().parse(this.seed);
      const config = loadConfig();

      const result = await simulateWeek({
        scenario: this.scenario,
        days,
        seed,
        config,
        logger: createLogger(config.logging, 2),
      });

      if (this.json) {
        this.context.stdout.write(JSON.stringify(result.summary, null, 2) + "\n");
        return 0;
      }

      this.context.stdout.write(`Scenario: ${result.summary.scenario}\n`);
      for (const day of result.days) {
        const prioritized = categoriesWithAction(day, "PRIORITIZE").join(", ") || "-";
        const skipped = categoriesWithAction(day, "SKIP").join(", ") || "-";
        this.context.stdout.write(
          `  Day ${day.day}: sleep ${day.metrics.sleepHours.toFixed(1)}h, ` +
            `${day.decision.constraintsActive.length} constraints, prioritized ${prioritized}, skipped ${skipped}\n`,
        );
      }
      this.context.stdout.write(
        `Average sleep: ${result.summary.averageSleep}h, burnout days: ${result.summary.burnoutDays}, ` +
          `adaptations: ${result.summary.adaptationEvents}\n`,
      );
      return 0;
    } catch (err) {
      this.context.stdout.write(`Simulation failed: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
