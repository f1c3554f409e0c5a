import { Command, Option } from "clipanion";
import { encodeDecision } from "../../engine/codec.js";
import { formatDecision } from "../../engine/tradeoff/engine.js";
import { DEFAULT_USER, errorMessage, loadTasks, openSession, parseStateOptions, type Session } from "../shared.js";

export class DecideCommand extends Command {
  static override paths = [["decide"]];

  static override usage = Command.Usage({
    description: "Run one decision cycle for today's state and planned tasks",
    examples: [
      ["Decide with the sample plan", "tradeoff decide --sleep 5.5 --energy 4 --stress HIGH --time 1.5"],
      ["Decide with a task file", "tradeoff decide --sleep 7 --energy 7 --stress LOW --time 2 --tasks ./plan.json"],
    ],
  });

  user = Option.String("--user", DEFAULT_USER, { description: "User id" });
  sleep = Option.String("--sleep", { required: true, description: "Hours slept last night" });
  energy = Option.String("--energy", { required: true, description: "Energy level 1-10" });
  stress = Option.String("--stress", { required: true, description: "LOW, MEDIUM or HIGH" });
  time = Option.String("--time", { required: true, description: "Hours available today" });
  sleepDebt = Option.String("--sleep-debt", { description: "Accumulated sleep debt in hours" });
  effortDays = Option.String("--effort-days", { description: "Consecutive high-effort days" });
  tasks = Option.String("--tasks", { description: "JSON file with planned tasks" });
  json = Option.Boolean("--json", false, { description: "Print the decision as JSON" });
  explain = Option.Boolean("--explain", false, { description: "Add a narrative explanation" });

  async execute(): Promise<number> {
    let session: Session | undefined;
    try {
      const state = parseStateOptions({
        sleep: this.sleep,
        energy: this.energy,
        stress: this.stress,
        time: this.time,
        sleepDebt: this.sleepDebt,
        effortDays: this.effortDays,
      });
      const tasks = loadTasks(this.tasks);
      session = openSession();

      const decision = await session.pipeline.runCycle(this.user, state, tasks);

      if (this.json) {
        this.context.stdout.write(encodeDecision(decision) + "\n");
      } else {
        this.context.stdout.write(formatDecision(decision) + "\n");
      }

      if (this.explain) {
        const explanation = await session.pipeline.explain(decision);
        this.context.stdout.write(
          `\n${explanation.explanation}\n${explanation.temporalAnalysis}\n${explanation.contextAssessment}\n`,
        );
      }
      return 0;
    } catch (err) {
      this.context.stdout.write(`Decision failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      session?.close();
    }
  }
}
