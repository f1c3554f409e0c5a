import { Command, Option } from "clipanion";
import { DEFAULT_USER, errorMessage, openSession, parseStateOptions, type Session } from "../shared.js";

export class CouncilCommand extends Command {
  static override paths = [["council"]];

  static override usage = Command.Usage({
    description: "Ask the health council whether to proceed with an activity",
    examples: [["Consult on a workout", 'tradeoff council "HIIT Workout" --sleep 5.5 --energy 6 --stress MEDIUM']],
  });

  activity = Option.String({ name: "activity", required: true });
  user = Option.String("--user", DEFAULT_USER, { description: "User id" });
  sleep = Option.String("--sleep", { required: true, description: "Hours slept last night" });
  energy = Option.String("--energy", { required: true, description: "Energy level 1-10" });
  stress = Option.String("--stress", { required: true, description: "LOW, MEDIUM or HIGH" });
  time = Option.String("--time", "2", { description: "Hours available today" });

  async execute(): Promise<number> {
    let session: Session | undefined;
    try {
      const state = parseStateOptions({
        sleep: this.sleep,
        energy: this.energy,
        stress: this.stress,
        time: this.time,
      });
      session = openSession();
      const consensus = await session.pipeline.consult(this.user, state, this.activity);

      this.context.stdout.write(consensus.reasoningSummary + "\n");
      if (consensus.dissentingOpinions.length > 0) {
        this.context.stdout.write("Dissent:\n");
        for (const opinion of consensus.dissentingOpinions) {
          this.context.stdout.write(`  - ${opinion}\n`);
        }
      }
      return 0;
    } catch (err) {
      this.context.stdout.write(`Council failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      session?.close();
    }
  }
}
