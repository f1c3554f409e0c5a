import { Command, Option } from "clipanion";
import { z } from "zod";
import { exportHistory } from "../../store/export.js";
import { DEFAULT_USER, errorMessage, openSession, type Session } from "../shared.js";

export class HistoryListCommand extends Command {
  static override paths = [["history", "list"]];

  static override usage = Command.Usage({
    description: "List stored decisions, newest last",
    examples: [["Last five decisions", "tradeoff history list --limit 5"]],
  });

  user = Option.String("--user", DEFAULT_USER, { description: "User id" });
  limit = Option.String("--limit", { description: "Show only the newest N decisions" });

  async execute(): Promise<number> {
    let session: Session | undefined;
    try {
      const limit = this.limit === undefined ? undefined : z.coerce.number().int().positive().parse(this.limit);
      session = openSession();
      const history = session.repository.getHistory(this.user);

      if (history.length === 0) {
        this.context.stdout.write(`No decisions stored for ${this.user}.\n`);
        return 0;
      }

      const shown = limit === undefined ? history : history.slice(-limit);
      this.context.stdout.write(`Decisions for ${this.user} (${shown.length} of ${history.length}):\n`);
      for (const decision of shown) {
        const when = new Date(decision.timestamp).toISOString();
        this.context.stdout.write(`  ${when}  ${decision.id}  ${decision.reasoningSummary}\n`);
      }
      return 0;
    } catch (err) {
      this.context.stdout.write(`History failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      session?.close();
    }
  }
}

export class HistoryClearCommand extends Command {
  static override paths = [["history", "clear"]];

  static override usage = Command.Usage({
    description: "Delete a user's decisions and adaptation records",
    examples: [["Clear history", "tradeoff history clear --user alice"]],
  });

  user = Option.String("--user", DEFAULT_USER, { description: "User id" });

  async execute(): Promise<number> {
    let session: Session | undefined;
    try {
      session = openSession();
      const count = session.repository.getHistory(this.user).length;
      session.repository.clearHistory(this.user);
      this.context.stdout.write(`Cleared ${count} decisions for ${this.user}.\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`History failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      session?.close();
    }
  }
}

export class HistoryExportCommand extends Command {
  static override paths = [["history", "export"]];

  static override usage = Command.Usage({
    description: "Write a user's history, profile and adaptations to a JSON file",
    examples: [["Export", "tradeoff history export ./alice.json --user alice"]],
  });

  path = Option.String({ name: "path", required: true });
  user = Option.String("--user", DEFAULT_USER, { description: "User id" });

  async execute(): Promise<number> {
    let session: Session | undefined;
    try {
      session = openSession();
      const exported = await exportHistory(this.path, session.repository, this.user);
      this.context.stdout.write(`Exported ${exported.decisions.length} decisions to ${this.path}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Export failed: ${errorMessage(err)}\n`);
      return 1;
    } finally {
      session?.close();
    }
  }
}
