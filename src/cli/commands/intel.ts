import { Command } from "clipanion";
import { formatTime, type OpenedStores } from "../stores.js";
import { StoreCommand } from "../store-command.js";

export class IntelPendingCommand extends StoreCommand {
  static override paths = [["intel", "pending"]];

  static override usage = Command.Usage({
    description: "List scam records not yet reported to the external evaluator",
    examples: [["List pending reports", "decoy intel pending"]],
  });

  protected readonly exclusive = false;

  protected async run({ intel }: OpenedStores): Promise<void> {
    const pending = intel.listPending();
    if (pending.length === 0) {
      this.context.stdout.write("No pending reports.\n");
      return;
    }

    this.context.stdout.write(`Pending reports (${pending.length}):\n`);
    for (const sessionId of pending) {
      const record = intel.get(sessionId);
      if (!record) continue;
      this.context.stdout.write(
        `  ${sessionId}: ${record.totalMessagesExchanged} messages, captured ${formatTime(record.createdAt)}\n`,
      );
    }
  }
}

export class IntelPushCommand extends StoreCommand {
  static override paths = [["intel", "push"]];

  static override usage = Command.Usage({
    description: "Push every pending scam record to the external evaluator",
    examples: [["Push pending reports", "decoy intel push"]],
  });

  protected readonly exclusive = true;

  protected async run({ engine }: OpenedStores): Promise<void> {
    const stats = await engine.pushPending();
    if (!stats.enabled) {
      this.context.stdout.write("Reporter is disabled (set reporter.enabled in the config).\n");
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(
      `Pushed ${stats.success} of ${stats.total} pending report(s), ${stats.failed} failed\n`,
    );
    if (stats.failed > 0) process.exitCode = 1;
  }
}
