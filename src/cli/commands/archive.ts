import { Command, Option } from "clipanion";
import { formatTime, type OpenedStores } from "../stores.js";
import { StoreCommand } from "../store-command.js";

export class ArchiveListCommand extends StoreCommand {
  static override paths = [["archive", "list"]];

  static override usage = Command.Usage({
    description: "List finalized sessions, most recently completed first",
    examples: [
      ["List archived sessions", "decoy archive list"],
      ["Page through the archive", "decoy archive list --limit 20 --offset 40"],
    ],
  });

  limit = Option.String("--limit", "50", { description: "Maximum entries to show" });
  offset = Option.String("--offset", "0", { description: "Entries to skip" });
  scamsOnly = Option.Boolean("--scams", false, { description: "Only confirmed scams" });

  protected readonly exclusive = false;

  protected async run({ archive }: OpenedStores): Promise<void> {
    const entries = archive
      .list(Number(this.limit) || 50, Number(this.offset) || 0)
      .filter((e) => !this.scamsOnly || e.isScam);

    if (entries.length === 0) {
      this.context.stdout.write("No archived sessions.\n");
      return;
    }

    this.context.stdout.write(`Archived sessions (${entries.length} of ${archive.count()}):\n`);
    for (const e of entries) {
      this.context.stdout.write(
        `  ${e.sessionId} [${e.isScam ? "SCAM" : "benign"}] ` +
          `${e.totalMessages} messages, ${e.scamFlagsCount} flags, completed ${formatTime(e.completedAt)}\n`,
      );
    }
  }
}
