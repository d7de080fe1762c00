import { Command, Option } from "clipanion";
import { formatTime, type OpenedStores } from "../stores.js";
import { StoreCommand } from "../store-command.js";

export class SessionListCommand extends StoreCommand {
  static override paths = [["session", "list"]];

  static override usage = Command.Usage({
    description: "List in-progress sessions, most recently active first",
    examples: [
      ["List sessions", "decoy session list"],
      ["List the 10 most recent", "decoy session list --limit 10"],
    ],
  });

  limit = Option.String("--limit", "50", { description: "Maximum sessions to show" });

  protected readonly exclusive = false;

  protected async run({ active }: OpenedStores): Promise<void> {
    const sessions = active.listSessions(Number(this.limit) || 50);

    if (sessions.length === 0) {
      this.context.stdout.write("No active sessions.\n");
      return;
    }

    this.context.stdout.write(`Active sessions (${sessions.length}):\n`);
    for (const s of sessions) {
      const flag = s.isConfirmedScam ? "SCAM" : "open";
      this.context.stdout.write(
        `  ${s.sessionId} [${flag}]\n` +
          `    flags: ${s.scamFlags}  channel: ${s.channel}/${s.language}/${s.locale}\n` +
          `    last active: ${formatTime(s.updatedAt)}\n`,
      );
    }
  }
}

export class SessionShowCommand extends StoreCommand {
  static override paths = [["session", "show"]];

  static override usage = Command.Usage({
    description: "Show the messages and evidence of one active session",
    examples: [["Show a session", "decoy session show session_1700000000000"]],
  });

  sessionId = Option.String({ name: "sessionId", required: true });

  protected readonly exclusive = false;

  protected async run({ active }: OpenedStores): Promise<void> {
    const session = active.getFullSession(this.sessionId);
    if (!session) {
      this.context.stdout.write(`Session not found: ${this.sessionId}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(
      `Session ${session.sessionId}\n` +
        `  flags: ${session.scamFlags}  confirmed: ${session.isConfirmedScam ? "yes" : "no"}\n` +
        `  created: ${formatTime(session.createdAt)}\n`,
    );
    this.context.stdout.write(`Messages (${session.messages.length}):\n`);
    for (const m of session.messages) {
      const marker = m.isScamFlag ? "!" : " ";
      this.context.stdout.write(`  ${marker} ${m.sender}: ${m.text}\n`);
    }
    this.context.stdout.write(
      `Evidence:\n${JSON.stringify(session.intelligence.evidence, null, 2)}\n`,
    );
    if (session.intelligence.agentNotes) {
      this.context.stdout.write(`Notes: ${session.intelligence.agentNotes}\n`);
    }
  }
}

export class SessionFinalizeCommand extends StoreCommand {
  static override paths = [["session", "finalize"]];

  static override usage = Command.Usage({
    description: "Archive a session now (requires the gateway to be stopped)",
    examples: [
      ["Finalize a session", "decoy session finalize session_1700000000000"],
      ["Finalize and report", "decoy session finalize session_1700000000000 --push"],
    ],
  });

  sessionId = Option.String({ name: "sessionId", required: true });
  push = Option.Boolean("--push", false, {
    description: "Report confirmed scams to the external evaluator",
  });

  protected readonly exclusive = true;

  protected async run({ engine }: OpenedStores): Promise<void> {
    const result = await engine.finalize(this.sessionId, this.push);
    if (result.status === "not_found") {
      this.context.stdout.write(`Session not found: ${this.sessionId}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(
      `Session finalized: ${result.sessionId} ` +
        `(${result.totalMessages} messages, ${result.isScam ? "scam" : "benign"})\n`,
    );
    if (result.reported !== null) {
      this.context.stdout.write(`Reported: ${result.reported ? "yes" : "no, left pending"}\n`);
    }
  }
}

export class SessionSweepCommand extends StoreCommand {
  static override paths = [["session", "sweep"]];

  static override usage = Command.Usage({
    description: "Finalize every session idle for longer than the configured timeout",
    examples: [["Sweep idle sessions", "decoy session sweep"]],
  });

  protected readonly exclusive = true;

  protected async run({ engine }: OpenedStores): Promise<void> {
    const count = await engine.finalizeTimedOut();
    this.context.stdout.write(`Finalized ${count} timed-out session(s)\n`);
  }
}

export class SessionClearCommand extends StoreCommand {
  static override paths = [["session", "clear"]];

  static override usage = Command.Usage({
    description: "Discard active sessions without archiving them",
    examples: [
      ["Discard one session", "decoy session clear session_1700000000000"],
      ["Discard everything", "decoy session clear --all"],
    ],
  });

  sessionId = Option.String({ name: "sessionId", required: false });
  all = Option.Boolean("--all", false, { description: "Clear every active session" });

  protected readonly exclusive = true;

  protected async run({ active }: OpenedStores): Promise<void> {
    if (this.all) {
      const cleared = active.clearAll();
      this.context.stdout.write(`Cleared ${cleared} active session(s)\n`);
      return;
    }
    if (!this.sessionId) {
      this.context.stdout.write("Pass a session id or --all\n");
      process.exitCode = 1;
      return;
    }
    if (!active.clear(this.sessionId)) {
      this.context.stdout.write(`Session not found: ${this.sessionId}\n`);
      process.exitCode = 1;
      return;
    }
    this.context.stdout.write(`Session cleared: ${this.sessionId}\n`);
  }
}
