import { Cli } from "clipanion";
import { GatewayRunCommand } from "./commands/gateway.js";
import { StatusCommand } from "./commands/status.js";
import { DoctorCommand } from "./commands/doctor.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import {
  SessionClearCommand,
  SessionFinalizeCommand,
  SessionListCommand,
  SessionShowCommand,
  SessionSweepCommand,
} from "./commands/session.js";
import { ArchiveListCommand } from "./commands/archive.js";
import { IntelPendingCommand, IntelPushCommand } from "./commands/intel.js";
import { VERSION } from "./version.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Decoy",
    binaryName: "decoy",
    binaryVersion: VERSION,
  });

  cli.register(GatewayRunCommand);

  // Status and diagnostics
  cli.register(StatusCommand);
  cli.register(DoctorCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Session commands
  cli.register(SessionListCommand);
  cli.register(SessionShowCommand);
  cli.register(SessionFinalizeCommand);
  cli.register(SessionSweepCommand);
  cli.register(SessionClearCommand);

  // Archive and intelligence
  cli.register(ArchiveListCommand);
  cli.register(IntelPendingCommand);
  cli.register(IntelPushCommand);

  return cli;
}
