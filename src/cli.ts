import { REPORT_USAGE, runReportCommand } from "./commands/report";
import { runWorkflowsCommand } from "./commands/workflows";
import type { CommandDeps } from "./commands/types";

function renderHelp(): string {
  return [
    "Policy Optimizer Ticket Report",
    "",
    "Usage:",
    "  po-report [report] [report options]",
    "  po-report workflows [connection options]",
    "  po-report --help",
    "",
    REPORT_USAGE,
    ""
  ].join("\n");
}

export async function runCli(argv: string[] = process.argv.slice(2), deps: CommandDeps = {}): Promise<number> {
  const first = argv[0];
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  if (first === "--help" || first === "-h" || first === "help") {
    write(renderHelp());
    return 0;
  }

  if (!first || first.startsWith("--")) {
    return runReportCommand(argv, deps);
  }

  const command = first.trim().toLowerCase();
  const rest = argv.slice(1);

  if (command === "report") {
    return runReportCommand(rest, deps);
  }

  if (command === "workflows") {
    return runWorkflowsCommand(rest, deps);
  }

  throw new Error(`E_UNKNOWN_COMMAND: '${command}'. Use --help to view supported commands.`);
}

if (require.main === module) {
  runCli()
    .then((code) => {
      process.exit(code);
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);

      if (message.startsWith("E_HELP:")) {
        process.stdout.write(`${message.replace(/^E_HELP:\s*/, "")}\n`);
        process.exit(0);
      }

      process.stderr.write(`po-report failed: ${message}\n`);
      process.exit(1);
    });
}
