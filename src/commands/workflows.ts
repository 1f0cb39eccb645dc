import { listWorkflows } from "../providers/policyOptimizer";
import type { PolicyOptimizerWorkflow } from "../providers/types";
import { describeError, makeError } from "./shared/args";
import { applyConnectionFlag, openRuntime, openSession, recordStartupFailure, resolveConnection, type ConnectionArgs } from "./shared/context";
import type { CommandDeps } from "./types";

export const WORKFLOWS_USAGE =
  "Usage: po-report workflows [--config <path>] [--host <url>] [--username <name>] [--password <secret>] [--domain-id <id>] [--log-file <path>] [--non-interactive]";

export function parseWorkflowsArgs(argv: string[]): ConnectionArgs {
  const args: ConnectionArgs = {
    nonInteractive: false
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";

    if (token === "--help" || token === "-h") {
      throw makeError("E_HELP", WORKFLOWS_USAGE);
    }

    const connectionIndex = applyConnectionFlag(args, argv, index);
    if (connectionIndex === null) {
      throw makeError("E_ARG_UNKNOWN", token);
    }

    index = connectionIndex;
  }

  return args;
}

export function renderWorkflowList(workflows: PolicyOptimizerWorkflow[]): string {
  if (workflows.length === 0) {
    return "No workflows found.\n";
  }

  return workflows.map((workflow) => `${workflow.id}\t${workflow.name}${workflow.disabled ? "\t(disabled)" : ""}\n`).join("");
}

export async function runWorkflowsCommand(argv: string[] = process.argv.slice(2), deps: CommandDeps = {}): Promise<number> {
  let args: ConnectionArgs;
  try {
    args = parseWorkflowsArgs(argv);
  } catch (error) {
    recordStartupFailure(error, deps);
    throw error;
  }

  const runtime = await openRuntime(args, deps);

  try {
    const connection = await resolveConnection(args, runtime.config, runtime.prompter);
    const session = await openSession(connection, runtime);
    runtime.write(renderWorkflowList(await listWorkflows(session)));
    return 0;
  } catch (error) {
    runtime.logger.error(describeError(error));
    throw error;
  } finally {
    runtime.dispose();
  }
}
