import path from "node:path";

import type { Dispatcher } from "undici";

import { authenticate, DEFAULT_DOMAIN_ID, listWorkflows, type PolicyOptimizerSession } from "../../providers/policyOptimizer";
import type { PolicyOptimizerWorkflow } from "../../providers/types";
import type { CommandDeps } from "../types";
import { describeError, makeError, parsePositiveInt, readValue } from "./args";
import { createFileLogger, DEFAULT_LOG_FILE, type ClosableRunLogger, type RunLogger } from "./logger";
import { askRequired, createConsolePrompter, type Prompter } from "./prompts";
import { loadRunConfig, type RunConfig } from "./runConfig";

export const DEFAULT_WORKFLOW_ID = 2;
export const DEFAULT_HOST = "https://localhost";

export interface ConnectionArgs {
  configPath?: string;
  host?: string;
  username?: string;
  password?: string;
  domainId?: number;
  logFile?: string;
  nonInteractive: boolean;
}

export interface ResolvedConnection {
  host: string;
  username: string;
  password: string;
  domainId: number;
}

export interface CommandRuntime {
  config: RunConfig;
  logger: RunLogger;
  /** `null` when running with `--non-interactive`. */
  prompter: Prompter | null;
  write: (text: string) => void;
  now: () => Date;
  cwd: string;
  dispatcher?: Dispatcher;
  dispose(): void;
}

/**
 * Applies one of the flags every command shares. Returns the index of the last
 * consumed token, or `null` when `argv[index]` is not a connection flag.
 */
export function applyConnectionFlag(args: ConnectionArgs, argv: string[], index: number): number | null {
  const token = argv[index] ?? "";

  switch (token) {
    case "--config":
      args.configPath = readValue(argv, index, token);
      return index + 1;
    case "--host":
      args.host = readValue(argv, index, token);
      return index + 1;
    case "--username":
      args.username = readValue(argv, index, token);
      return index + 1;
    case "--password":
      args.password = readValue(argv, index, token);
      return index + 1;
    case "--domain-id":
      args.domainId = parsePositiveInt(readValue(argv, index, token), token);
      return index + 1;
    case "--log-file":
      args.logFile = readValue(argv, index, token);
      return index + 1;
    case "--non-interactive":
      args.nonInteractive = true;
      return index;
    default:
      return null;
  }
}

/**
 * Writes a fatal error raised before the runtime exists (bad arguments, an
 * unreadable config file) to the run log. Help requests are not failures.
 */
export function recordStartupFailure(error: unknown, deps: CommandDeps, logFile?: string): void {
  if (error instanceof Error && error.message.startsWith("E_HELP:")) {
    return;
  }

  if (deps.logger) {
    deps.logger.error(describeError(error));
    return;
  }

  const logger = createFileLogger(path.resolve(deps.cwd ?? process.cwd(), logFile ?? DEFAULT_LOG_FILE));
  try {
    logger.error(describeError(error));
  } finally {
    logger.close();
  }
}

export async function openRuntime(args: ConnectionArgs, deps: CommandDeps): Promise<CommandRuntime> {
  const cwd = deps.cwd ?? process.cwd();

  let config: RunConfig = {};
  if (args.configPath) {
    try {
      config = await loadRunConfig(args.configPath, cwd);
    } catch (error) {
      recordStartupFailure(error, deps, args.logFile);
      throw error;
    }
  }

  let fileLogger: ClosableRunLogger | null = null;
  let logger: RunLogger;
  if (deps.logger) {
    logger = deps.logger;
  } else {
    fileLogger = createFileLogger(path.resolve(cwd, args.logFile ?? config.log_file ?? DEFAULT_LOG_FILE));
    logger = fileLogger;
  }

  const ownedPrompter = args.nonInteractive || deps.prompter ? null : createConsolePrompter();
  const prompter = args.nonInteractive ? null : deps.prompter ?? ownedPrompter;

  return {
    config,
    logger,
    prompter,
    write: deps.write ?? ((text) => process.stdout.write(text)),
    now: deps.now ?? (() => new Date()),
    cwd,
    dispatcher: deps.dispatcher,
    dispose: () => {
      ownedPrompter?.close();
      fileLogger?.close();
    }
  };
}

async function resolveRequired(
  value: string | undefined,
  prompter: Prompter | null,
  question: string,
  flag: string,
  secret = false
): Promise<string> {
  if (value !== undefined && value.length > 0) {
    return value;
  }

  if (!prompter) {
    throw makeError("E_ARG_REQUIRED", `${flag} (or its config file key) is required with --non-interactive`);
  }

  return askRequired(prompter, question, secret);
}

/** CLI flags win over the config file; whatever is still missing is asked for. */
export async function resolveConnection(
  args: ConnectionArgs,
  config: RunConfig,
  prompter: Prompter | null
): Promise<ResolvedConnection> {
  let host = args.host ?? config.host;
  if (!host) {
    if (!prompter) {
      throw makeError("E_ARG_REQUIRED", "--host (or its config file key) is required with --non-interactive");
    }

    host = (await prompter.ask("Enter Policy Optimizer host (e.g., https://policy-manager.example.com): ")) || DEFAULT_HOST;
  }

  const username = await resolveRequired(args.username ?? config.username, prompter, "Enter username: ", "--username");
  const password = await resolveRequired(args.password ?? config.password, prompter, "Enter password: ", "--password", true);

  return {
    host,
    username,
    password,
    domainId: args.domainId ?? config.domain_id ?? DEFAULT_DOMAIN_ID
  };
}

export async function openSession(connection: ResolvedConnection, runtime: CommandRuntime): Promise<PolicyOptimizerSession> {
  const session = await authenticate(
    {
      host: connection.host,
      domainId: connection.domainId,
      dispatcher: runtime.dispatcher,
      logger: runtime.logger
    },
    connection.username,
    connection.password
  );

  runtime.logger.info("Authentication successful.");
  return session;
}

export function formatWorkflowChoice(workflow: PolicyOptimizerWorkflow, position: number): string {
  return `   ${position}. ${workflow.name} (ID: ${workflow.id})${workflow.disabled ? " (DISABLED)" : ""}`;
}

/** Accepts a 1-based list position first, then a workflow id. */
export function matchWorkflowSelection(workflows: PolicyOptimizerWorkflow[], answer: string): PolicyOptimizerWorkflow | null {
  if (!/^\d+$/.test(answer)) {
    return null;
  }

  const selected = Number(answer);
  if (selected >= 1 && selected <= workflows.length) {
    return workflows[selected - 1] ?? null;
  }

  return workflows.find((workflow) => workflow.id === selected) ?? null;
}

export async function selectWorkflow(session: PolicyOptimizerSession, runtime: CommandRuntime): Promise<number> {
  runtime.write("\nFetching available workflows...\n");
  const workflows = await listWorkflows(session);
  const [only] = workflows;

  if (!only) {
    runtime.write(`No workflows found or unable to fetch workflows. Using default workflow ID: ${DEFAULT_WORKFLOW_ID}\n`);
    runtime.logger.warn(`No workflows available; falling back to workflow ${DEFAULT_WORKFLOW_ID}`);
    return DEFAULT_WORKFLOW_ID;
  }

  if (workflows.length === 1) {
    runtime.write(`Auto-selected the only available workflow: ${only.name} (ID: ${only.id})\n`);
    return only.id;
  }

  if (!runtime.prompter) {
    throw makeError(
      "E_WORKFLOW_REQUIRED",
      `${workflows.length} workflows available; pass --workflow-id (one of ${workflows.map((workflow) => workflow.id).join(", ")})`
    );
  }

  runtime.write(`\nAvailable Workflows:\n${workflows.map((workflow, index) => formatWorkflowChoice(workflow, index + 1)).join("\n")}\n`);

  for (;;) {
    const answer = await runtime.prompter.ask("\nSelect workflow (enter number or workflow ID): ");
    const workflow = matchWorkflowSelection(workflows, answer);
    if (workflow) {
      runtime.write(`Selected: ${workflow.name} (ID: ${workflow.id})\n`);
      return workflow.id;
    }

    runtime.write("Invalid selection. Enter a number from the list or a valid workflow ID.\n");
  }
}
