import fs from "node:fs/promises";
import path from "node:path";

import { getRuleDetail, searchTickets, type PolicyOptimizerSession } from "../providers/policyOptimizer";
import type { PolicyOptimizerTicket, TicketStatusFilter } from "../providers/types";
import { renderTicketsCsv } from "./render/ticketsCsv";
import { loadReportAssets, renderTicketsHtml } from "./render/ticketsHtml";
import { describeError, makeError, parsePort, parsePositiveInt, readList, readValue, splitList } from "./shared/args";
import {
  applyConnectionFlag,
  openRuntime,
  openSession,
  recordStartupFailure,
  resolveConnection,
  selectWorkflow,
  type CommandRuntime,
  type ConnectionArgs
} from "./shared/context";
import { deliverReportEmail, isValidEmailAddress } from "./shared/email";
import { askChoice, askPositiveInt, askRequired, askYesNo, type Prompter } from "./shared/prompts";
import { DEFAULT_SAMPLE_CONFIG_PATH, parseStatusFilter, writeGeneratedConfig, writeSampleConfig, type EmailConfig, type RunConfig } from "./shared/runConfig";
import {
  buildReportLayout,
  countByStatus,
  enrichTickets,
  projectTicketRows,
  RULE_DETAIL_FIELDS
} from "./shared/ticketRows";
import { formatFileStamp, formatLocalDateTime } from "./shared/time";
import type {
  CommandDeps,
  EmailSettings,
  GeneratedReports,
  ReportFormat,
  ReportLayout,
  ReportSettings,
  RuleDetailField,
  SmtpSettings,
  StatusSummary,
  TicketRow
} from "./types";

export const DEFAULT_OUTPUT_DIR = "po_reports";
export const DEFAULT_SMTP_PORT = 587;

const RULE_SEPARATOR = "=".repeat(60);

export const REPORT_USAGE = [
  "Usage: po-report [report] [options]",
  "",
  "Connection:",
  "  --config <path>                 JSON config file (CLI flags take precedence)",
  "  --host <url>                    Policy Optimizer host",
  "  --username <name>",
  "  --password <secret>",
  "  --domain-id <id>                Domain id (default 1)",
  "",
  "Report:",
  "  --workflow-id <id>",
  "  --status all|Review|Completed|Cancelled",
  "  --days <n>                      Only tickets created in the last n days",
  "  --csv, --html                   Formats to generate",
  "  --include-rule-details          Add source/destination/service/application/action columns",
  "  --include-rule-docs             Add rule documentation columns",
  "  --rule-detail-fields <f...>     Subset of detail columns",
  "  --rule-doc-fields <f...>        Subset of documentation keys",
  "  --output-dir <dir>              Report directory (default po_reports)",
  "",
  "E-mail:",
  "  --email",
  "  --email-recipients <a...>",
  "  --smtp-server <host>            Omit to use the local sendmail",
  "  --smtp-port <port>              587 STARTTLS, 465 TLS, others plain (default 587)",
  "  --smtp-user <name>",
  "  --smtp-password <secret>",
  "",
  "Other:",
  "  --generate-sample-config [path] Write a sample config file and exit",
  "  --generate-config <path>        Save this run's settings as a config file",
  "  --log-file <path>               Run log (default po_tickets_report.log)",
  "  --non-interactive               Never prompt; use defaults or fail"
].join("\n");

export interface ReportArgs extends ConnectionArgs {
  sampleConfigPath?: string;
  generateConfigPath?: string;
  workflowId?: number;
  status?: TicketStatusFilter;
  days?: number;
  csv: boolean;
  html: boolean;
  includeRuleDetails: boolean;
  includeRuleDocs: boolean;
  ruleDetailFields?: RuleDetailField[];
  ruleDocFields?: string[];
  email: boolean;
  emailRecipients?: string[];
  smtpServer?: string;
  smtpPort?: number;
  smtpUser?: string;
  smtpPassword?: string;
  outputDir?: string;
}

function parseStatusArg(value: string): TicketStatusFilter {
  const status = parseStatusFilter(value);
  if (!status) {
    throw makeError("E_ARG_INVALID", "--status must be all|Review|Completed|Cancelled");
  }

  return status;
}

function parseDetailFields(values: string[]): RuleDetailField[] {
  return values.map((value) => {
    const field = RULE_DETAIL_FIELDS.find((candidate) => candidate === value.toLowerCase());
    if (!field) {
      throw makeError("E_ARG_INVALID", `--rule-detail-fields accepts ${RULE_DETAIL_FIELDS.join("|")}, got '${value}'`);
    }

    return field;
  });
}

export function parseReportArgs(argv: string[]): ReportArgs {
  const args: ReportArgs = {
    nonInteractive: false,
    csv: false,
    html: false,
    includeRuleDetails: false,
    includeRuleDocs: false,
    email: false
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";

    if (token === "--help" || token === "-h") {
      throw makeError("E_HELP", REPORT_USAGE);
    }

    const connectionIndex = applyConnectionFlag(args, argv, index);
    if (connectionIndex !== null) {
      index = connectionIndex;
      continue;
    }

    switch (token) {
      case "--generate-sample-config": {
        const value = argv[index + 1];
        if (value && !value.startsWith("--")) {
          args.sampleConfigPath = value;
          index += 1;
        } else {
          args.sampleConfigPath = DEFAULT_SAMPLE_CONFIG_PATH;
        }
        continue;
      }
      case "--generate-config":
        args.generateConfigPath = readValue(argv, index, token);
        index += 1;
        continue;
      case "--workflow-id":
        args.workflowId = parsePositiveInt(readValue(argv, index, token), token);
        index += 1;
        continue;
      case "--status":
        args.status = parseStatusArg(readValue(argv, index, token));
        index += 1;
        continue;
      case "--days":
        args.days = parsePositiveInt(readValue(argv, index, token), token);
        index += 1;
        continue;
      case "--csv":
        args.csv = true;
        continue;
      case "--html":
        args.html = true;
        continue;
      case "--include-rule-details":
        args.includeRuleDetails = true;
        continue;
      case "--include-rule-docs":
        args.includeRuleDocs = true;
        continue;
      case "--rule-detail-fields": {
        const list = readList(argv, index, token);
        args.ruleDetailFields = parseDetailFields(list.values);
        index = list.nextIndex;
        continue;
      }
      case "--rule-doc-fields": {
        const list = readList(argv, index, token);
        args.ruleDocFields = list.values;
        index = list.nextIndex;
        continue;
      }
      case "--email":
        args.email = true;
        continue;
      case "--email-recipients": {
        const list = readList(argv, index, token);
        args.emailRecipients = list.values;
        index = list.nextIndex;
        continue;
      }
      case "--smtp-server":
        args.smtpServer = readValue(argv, index, token);
        index += 1;
        continue;
      case "--smtp-port":
        args.smtpPort = parsePort(readValue(argv, index, token), token);
        index += 1;
        continue;
      case "--smtp-user":
        args.smtpUser = readValue(argv, index, token);
        index += 1;
        continue;
      case "--smtp-password":
        args.smtpPassword = readValue(argv, index, token);
        index += 1;
        continue;
      case "--output-dir":
        args.outputDir = readValue(argv, index, token);
        index += 1;
        continue;
      default:
        break;
    }

    throw makeError("E_ARG_UNKNOWN", token);
  }

  return args;
}

export function buildReportBaseName(workflowId: number, status: TicketStatusFilter, days: number | undefined, now: Date): string {
  const parts = ["po_tickets", `wf${workflowId}`];
  if (status !== "all") {
    parts.push(status.toLowerCase());
  }

  if (days) {
    parts.push(`${days}days`);
  }

  parts.push(formatFileStamp(now));
  return parts.join("_");
}

async function resolveFormats(args: ReportArgs, config: RunConfig, prompter: Prompter | null): Promise<ReportFormat[]> {
  const csv = args.csv || config.csv === true;
  const html = args.html || config.html === true;

  if (csv || html) {
    const formats: ReportFormat[] = [];
    if (csv) {
      formats.push("csv");
    }
    if (html) {
      formats.push("html");
    }
    return formats;
  }

  if (!prompter) {
    return ["csv", "html"];
  }

  return askChoice<ReportFormat[]>(prompter, "\nSelect Report Type to Generate:", [
    { key: "1", label: "CSV", value: ["csv"] },
    { key: "2", label: "HTML", value: ["html"] },
    { key: "3", label: "Both CSV and HTML", value: ["csv", "html"] }
  ]);
}

async function resolveToggle(
  flag: boolean,
  configured: boolean | undefined,
  prompter: Prompter | null,
  question: string
): Promise<boolean> {
  if (flag) {
    return true;
  }

  if (configured !== undefined) {
    return configured;
  }

  return prompter ? askYesNo(prompter, question, false) : false;
}

async function resolveFilters(
  args: ReportArgs,
  config: RunConfig,
  prompter: Prompter | null
): Promise<{ status: TicketStatusFilter; days?: number }> {
  const configuredDays = config.days ?? undefined;
  const unset = args.status === undefined && config.status === undefined && args.days === undefined && config.days === undefined;

  if (!unset || !prompter) {
    const days = args.days ?? configuredDays;
    return {
      status: args.status ?? config.status ?? "all",
      ...(days ? { days } : {})
    };
  }

  const option = await askChoice(prompter, "\nFilter Options:", [
    { key: "1", label: "All tickets", value: { byStatus: false, byDays: false } },
    { key: "2", label: "Filter by status", value: { byStatus: true, byDays: false } },
    { key: "3", label: "Filter by date range", value: { byStatus: false, byDays: true } },
    { key: "4", label: "Filter by both status and date", value: { byStatus: true, byDays: true } }
  ]);

  const status = option.byStatus
    ? await askChoice<TicketStatusFilter>(prompter, "\nSelect status filter:", [
        { key: "1", label: "All", value: "all" },
        { key: "2", label: "Review", value: "Review" },
        { key: "3", label: "Completed", value: "Completed" },
        { key: "4", label: "Cancelled", value: "Cancelled" }
      ])
    : "all";

  if (!option.byDays) {
    return { status };
  }

  return {
    status,
    days: await askPositiveInt(prompter, "\nEnter number of days to look back (e.g., 30): ")
  };
}

function validateRecipients(recipients: string[], source: string): string[] {
  const invalid = recipients.filter((recipient) => !isValidEmailAddress(recipient));
  if (invalid.length > 0) {
    throw makeError("E_ARG_INVALID", `${source}: invalid e-mail address(es) ${invalid.join(", ")}`);
  }

  return recipients;
}

async function askRecipients(prompter: Prompter, write: (text: string) => void): Promise<string[]> {
  for (;;) {
    const recipients = splitList(await prompter.ask("Enter email recipients (comma-separated): "));
    if (recipients.length === 0) {
      write("Please enter at least one email address.\n");
      continue;
    }

    const invalid = recipients.filter((recipient) => !isValidEmailAddress(recipient));
    if (invalid.length === 0) {
      return recipients;
    }

    write(`Invalid email addresses: ${invalid.join(", ")}\n`);
  }
}

async function askPort(prompter: Prompter): Promise<number> {
  for (;;) {
    const answer = await prompter.ask(`Enter SMTP port (587 for STARTTLS, 465 for TLS, 25 for plain) [${DEFAULT_SMTP_PORT}]: `);
    if (answer.length === 0) {
      return DEFAULT_SMTP_PORT;
    }

    if (/^\d+$/.test(answer) && Number(answer) >= 1 && Number(answer) <= 65_535) {
      return Number(answer);
    }
  }
}

async function resolveEmail(args: ReportArgs, config: RunConfig, runtime: CommandRuntime): Promise<EmailSettings | null> {
  const { prompter } = runtime;
  const emailConfig: EmailConfig = config.email ?? {};

  const enabled = await resolveToggle(args.email, emailConfig.enabled, prompter, "\nSend report via email?");
  if (!enabled) {
    return null;
  }

  const listed = args.emailRecipients ?? emailConfig.recipients ?? [];
  let recipients: string[];
  if (listed.length > 0) {
    recipients = validateRecipients(listed, args.emailRecipients ? "--email-recipients" : "email.recipients");
  } else if (prompter) {
    recipients = await askRecipients(prompter, runtime.write);
  } else {
    throw makeError("E_ARG_REQUIRED", "--email-recipients (or email.recipients) is required with --email");
  }

  const server = args.smtpServer ?? emailConfig.smtp_server ?? undefined;
  if (server) {
    const user = args.smtpUser ?? emailConfig.smtp_user ?? undefined;
    const password = args.smtpPassword ?? emailConfig.smtp_password ?? undefined;
    return {
      recipients,
      smtp: smtpSettings(server, args.smtpPort ?? emailConfig.smtp_port ?? DEFAULT_SMTP_PORT, user, password)
    };
  }

  if (!prompter) {
    return { recipients };
  }

  const method = await askChoice(
    prompter,
    "\nEmail sending method:",
    [
      { key: "1", label: "Use local mail system (sendmail)", value: "local" },
      { key: "2", label: "Use SMTP server", value: "smtp" }
    ],
    "1"
  );

  if (method === "local") {
    runtime.write("Will use local mail system for sending\n");
    return { recipients };
  }

  const chosenServer = await askRequired(prompter, "Enter SMTP server: ");
  const port = args.smtpPort ?? emailConfig.smtp_port ?? (await askPort(prompter));
  const user = args.smtpUser ?? emailConfig.smtp_user ?? (await prompter.ask("Enter SMTP username (leave blank if not required): "));
  const password =
    args.smtpPassword ?? emailConfig.smtp_password ?? (user ? await prompter.askSecret("Enter SMTP password: ") : undefined);

  return {
    recipients,
    smtp: smtpSettings(chosenServer, port, user || undefined, password || undefined)
  };
}

function smtpSettings(server: string, port: number, user: string | undefined, password: string | undefined): SmtpSettings {
  return {
    server,
    port,
    ...(user ? { user } : {}),
    ...(password ? { password } : {})
  };
}

/** Resolves everything the run needs once the session exists; CLI flags beat the config file, prompts fill the rest. */
export async function resolveReportSettings(
  args: ReportArgs,
  runtime: CommandRuntime,
  session: PolicyOptimizerSession,
  credentials: { username: string; password: string }
): Promise<ReportSettings> {
  const { config, prompter } = runtime;

  const workflowId = args.workflowId ?? config.workflow_id ?? (await selectWorkflow(session, runtime));
  const formats = await resolveFormats(args, config, prompter);
  const includeRuleDetails = await resolveToggle(
    args.includeRuleDetails,
    config.include_rule_details,
    prompter,
    "\nInclude rule configuration details (source, destination, service, application, action)?"
  );
  const includeRuleDocs = await resolveToggle(
    args.includeRuleDocs,
    config.include_rule_docs,
    prompter,
    "\nInclude rule documentation fields (owner, approver, change control #, ...)? This fetches every rule and takes longer."
  );
  const filters = await resolveFilters(args, config, prompter);
  const email = await resolveEmail(args, config, runtime);

  const ruleDetailFields = args.ruleDetailFields ?? config.rule_detail_fields;
  const ruleDocFields = args.ruleDocFields ?? config.rule_doc_fields;

  return {
    host: session.host,
    username: credentials.username,
    password: credentials.password,
    domainId: session.domainId,
    workflowId,
    status: filters.status,
    ...(filters.days ? { days: filters.days } : {}),
    formats,
    selection: {
      includeRuleDetails,
      includeRuleDocs,
      ...(ruleDetailFields ? { ruleDetailFields } : {}),
      ...(ruleDocFields ? { ruleDocFields } : {})
    },
    outputDir: args.outputDir ?? config.output_dir ?? DEFAULT_OUTPUT_DIR,
    email
  };
}

async function ensureDirectory(directory: string, runtime: CommandRuntime): Promise<void> {
  const created = await fs.mkdir(directory, { recursive: true });
  if (created) {
    runtime.write(`\nCreated reports directory: ${directory}\n`);
  }
}

async function writeReports(
  settings: ReportSettings,
  rows: TicketRow[],
  layout: ReportLayout,
  summary: StatusSummary,
  runtime: CommandRuntime,
  generatedAt: Date
): Promise<GeneratedReports> {
  const directory = path.resolve(runtime.cwd, settings.outputDir);
  await ensureDirectory(directory, runtime);

  const baseName = buildReportBaseName(settings.workflowId, settings.status, settings.days, generatedAt);
  const reports: GeneratedReports = { csvPath: null, htmlPath: null, csvRows: 0, htmlRows: 0 };

  if (settings.formats.includes("csv")) {
    const csvPath = path.join(directory, `${baseName}.csv`);
    await fs.writeFile(csvPath, renderTicketsCsv(rows, layout), "utf8");
    runtime.logger.info(`CSV report generated: ${csvPath}`);
    runtime.write(`CSV report written with ${rows.length} tickets: ${csvPath}\n`);
    reports.csvPath = csvPath;
    reports.csvRows = rows.length;
  }

  if (settings.formats.includes("html")) {
    const htmlPath = path.join(directory, `${baseName}.html`);
    const html = renderTicketsHtml({
      rows,
      layout,
      summary,
      host: settings.host,
      domainId: settings.domainId,
      fallbackWorkflowId: settings.workflowId,
      generatedAt,
      assets: loadReportAssets()
    });
    await fs.writeFile(htmlPath, html, "utf8");
    runtime.logger.info(`HTML report generated: ${htmlPath}`);
    runtime.write(`HTML report written with ${rows.length} tickets: ${htmlPath}\n`);
    reports.htmlPath = htmlPath;
    reports.htmlRows = rows.length;
  }

  return reports;
}

async function describeFile(label: string, filePath: string): Promise<string> {
  const stats = await fs.stat(filePath);
  return [`\n   ${label}:`, `      Location: ${filePath}`, `      Size: ${stats.size.toLocaleString("en-US")} bytes`].join("\n");
}

async function renderFinalSummary(
  settings: ReportSettings,
  tickets: PolicyOptimizerTicket[],
  reports: GeneratedReports,
  finishedAt: Date
): Promise<string> {
  const summary = countByStatus(tickets);
  const lines = [
    "",
    RULE_SEPARATOR,
    "              REPORT GENERATION COMPLETE!",
    RULE_SEPARATOR,
    "",
    "Summary:",
    `   - Workflow ID: ${settings.workflowId}`,
    `   - Total tickets processed: ${summary.total}`,
    `   - In Review: ${summary.review}`,
    `   - Completed: ${summary.completed}`,
    `   - Cancelled: ${summary.cancelled}`,
    "",
    "   Reports generated:"
  ];

  if (reports.csvPath) {
    lines.push(await describeFile("CSV Report", reports.csvPath));
  }

  if (reports.htmlPath) {
    lines.push(await describeFile("HTML Report", reports.htmlPath));
  }

  const directory = reports.csvPath ?? reports.htmlPath;
  if (directory) {
    lines.push("", `   Reports saved in: ${path.dirname(directory)}${path.sep}`);
  }

  lines.push("", `Completed at: ${formatLocalDateTime(finishedAt)}`, RULE_SEPARATOR, "");
  return lines.join("\n");
}

async function runReport(args: ReportArgs, runtime: CommandRuntime, deps: CommandDeps): Promise<number> {
  const { logger, write } = runtime;

  write(`${RULE_SEPARATOR}\n    POLICY OPTIMIZER TICKETS REPORT GENERATOR\n${RULE_SEPARATOR}\n`);
  write(`Started at: ${formatLocalDateTime(runtime.now())}\n`);

  const connection = await resolveConnection(args, runtime.config, runtime.prompter);
  const session = await openSession(connection, runtime);
  const settings = await resolveReportSettings(args, runtime, session, connection);

  write(`\nFetching tickets for workflow ${settings.workflowId}...\n`);
  const tickets = await searchTickets(session, {
    workflowId: settings.workflowId,
    status: settings.status,
    ...(settings.days ? { days: settings.days } : {})
  });

  if (tickets.length === 0) {
    write("\nNo tickets found with the specified filters.\n");
    logger.info("No tickets found; nothing to report.");
    return 0;
  }

  write(`Found ${tickets.length} tickets\n`);

  const { selection } = settings;
  if (selection.includeRuleDetails || selection.includeRuleDocs) {
    write(`Fetching rule details for ${tickets.length} tickets...\n`);
  }

  const enrichment = await enrichTickets(tickets, selection, (locator) => getRuleDetail(session, locator));
  logger.info(`Rule lookups: ${enrichment.lookups}, enriched: ${enrichment.enriched}`);

  const layout = buildReportLayout(selection, enrichment.observedDocFields);
  if (layout.missingDocFields.length > 0) {
    const message = `Requested rule documentation fields not found: ${layout.missingDocFields.join(", ")}`;
    logger.warn(message);
    write(`${message}\n`);
  }

  if (selection.includeRuleDocs) {
    logger.info(`Discovered rule documentation fields: ${enrichment.observedDocFields.join(", ") || "(none)"}`);
  }

  const projection = projectTicketRows(enrichment.entries, layout, logger);
  if (projection.skipped > 0) {
    write(`Skipped ${projection.skipped} ticket(s) that could not be processed; see the log file.\n`);
  }

  write(`\n${RULE_SEPARATOR}\n                 GENERATING REPORTS\n${RULE_SEPARATOR}\n`);
  const generatedAt = runtime.now();
  const summary = countByStatus(tickets);
  const reports = await writeReports(settings, projection.rows, layout, summary, runtime, generatedAt);

  if (args.generateConfigPath) {
    try {
      const configPath = await writeGeneratedConfig(
        args.generateConfigPath,
        settings,
        { discoveredDocFields: enrichment.observedDocFields, totalTickets: tickets.length, generatedAt },
        runtime.cwd
      );
      write(`\nConfiguration saved to '${configPath}'\n   Reuse it with: --config ${configPath}\n`);
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error saving generated config: ${message}`);
      write(`Error saving configuration: ${message}\n`);
    }
  }

  const attachments = [reports.csvPath, reports.htmlPath].filter((item): item is string => item !== null);
  if (settings.email && attachments.length > 0) {
    write("\nSending email report...\n");
    const delivery = await deliverReportEmail(
      settings.email,
      {
        generatedAt,
        workflowId: settings.workflowId,
        totalTickets: tickets.length,
        status: settings.status,
        ...(settings.days ? { days: settings.days } : {})
      },
      attachments,
      {
        createSender: deps.createSender,
        logger,
        hostname: deps.hostname
      }
    );

    if (delivery.sent.length > 0) {
      write(`Email sent to ${delivery.sent.join(", ")}\n`);
    }
    if (delivery.failed.length > 0) {
      write(`Failed to send email to ${delivery.failed.join(", ")}: ${delivery.errors.join("; ")}\n`);
    }
  }

  write(await renderFinalSummary(settings, tickets, reports, runtime.now()));
  return 0;
}

export async function runReportCommand(argv: string[] = process.argv.slice(2), deps: CommandDeps = {}): Promise<number> {
  let args: ReportArgs;
  try {
    args = parseReportArgs(argv);
  } catch (error) {
    recordStartupFailure(error, deps);
    throw error;
  }

  if (args.sampleConfigPath) {
    let samplePath: string;
    try {
      samplePath = await writeSampleConfig(args.sampleConfigPath, deps.cwd ?? process.cwd());
    } catch (error) {
      recordStartupFailure(error, deps, args.logFile);
      throw error;
    }

    const write = deps.write ?? ((text: string) => process.stdout.write(text));
    write(`Sample configuration file saved as '${samplePath}'\n   Edit this file and use it with --config\n`);
    return 0;
  }

  const runtime = await openRuntime(args, deps);
  try {
    return await runReport(args, runtime, deps);
  } catch (error) {
    runtime.logger.error(describeError(error));
    throw error;
  } finally {
    runtime.dispose();
  }
}
