import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { TICKET_STATUSES, type TicketStatusFilter } from "../../providers/types";
import type { ReportSettings } from "../types";
import { RULE_DETAIL_FIELDS } from "./ticketRows";
import { formatLocalDateTime } from "./time";

export const DEFAULT_SAMPLE_CONFIG_PATH = "config_sample.json";
export const SMTP_PASSWORD_PLACEHOLDER = "YOUR_SMTP_PASSWORD_HERE";

const STATUS_FILTERS: readonly TicketStatusFilter[] = ["all", ...TICKET_STATUSES];

/** Case-insensitive; returns the canonical spelling or `null`. */
export function parseStatusFilter(value: string): TicketStatusFilter | null {
  const wanted = value.trim().toLowerCase();
  return STATUS_FILTERS.find((status) => status.toLowerCase() === wanted) ?? null;
}

const StatusFilterSchema = z.string().transform((value, ctx) => {
  const status = parseStatusFilter(value);
  if (!status) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be one of ${STATUS_FILTERS.join(", ")}`
    });
    return z.NEVER;
  }

  return status;
});

const EmailConfigSchema = z.object({
  enabled: z.boolean().optional(),
  recipients: z.array(z.string().min(1)).optional(),
  smtp_server: z.string().nullish(),
  smtp_port: z.number().int().min(1).max(65_535).nullish(),
  smtp_user: z.string().nullish(),
  smtp_password: z.string().nullish()
});

const RunConfigSchema = z.object({
  host: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  workflow_id: z.number().int().positive().optional(),
  domain_id: z.number().int().positive().optional(),
  status: StatusFilterSchema.optional(),
  days: z.number().int().positive().nullish(),
  csv: z.boolean().optional(),
  html: z.boolean().optional(),
  include_rule_details: z.boolean().optional(),
  include_rule_docs: z.boolean().optional(),
  rule_detail_fields: z.array(z.string()).optional(),
  rule_doc_fields: z.array(z.string()).optional(),
  discovered_rule_doc_fields: z.array(z.string()).optional(),
  output_dir: z.string().min(1).optional(),
  log_file: z.string().min(1).optional(),
  email: EmailConfigSchema.optional(),
  _metadata: z.record(z.unknown()).optional()
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type EmailConfig = z.infer<typeof EmailConfigSchema>;

export const SAMPLE_RUN_CONFIG = {
  host: "https://policy-manager.example.com",
  username: "admin",
  password: "YOUR_PASSWORD_HERE",
  workflow_id: 2,
  status: "all",
  days: 30,
  csv: true,
  html: true,
  include_rule_details: true,
  include_rule_docs: true,
  rule_detail_fields: [...RULE_DETAIL_FIELDS],
  rule_doc_fields: [
    "owner",
    "approver",
    "change_control_number",
    "business_justification",
    "application_name",
    "verifier",
    "review_user",
    "customer"
  ],
  email: {
    enabled: false,
    recipients: ["admin@example.com", "team@example.com"],
    smtp_server: "smtp.example.com",
    smtp_port: 587,
    smtp_user: "sender@example.com",
    smtp_password: "YOUR_SMTP_PASSWORD"
  }
} satisfies RunConfig;

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${pathLabel} ${issue.message}`;
    })
    .join("; ")
    .slice(0, 500);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function parseRunConfig(raw: unknown): RunConfig {
  try {
    return RunConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw makeError("E_CONFIG_INVALID", formatZodIssues(error));
    }

    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_CONFIG_INVALID", message.slice(0, 220));
  }
}

export async function loadRunConfig(configPath: string, cwd: string = process.cwd()): Promise<RunConfig> {
  const resolvedPath = path.resolve(cwd, configPath);

  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw makeError("E_CONFIG_NOT_FOUND", `config file not found: ${resolvedPath}`);
    }

    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_CONFIG_READ", message.slice(0, 220));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_CONFIG_INVALID_JSON", `${resolvedPath}: ${message.slice(0, 200)}`);
  }

  return parseRunConfig(parsed);
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

export async function writeSampleConfig(filePath: string = DEFAULT_SAMPLE_CONFIG_PATH, cwd: string = process.cwd()): Promise<string> {
  const resolvedPath = path.resolve(cwd, filePath);
  await writeJson(resolvedPath, SAMPLE_RUN_CONFIG);
  return resolvedPath;
}

export interface GeneratedConfigContext {
  discoveredDocFields: string[];
  totalTickets: number;
  generatedAt: Date;
}

/**
 * Captures the effective settings of a run so it can be repeated with `--config`.
 * The login password is never written; an SMTP password becomes a placeholder.
 */
export function buildGeneratedConfig(settings: ReportSettings, context: GeneratedConfigContext): Record<string, unknown> {
  const { selection } = settings;
  const config: Record<string, unknown> = {
    host: settings.host,
    username: settings.username,
    workflow_id: settings.workflowId,
    domain_id: settings.domainId,
    status: settings.status,
    days: settings.days ?? null,
    csv: settings.formats.includes("csv"),
    html: settings.formats.includes("html"),
    include_rule_details: selection.includeRuleDetails,
    include_rule_docs: selection.includeRuleDocs,
    output_dir: settings.outputDir
  };

  if (selection.includeRuleDetails) {
    config.rule_detail_fields = selection.ruleDetailFields ?? [...RULE_DETAIL_FIELDS];
  }

  if (selection.includeRuleDocs) {
    if (context.discoveredDocFields.length > 0) {
      config.discovered_rule_doc_fields = context.discoveredDocFields;
    }
    config.rule_doc_fields = selection.ruleDocFields ?? context.discoveredDocFields;
  }

  if (settings.email) {
    const email: Record<string, unknown> = {
      enabled: true,
      recipients: settings.email.recipients
    };

    const smtp = settings.email.smtp;
    if (smtp) {
      email.smtp_server = smtp.server;
      email.smtp_port = smtp.port;
      if (smtp.user) {
        email.smtp_user = smtp.user;
        email.smtp_password = SMTP_PASSWORD_PLACEHOLDER;
      }
    }

    config.email = email;
  } else {
    config.email = { enabled: false };
  }

  config._metadata = {
    generated_on: formatLocalDateTime(context.generatedAt),
    total_tickets_found: context.totalTickets,
    note: "Password fields need to be filled in manually"
  };

  return config;
}

export async function writeGeneratedConfig(
  filePath: string,
  settings: ReportSettings,
  context: GeneratedConfigContext,
  cwd: string = process.cwd()
): Promise<string> {
  const resolvedPath = path.resolve(cwd, filePath);
  await writeJson(resolvedPath, buildGeneratedConfig(settings, context));
  return resolvedPath;
}
