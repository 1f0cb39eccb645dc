import type { Dispatcher } from "undici";

import type { RuleLocator, TicketStatusFilter } from "../providers/types";
import type { MailSenderFactory } from "./shared/email";
import type { RunLogger } from "./shared/logger";
import type { Prompter } from "./shared/prompts";

export type RuleDetailField = "source" | "destination" | "service" | "application" | "action";

export type ReportFormat = "csv" | "html";

export interface FieldSelection {
  includeRuleDetails: boolean;
  includeRuleDocs: boolean;
  /** `undefined` selects every detail field. */
  ruleDetailFields?: string[];
  /** `undefined` selects every documentation key observed in the run. */
  ruleDocFields?: string[];
}

export interface ReportLayout {
  detailFields: RuleDetailField[];
  docFields: string[];
  missingDocFields: string[];
}

export interface TicketRow {
  ticketId: string;
  ticketRef: string;
  workflowId: number | null;
  createdDate: string;
  completedDate: string;
  status: string;
  deviceName: string;
  deviceId: string;
  policyName: string;
  ruleNumber: string;
  ruleName: string;
  assigneeOrCompleter: string;
  createdBy: string;
  locator: RuleLocator | null;
  /** Aligned with `ReportLayout.detailFields`. */
  details: string[];
  /** Aligned with `ReportLayout.docFields`. */
  docs: string[];
}

export interface StatusSummary {
  total: number;
  review: number;
  completed: number;
  cancelled: number;
}

export interface SmtpSettings {
  server: string;
  port: number;
  user?: string;
  password?: string;
}

export interface EmailSettings {
  recipients: string[];
  /** Absent means hand the messages to the local mail transfer agent. */
  smtp?: SmtpSettings;
}

export interface ReportSettings {
  host: string;
  username: string;
  password: string;
  domainId: number;
  workflowId: number;
  status: TicketStatusFilter;
  days?: number;
  formats: ReportFormat[];
  selection: FieldSelection;
  outputDir: string;
  email: EmailSettings | null;
}

export interface GeneratedReports {
  csvPath: string | null;
  htmlPath: string | null;
  csvRows: number;
  htmlRows: number;
}

/** Seams the commands take so tests can run them in process. */
export interface CommandDeps {
  dispatcher?: Dispatcher;
  /** Replaces the console prompter; ignored with `--non-interactive`. */
  prompter?: Prompter;
  /** Replaces the run log file. */
  logger?: RunLogger;
  write?: (text: string) => void;
  now?: () => Date;
  createSender?: MailSenderFactory;
  cwd?: string;
  hostname?: string;
}
