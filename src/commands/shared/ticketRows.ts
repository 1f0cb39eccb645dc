import type { PolicyOptimizerTicket, PolicyOptimizerUser, RuleDetail, RuleLocator } from "../../providers/types";
import type { FieldSelection, ReportLayout, RuleDetailField, StatusSummary, TicketRow } from "../types";
import { silentLogger, type RunLogger } from "./logger";

export const PLACEHOLDER = "N/A";
export const UNRESTRICTED = "Any";

export const RULE_DETAIL_FIELDS: readonly RuleDetailField[] = ["source", "destination", "service", "application", "action"];

export const FIXED_CSV_COLUMNS = [
  "Ticket ID",
  "Created Date",
  "Completed Date",
  "Status",
  "Device Name",
  "Device ID",
  "Policy Name",
  "Rule Number",
  "Rule Name",
  "Assignee/Completed By",
  "Created By"
] as const;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/;

export interface EnrichedTicket {
  ticket: PolicyOptimizerTicket;
  rule: RuleDetail | null;
}

export interface EnrichmentResult {
  entries: EnrichedTicket[];
  observedDocFields: string[];
  lookups: number;
  enriched: number;
}

export interface DocFieldResolution {
  fields: string[];
  missing: string[];
}

export interface ProjectionResult {
  rows: TicketRow[];
  skipped: number;
}

export type RuleLookup = (locator: RuleLocator) => Promise<RuleDetail | null>;

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function isRuleDetailField(value: string): value is RuleDetailField {
  return RULE_DETAIL_FIELDS.some((field) => field === value);
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

/** Title-cases the way report headers always have: every alphabetic run starts upper-case. */
export function toTitleCase(value: string): string {
  let previousCased = false;
  let result = "";

  for (const char of value) {
    const cased = char.toLowerCase() !== char.toUpperCase();
    if (cased) {
      result += previousCased ? char.toLowerCase() : char.toUpperCase();
    } else {
      result += char;
    }

    previousCased = cased;
  }

  return result;
}

export function detailColumnTitle(field: RuleDetailField): string {
  return toTitleCase(field);
}

export function docFieldLabel(key: string): string {
  return toTitleCase(key.replace(/_/g, " "));
}

export function docColumnTitle(key: string): string {
  return `Rule Doc: ${docFieldLabel(key)}`;
}

export function extractRuleLocator(ticket: PolicyOptimizerTicket): RuleLocator | null {
  const variables = ticket.variables;
  if (!variables) {
    return null;
  }

  const deviceId = variables.deviceId;
  const policyGuid = variables.policyGuid;
  const ruleGuid = variables.ruleGuid;

  if (deviceId === null || deviceId === undefined || String(deviceId).trim().length === 0) {
    return null;
  }

  if (!policyGuid || !ruleGuid) {
    return null;
  }

  return { deviceId, policyGuid, ruleGuid };
}

/**
 * First pass: looks up the rule behind every ticket (when details or docs were
 * asked for) and collects every documentation key seen across the whole run.
 */
export async function enrichTickets(
  tickets: PolicyOptimizerTicket[],
  selection: Pick<FieldSelection, "includeRuleDetails" | "includeRuleDocs">,
  lookup: RuleLookup
): Promise<EnrichmentResult> {
  const needsLookup = selection.includeRuleDetails || selection.includeRuleDocs;
  const observed = new Set<string>();
  const entries: EnrichedTicket[] = [];
  let lookups = 0;
  let enriched = 0;

  for (const ticket of tickets) {
    const locator = needsLookup ? extractRuleLocator(ticket) : null;
    let rule: RuleDetail | null = null;

    if (locator) {
      lookups += 1;
      rule = await lookup(locator);
    }

    if (rule) {
      enriched += 1;
      if (selection.includeRuleDocs) {
        for (const key of Object.keys(rule.props ?? {})) {
          observed.add(key);
        }
      }
    }

    entries.push({ ticket, rule });
  }

  return {
    entries,
    observedDocFields: Array.from(observed).sort(),
    lookups,
    enriched
  };
}

export function resolveDetailFields(requested: string[] | undefined): RuleDetailField[] {
  if (requested === undefined) {
    return [...RULE_DETAIL_FIELDS];
  }

  return unique(requested.map((field) => field.trim().toLowerCase())).filter(isRuleDetailField);
}

export function resolveDocFields(
  observed: Iterable<string>,
  requested: string[] | undefined,
  includeDocs: boolean
): DocFieldResolution {
  if (!includeDocs) {
    return { fields: [], missing: [] };
  }

  const observedKeys = new Set(observed);
  if (requested === undefined) {
    return { fields: Array.from(observedKeys).sort(), missing: [] };
  }

  const wanted = unique(requested);
  return {
    fields: wanted.filter((key) => observedKeys.has(key)),
    missing: wanted.filter((key) => !observedKeys.has(key))
  };
}

export function buildReportLayout(selection: FieldSelection, observedDocFields: Iterable<string>): ReportLayout {
  const docs = resolveDocFields(observedDocFields, selection.ruleDocFields, selection.includeRuleDocs);

  return {
    detailFields: selection.includeRuleDetails ? resolveDetailFields(selection.ruleDetailFields) : [],
    docFields: docs.fields,
    missingDocFields: docs.missing
  };
}

export function csvHeaders(layout: ReportLayout): string[] {
  return [...FIXED_CSV_COLUMNS, ...layout.detailFields.map(detailColumnTitle), ...layout.docFields.map(docColumnTitle)];
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one.
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Renders an ISO timestamp as `YYYY-MM-DD HH:MM:SS`, keeping the wall time it was written in. */
export function formatTicketTimestamp(value: string): string {
  const match = value.trim().match(TIMESTAMP_PATTERN);
  if (!match) {
    throw makeError("E_ROW_TIMESTAMP", `unparseable timestamp '${value}'`);
  }

  const [, year = "", month = "", day = "", hour = "00", minute = "00", second = "00"] = match;
  const inRange =
    Number(month) >= 1 &&
    Number(month) <= 12 &&
    Number(day) >= 1 &&
    Number(day) <= daysInMonth(Number(year), Number(month)) &&
    Number(hour) <= 23 &&
    Number(minute) <= 59 &&
    Number(second) <= 59;

  if (!inRange) {
    throw makeError("E_ROW_TIMESTAMP", `unparseable timestamp '${value}'`);
  }

  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

export function displayUser(user: PolicyOptimizerUser | null | undefined): string {
  if (!user) {
    return PLACEHOLDER;
  }

  return user.displayName ?? user.username ?? PLACEHOLDER;
}

/** In-review tickets surface their assignee; finished ones whoever closed them. */
export function resolveAssigneeOrCompleter(ticket: PolicyOptimizerTicket): string {
  if (ticket.status === "Review") {
    return displayUser(ticket.assignee);
  }

  if (ticket.status === "Completed" || ticket.status === "Cancelled") {
    return displayUser(ticket.completedBy);
  }

  return PLACEHOLDER;
}

function joinOrUnrestricted(values: string[]): string {
  return values.length > 0 ? values.join(", ") : UNRESTRICTED;
}

export function formatRuleDetailField(rule: RuleDetail, field: RuleDetailField): string {
  switch (field) {
    case "source":
      return joinOrUnrestricted((rule.sources ?? []).map((item) => item.displayName ?? PLACEHOLDER));
    case "destination":
      return joinOrUnrestricted((rule.destinations ?? []).map((item) => item.displayName ?? PLACEHOLDER));
    case "service":
      return joinOrUnrestricted(
        (rule.services ?? []).flatMap((service) => (service.services ?? []).map((entry) => entry.formattedValue ?? PLACEHOLDER))
      );
    case "application":
      return joinOrUnrestricted(
        (rule.apps ?? []).filter((app) => app.displayName !== UNRESTRICTED).map((app) => app.displayName ?? PLACEHOLDER)
      );
    case "action":
      return rule.ruleAction ?? PLACEHOLDER;
  }
}

export function formatDocValue(value: unknown): string {
  if (value === null || value === undefined) {
    return PLACEHOLDER;
  }

  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => formatDocValue(item)).join(", ");
  }

  return JSON.stringify(value);
}

function optionalText(value: number | string | null | undefined): string {
  if (value === null || value === undefined) {
    return PLACEHOLDER;
  }

  return String(value);
}

/** Second pass: flattens one enriched ticket against the run-wide layout. Throws on malformed timestamps. */
export function projectTicketRow(entry: EnrichedTicket, layout: ReportLayout): TicketRow {
  const { ticket, rule } = entry;
  const variables = ticket.variables ?? {};
  const props: Record<string, unknown> = rule?.props ?? {};

  return {
    ticketId: ticket.businessKey ?? PLACEHOLDER,
    ticketRef: ticket.id === null || ticket.id === undefined ? "" : String(ticket.id),
    workflowId: ticket.workflowVersion?.workflow?.id ?? null,
    createdDate: ticket.createdDate ? formatTicketTimestamp(ticket.createdDate) : PLACEHOLDER,
    completedDate: ticket.completed ? formatTicketTimestamp(ticket.completed) : "",
    status: ticket.status ?? PLACEHOLDER,
    deviceName: variables.deviceName ?? PLACEHOLDER,
    deviceId: optionalText(variables.deviceId),
    policyName: variables.policyDisplayName ?? variables.policyName ?? PLACEHOLDER,
    ruleNumber: optionalText(variables.ruleNumber),
    ruleName: rule ? rule.ruleName ?? PLACEHOLDER : PLACEHOLDER,
    assigneeOrCompleter: resolveAssigneeOrCompleter(ticket),
    createdBy: displayUser(ticket.createdBy),
    locator: extractRuleLocator(ticket),
    details: layout.detailFields.map((field) => (rule ? formatRuleDetailField(rule, field) : PLACEHOLDER)),
    docs: layout.docFields.map((key) => (rule ? formatDocValue(props[key]) : PLACEHOLDER))
  };
}

export function projectTicketRows(
  entries: EnrichedTicket[],
  layout: ReportLayout,
  logger: RunLogger = silentLogger
): ProjectionResult {
  const rows: TicketRow[] = [];
  let skipped = 0;

  for (const entry of entries) {
    try {
      rows.push(projectTicketRow(entry, layout));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Error processing ticket ${entry.ticket.businessKey ?? "unknown"}: ${message}`);
      skipped += 1;
    }
  }

  return { rows, skipped };
}

export function countByStatus(tickets: PolicyOptimizerTicket[]): StatusSummary {
  return {
    total: tickets.length,
    review: tickets.filter((ticket) => ticket.status === "Review").length,
    completed: tickets.filter((ticket) => ticket.status === "Completed").length,
    cancelled: tickets.filter((ticket) => ticket.status === "Cancelled").length
  };
}
