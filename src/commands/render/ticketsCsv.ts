import { csvHeaders } from "../shared/ticketRows";
import type { ReportLayout, TicketRow } from "../types";

export const CSV_LINE_TERMINATOR = "\r\n";

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }

  return `"${value.replace(/"/g, '""')}"`;
}

export function renderCsvLine(values: string[]): string {
  return `${values.map(escapeCsvField).join(",")}${CSV_LINE_TERMINATOR}`;
}

export function ticketRowToCsvValues(row: TicketRow): string[] {
  return [
    row.ticketId,
    row.createdDate,
    row.completedDate,
    row.status,
    row.deviceName,
    row.deviceId,
    row.policyName,
    row.ruleNumber,
    row.ruleName,
    row.assigneeOrCompleter,
    row.createdBy,
    ...row.details,
    ...row.docs
  ];
}

export function renderTicketsCsv(rows: TicketRow[], layout: ReportLayout): string {
  return [csvHeaders(layout), ...rows.map(ticketRowToCsvValues)].map(renderCsvLine).join("");
}
