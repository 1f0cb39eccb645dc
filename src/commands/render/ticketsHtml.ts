import fs from "node:fs";
import path from "node:path";

import { normalizeHost } from "../../providers/policyOptimizer";
import type { RuleLocator } from "../../providers/types";
import { detailColumnTitle, docColumnTitle, docFieldLabel, PLACEHOLDER } from "../shared/ticketRows";
import { formatLocalDateTime } from "../shared/time";
import type { ReportLayout, StatusSummary, TicketRow } from "../types";

export const DOC_VALUE_DISPLAY_LIMIT = 100;
export const MIN_TABLE_WIDTH = 1400;
export const COLUMN_WIDTH = 120;

const FIXED_HTML_COLUMNS = [
  "Ticket ID",
  "Created Date",
  "Created By",
  "Processed Date",
  "Assignee/Completed By",
  "Status",
  "Device Name",
  "Policy Name",
  "Rule #",
  "Rule Name"
] as const;

const DEFAULT_ASSET_DIR = path.resolve(__dirname, "..", "..", "..", "assets");

export interface HtmlReportAssets {
  style: string;
  script: string;
}

export interface TicketsHtmlInput {
  rows: TicketRow[];
  layout: ReportLayout;
  summary: StatusSummary;
  host: string;
  domainId: number;
  /** Used for ticket links when a ticket does not carry its own workflow id. */
  fallbackWorkflowId: number;
  generatedAt: Date;
  assets: HtmlReportAssets;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function loadReportAssets(assetDir: string = DEFAULT_ASSET_DIR): HtmlReportAssets {
  return {
    style: fs.readFileSync(path.join(assetDir, "report.css"), "utf8"),
    script: fs.readFileSync(path.join(assetDir, "report.js"), "utf8")
  };
}

export function tableMinWidth(layout: ReportLayout): number {
  const columns = FIXED_HTML_COLUMNS.length + layout.detailFields.length + layout.docFields.length;
  return Math.max(MIN_TABLE_WIDTH, columns * COLUMN_WIDTH);
}

export function ticketUrl(base: string, domainId: number, workflowId: number, ticketRef: string): string {
  return `${base}/policyoptimizer/#/domain/${domainId}/workflow/${workflowId}/review/${encodeURIComponent(ticketRef)}/view`;
}

export function deviceUrl(base: string, domainId: number, deviceId: string): string {
  return `${base}/securitymanager/#/domain/${domainId}/device/${encodeURIComponent(deviceId)}/dashboard`;
}

export function ruleUrl(base: string, domainId: number, locator: RuleLocator | null): string {
  if (!locator) {
    return "#";
  }

  return [
    `${base}/securitymanager/#/domain/${domainId}`,
    `device/${encodeURIComponent(String(locator.deviceId))}`,
    `policy/${encodeURIComponent(locator.policyGuid)}`,
    `rule/${encodeURIComponent(locator.ruleGuid)}`,
    "dashboard?usageDays=30"
  ].join("/");
}

function link(href: string, text: string): string {
  return `<a href="${escapeHtml(href)}" target="_blank">${escapeHtml(text)}</a>`;
}

function renderDocCell(value: string): string {
  // Counted in code points so the cut never splits a surrogate pair.
  const characters = Array.from(value);
  if (characters.length <= DOC_VALUE_DISPLAY_LIMIT) {
    return `<td class="text-wrap">${escapeHtml(value)}</td>`;
  }

  const shown = `${characters.slice(0, DOC_VALUE_DISPLAY_LIMIT).join("")}...`;
  return `<td class="text-wrap" title="${escapeHtml(value)}">${escapeHtml(shown)}</td>`;
}

function renderSummaryTile(label: string, value: number, status: string): string {
  return [
    `        <div class="summary-item" data-status="${escapeHtml(status)}">`,
    `          <div class="summary-label">${escapeHtml(label)}</div>`,
    `          <div class="summary-value">${value}</div>`,
    "        </div>"
  ].join("\n");
}

function renderRow(row: TicketRow, base: string, input: TicketsHtmlInput): string {
  const workflowId = row.workflowId ?? input.fallbackWorkflowId;
  const cells = [
    `<td>${row.ticketRef ? link(ticketUrl(base, input.domainId, workflowId, row.ticketRef), row.ticketId) : escapeHtml(row.ticketId)}</td>`,
    `<td>${escapeHtml(row.createdDate)}</td>`,
    `<td>${escapeHtml(row.createdBy)}</td>`,
    `<td>${escapeHtml(row.completedDate)}</td>`,
    `<td>${escapeHtml(row.assigneeOrCompleter)}</td>`,
    `<td><span class="status status-${escapeHtml(row.status.toLowerCase())}">${escapeHtml(row.status)}</span></td>`,
    `<td>${row.deviceId !== PLACEHOLDER ? link(deviceUrl(base, input.domainId, row.deviceId), row.deviceName) : escapeHtml(row.deviceName)}</td>`,
    `<td>${escapeHtml(row.policyName)}</td>`,
    `<td>${escapeHtml(row.ruleNumber)}</td>`,
    `<td>${link(ruleUrl(base, input.domainId, row.locator), row.ruleName)}</td>`,
    ...row.details.map((value) => `<td class="text-wrap">${escapeHtml(value)}</td>`),
    ...row.docs.map(renderDocCell)
  ];

  return `          <tr>${cells.join("")}</tr>`;
}

export function renderTicketsHtml(input: TicketsHtmlInput): string {
  const base = normalizeHost(input.host);
  const minWidth = tableMinWidth(input.layout);
  const headers = [
    ...FIXED_HTML_COLUMNS.map((title) => `<th>${escapeHtml(title)}</th>`),
    ...input.layout.detailFields.map((field) => `<th class="detail-header">${escapeHtml(detailColumnTitle(field))}</th>`),
    ...input.layout.docFields.map(
      (key) => `<th class="prop-header" title="${escapeHtml(docColumnTitle(key))}">${escapeHtml(docFieldLabel(key))}</th>`
    )
  ];

  const lines: string[] = [];
  lines.push("<!DOCTYPE html>");
  lines.push('<html lang="en">');
  lines.push("<head>");
  lines.push('  <meta charset="UTF-8">');
  lines.push('  <meta name="viewport" content="width=device-width, initial-scale=1.0">');
  lines.push("  <title>Policy Optimizer Tickets Report</title>");
  lines.push("  <style>");
  lines.push(`    :root { --table-min-width: ${minWidth}px; --page-min-width: ${minWidth + 40}px; }`);
  lines.push(input.assets.style.trimEnd());
  lines.push("  </style>");
  lines.push("</head>");
  lines.push("<body>");
  lines.push('  <div class="header-section">');
  lines.push("    <h1>Policy Optimizer Tickets Report</h1>");
  lines.push(`    <div class="subtitle">Generated: ${escapeHtml(formatLocalDateTime(input.generatedAt))}</div>`);
  lines.push('    <div class="summary">');
  lines.push('      <div class="summary-title">Summary</div>');
  lines.push('      <div class="summary-items">');
  lines.push(renderSummaryTile("Total Tickets", input.summary.total, ""));
  lines.push(renderSummaryTile("In Review", input.summary.review, "Review"));
  lines.push(renderSummaryTile("Completed", input.summary.completed, "Completed"));
  lines.push(renderSummaryTile("Cancelled", input.summary.cancelled, "Cancelled"));
  lines.push("      </div>");
  lines.push("    </div>");
  lines.push('    <div class="filters">');
  lines.push('      <input type="text" id="searchInput" placeholder="Search tickets...">');
  lines.push('      <select id="statusFilter">');
  lines.push('        <option value="">All Statuses</option>');
  lines.push('        <option value="Review">Review</option>');
  lines.push('        <option value="Completed">Completed</option>');
  lines.push('        <option value="Cancelled">Cancelled</option>');
  lines.push("      </select>");
  lines.push('      <button type="button" id="clearFilters">Clear Filters</button>');
  lines.push("    </div>");
  lines.push('    <div id="filterInfo" style="display: none;"></div>');
  lines.push("  </div>");
  lines.push('  <div class="table-section">');
  lines.push('    <table id="ticketsTable">');
  lines.push("      <thead>");
  lines.push(`        <tr>${headers.join("")}</tr>`);
  lines.push("      </thead>");
  lines.push("      <tbody>");
  for (const row of input.rows) {
    lines.push(renderRow(row, base, input));
  }
  lines.push("      </tbody>");
  lines.push("    </table>");
  lines.push("  </div>");
  lines.push("  <script>");
  lines.push(input.assets.script.trimEnd());
  lines.push("  </script>");
  lines.push("</body>");
  lines.push("</html>");

  return `${lines.join("\n")}\n`;
}
