import assert from "node:assert/strict";
import test from "node:test";

import {
  escapeHtml,
  loadReportAssets,
  renderTicketsHtml,
  ruleUrl,
  tableMinWidth,
  type TicketsHtmlInput
} from "../src/commands/render/ticketsHtml";
import { renderTicketsCsv } from "../src/commands/render/ticketsCsv";
import { projectTicketRow } from "../src/commands/shared/ticketRows";
import type { ReportLayout, TicketRow } from "../src/commands/types";
import { fullLayout, makeRule, makeTicket, plainLayout } from "./helpers/fixtures";

const assets = {
  style: "body { color: black; }",
  script: "console.log('report');"
};

function renderWith(rows: TicketRow[], layout: ReportLayout, overrides: Partial<TicketsHtmlInput> = {}): string {
  return renderTicketsHtml({
    rows,
    layout,
    summary: { total: rows.length, review: 1, completed: 2, cancelled: 3 },
    host: "po.example.test/",
    domainId: 1,
    fallbackWorkflowId: 2,
    generatedAt: new Date(2024, 2, 5, 9, 30, 0),
    assets,
    ...overrides
  });
}

test("escapeHtml escapes markup and quotes", () => {
  assert.equal(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`), "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;");
});

test("ticket, device and rule cells link into the management console", () => {
  const row = projectTicketRow({ ticket: makeTicket(), rule: makeRule() }, plainLayout);
  const html = renderWith([row], plainLayout);

  assert.ok(
    html.includes(
      '<td><a href="https://po.example.test/policyoptimizer/#/domain/1/workflow/7/review/101/view" target="_blank">PO-101</a></td>'
    )
  );
  assert.ok(
    html.includes('<td><a href="https://po.example.test/securitymanager/#/domain/1/device/12/dashboard" target="_blank">edge-fw-01</a></td>')
  );
  assert.ok(
    html.includes(
      '<td><a href="https://po.example.test/securitymanager/#/domain/1/device/12/policy/pol-1/rule/rule-1/dashboard?usageDays=30" target="_blank">allow-web</a></td>'
    )
  );
  assert.ok(html.includes('<td><span class="status status-review">Review</span></td>'));
});

test("ticket links fall back to the run workflow and rule links to # without a locator", () => {
  const base = makeTicket().variables ?? {};
  const row = projectTicketRow(
    { ticket: makeTicket({ workflowVersion: null, variables: { ...base, policyGuid: null } }), rule: null },
    plainLayout
  );
  const html = renderWith([row], plainLayout);

  assert.ok(html.includes('href="https://po.example.test/policyoptimizer/#/domain/1/workflow/2/review/101/view"'));
  assert.ok(html.includes('<td><a href="#" target="_blank">N/A</a></td>'));
  assert.ok(
    html.includes('<td><a href="https://po.example.test/securitymanager/#/domain/1/device/12/dashboard" target="_blank">edge-fw-01</a></td>')
  );
  assert.equal(ruleUrl("https://po.example.test", 1, null), "#");
});

test("the device cell stays plain text without a device id", () => {
  const base = makeTicket().variables ?? {};
  const row = projectTicketRow({ ticket: makeTicket({ variables: { ...base, deviceId: null } }), rule: null }, plainLayout);
  const html = renderWith([row], plainLayout);

  assert.ok(html.includes("<td>edge-fw-01</td>"));
  assert.equal(html.includes("/device/"), false);
});

test("a rule without documentation properties renders N/A doc cells in both formats", () => {
  const layout: ReportLayout = { detailFields: [], docFields: ["owner", "change_control_number"], missingDocFields: [] };
  const row = projectTicketRow({ ticket: makeTicket(), rule: makeRule({ props: null }) }, layout);
  const html = renderWith([row], layout);
  const csv = renderTicketsCsv([row], layout);

  assert.deepEqual(row.docs, ["N/A", "N/A"]);
  assert.ok(html.includes('>allow-web</a></td><td class="text-wrap">N/A</td><td class="text-wrap">N/A</td></tr>'));
  assert.equal(csv.split("\r\n")[1]?.endsWith(",allow-web,Jane Doe,Casey Creator,N/A,N/A"), true);
});

test("long documentation values are cut in the cell and kept whole in the title", () => {
  const longValue = "x".repeat(150);
  const layout: ReportLayout = { detailFields: [], docFields: ["owner"], missingDocFields: [] };
  const row = projectTicketRow({ ticket: makeTicket(), rule: makeRule({ props: { owner: longValue } }) }, layout);
  const html = renderWith([row], layout);

  assert.ok(html.includes(`<td class="text-wrap" title="${longValue}">${"x".repeat(100)}...</td>`));
});

test("the documentation cut counts characters, not UTF-16 units", () => {
  const value = `${"a".repeat(99)}\u{1F525}tail`;
  const layout: ReportLayout = { detailFields: [], docFields: ["owner"], missingDocFields: [] };
  const row = projectTicketRow({ ticket: makeTicket(), rule: makeRule({ props: { owner: value } }) }, layout);
  const html = renderWith([row], layout);

  assert.ok(html.includes(`<td class="text-wrap" title="${value}">${"a".repeat(99)}\u{1F525}...</td>`));
});

test("values from the server are escaped before they reach the page", () => {
  const base = makeTicket().variables ?? {};
  const row = projectTicketRow(
    { ticket: makeTicket({ variables: { ...base, policyDisplayName: "<img src=x onerror=alert(1)>" } }), rule: null },
    plainLayout
  );
  const html = renderWith([row], plainLayout);

  assert.ok(html.includes("<td>&lt;img src=x onerror=alert(1)&gt;</td>"));
  assert.equal(html.includes("<img src=x"), false);
});

test("headers, summary tiles and table width follow the layout", () => {
  const row = projectTicketRow({ ticket: makeTicket(), rule: makeRule() }, fullLayout);
  const html = renderWith([row], fullLayout);

  assert.equal(tableMinWidth(fullLayout), 2040);
  assert.equal(tableMinWidth(plainLayout), 1400);
  assert.ok(html.includes(":root { --table-min-width: 2040px; --page-min-width: 2080px; }"));
  assert.ok(html.includes('<th class="detail-header">Source</th>'));
  assert.ok(html.includes('<th class="prop-header" title="Rule Doc: Change Control Number">Change Control Number</th>'));
  assert.ok(html.includes('<div class="summary-item" data-status="Completed">'));
  assert.ok(html.includes('<div class="summary-value">3</div>'));
  assert.ok(html.includes('<div class="subtitle">Generated: 2024-03-05 09:30:00</div>'));
  assert.ok(html.includes("console.log('report');"));
  assert.ok(html.includes('<button type="button" id="clearFilters">Clear Filters</button>'));
});

test("loadReportAssets reads the packaged stylesheet and script", () => {
  const loaded = loadReportAssets();

  assert.ok(loaded.style.includes(".status-review"));
  assert.ok(loaded.script.includes("function sortTable(columnIndex)"));
  assert.ok(loaded.script.includes("function clearFilters()"));
});
