import assert from "node:assert/strict";
import test from "node:test";

import { createMemoryLogger } from "../src/commands/shared/logger";
import {
  buildReportLayout,
  countByStatus,
  csvHeaders,
  docColumnTitle,
  enrichTickets,
  extractRuleLocator,
  formatDocValue,
  formatRuleDetailField,
  formatTicketTimestamp,
  projectTicketRow,
  projectTicketRows,
  resolveDetailFields,
  resolveDocFields,
  toTitleCase
} from "../src/commands/shared/ticketRows";
import type { RuleLocator } from "../src/providers/types";
import { fullLayout, makeRule, makeTicket } from "./helpers/fixtures";

test("extractRuleLocator requires device id, policy guid and rule guid", () => {
  assert.deepEqual(extractRuleLocator(makeTicket()), { deviceId: 12, policyGuid: "pol-1", ruleGuid: "rule-1" });

  const base = makeTicket().variables ?? {};
  assert.equal(extractRuleLocator(makeTicket({ variables: { ...base, deviceId: null } })), null);
  assert.equal(extractRuleLocator(makeTicket({ variables: { ...base, deviceId: " " } })), null);
  assert.equal(extractRuleLocator(makeTicket({ variables: { ...base, policyGuid: undefined } })), null);
  assert.equal(extractRuleLocator(makeTicket({ variables: { ...base, ruleGuid: "" } })), null);
  assert.equal(extractRuleLocator(makeTicket({ variables: null })), null);
});

test("enrichTickets looks up only complete locators and collects doc keys across the run", async () => {
  const base = makeTicket().variables ?? {};
  const tickets = [
    makeTicket({ businessKey: "PO-1" }),
    makeTicket({ businessKey: "PO-2", variables: { ...base, ruleGuid: "rule-2" } }),
    makeTicket({ businessKey: "PO-3", variables: { ...base, policyGuid: null } })
  ];
  const requested: RuleLocator[] = [];

  const result = await enrichTickets(tickets, { includeRuleDetails: false, includeRuleDocs: true }, async (locator) => {
    requested.push(locator);
    return locator.ruleGuid === "rule-2" ? makeRule({ props: { zone: "dmz", owner: "Ops" } }) : makeRule();
  });

  assert.deepEqual(
    requested.map((locator) => locator.ruleGuid),
    ["rule-1", "rule-2"]
  );
  assert.equal(result.lookups, 2);
  assert.equal(result.enriched, 2);
  assert.deepEqual(result.observedDocFields, ["change_control_number", "owner", "zone"]);
  assert.equal(result.entries[2]?.rule, null);
});

test("enrichTickets skips every lookup when neither details nor docs are requested", async () => {
  let calls = 0;
  const result = await enrichTickets([makeTicket()], { includeRuleDetails: false, includeRuleDocs: false }, async () => {
    calls += 1;
    return makeRule();
  });

  assert.equal(calls, 0);
  assert.equal(result.entries[0]?.rule, null);
  assert.deepEqual(result.observedDocFields, []);
});

test("enrichTickets does not collect doc keys for a details-only run", async () => {
  const result = await enrichTickets([makeTicket()], { includeRuleDetails: true, includeRuleDocs: false }, async () => makeRule());

  assert.equal(result.enriched, 1);
  assert.deepEqual(result.observedDocFields, []);
});

test("resolveDocFields keeps requested order, drops unobserved keys and reports them", () => {
  const observed = ["owner", "approver", "customer"];

  assert.deepEqual(resolveDocFields(observed, ["customer", "verifier", "owner"], true), {
    fields: ["customer", "owner"],
    missing: ["verifier"]
  });
  assert.deepEqual(resolveDocFields(observed, undefined, true), {
    fields: ["approver", "customer", "owner"],
    missing: []
  });
  assert.deepEqual(resolveDocFields(observed, [], true), { fields: [], missing: [] });
  assert.deepEqual(resolveDocFields(observed, ["owner"], false), { fields: [], missing: [] });
});

test("resolveDetailFields defaults to every field and ignores unknown names", () => {
  assert.deepEqual(resolveDetailFields(undefined), ["source", "destination", "service", "application", "action"]);
  assert.deepEqual(resolveDetailFields(["Action", "source", "zone", "action"]), ["action", "source"]);
});

test("buildReportLayout omits detail columns unless details are included", () => {
  const layout = buildReportLayout(
    { includeRuleDetails: false, includeRuleDocs: true, ruleDetailFields: ["source"], ruleDocFields: ["owner", "customer"] },
    ["owner"]
  );

  assert.deepEqual(layout, { detailFields: [], docFields: ["owner"], missingDocFields: ["customer"] });
});

test("csvHeaders appends title-cased detail and doc columns to the fixed columns", () => {
  assert.deepEqual(csvHeaders(fullLayout), [
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
    "Created By",
    "Source",
    "Destination",
    "Service",
    "Application",
    "Action",
    "Rule Doc: Owner",
    "Rule Doc: Change Control Number"
  ]);
});

test("toTitleCase upper-cases the first letter of every alphabetic run", () => {
  assert.equal(toTitleCase("change control NUMBER"), "Change Control Number");
  assert.equal(toTitleCase("o'neil ip2vlan"), "O'Neil Ip2Vlan");
  assert.equal(docColumnTitle("review_user"), "Rule Doc: Review User");
});

test("formatRuleDetailField renders Any for empty or Any-only lists", () => {
  const rule = makeRule({ sources: [], apps: [{ displayName: "Any" }] });

  assert.equal(formatRuleDetailField(rule, "source"), "Any");
  assert.equal(formatRuleDetailField(rule, "application"), "Any");
  assert.equal(formatRuleDetailField(rule, "destination"), "web-servers, 203.0.113.10");
  assert.equal(formatRuleDetailField(rule, "service"), "tcp/80, tcp/443");
  assert.equal(formatRuleDetailField(rule, "action"), "ACCEPT");

  const withApps = makeRule({ apps: [{ displayName: "Any" }, { displayName: "ssl" }, { displayName: "web-browsing" }] });
  assert.equal(formatRuleDetailField(withApps, "application"), "ssl, web-browsing");
  assert.equal(formatRuleDetailField(makeRule({ services: null, ruleAction: null }), "service"), "Any");
  assert.equal(formatRuleDetailField(makeRule({ ruleAction: null }), "action"), "N/A");
});

test("formatDocValue flattens arrays and objects", () => {
  assert.equal(formatDocValue(null), "N/A");
  assert.equal(formatDocValue(42), "42");
  assert.equal(formatDocValue(["a", "b"]), "a, b");
  assert.equal(formatDocValue({ team: "net" }), '{"team":"net"}');
});

test("formatTicketTimestamp keeps the written wall time", () => {
  assert.equal(formatTicketTimestamp("2024-03-05T14:07:09.123Z"), "2024-03-05 14:07:09");
  assert.equal(formatTicketTimestamp("2024-03-05T14:07:09.123+0000"), "2024-03-05 14:07:09");
  assert.equal(formatTicketTimestamp("2024-03-05T23:59:00-05:00"), "2024-03-05 23:59:00");
  assert.equal(formatTicketTimestamp("2024-03-05"), "2024-03-05 00:00:00");
  assert.throws(() => formatTicketTimestamp("yesterday"), /^Error: E_ROW_TIMESTAMP: unparseable timestamp 'yesterday'$/);
  assert.throws(() => formatTicketTimestamp("2024-13-05T10:00:00Z"), /E_ROW_TIMESTAMP/);
  assert.throws(() => formatTicketTimestamp("2024-02-31T10:00:00Z"), /^Error: E_ROW_TIMESTAMP: unparseable timestamp '2024-02-31T10:00:00Z'$/);
  assert.throws(() => formatTicketTimestamp("2023-02-29T10:00:00Z"), /E_ROW_TIMESTAMP/);
  assert.equal(formatTicketTimestamp("2024-02-29T10:00:00Z"), "2024-02-29 10:00:00");
});

test("projectTicketRow flattens an enriched review ticket", () => {
  const row = projectTicketRow({ ticket: makeTicket(), rule: makeRule() }, fullLayout);

  assert.deepEqual(row, {
    ticketId: "PO-101",
    ticketRef: "101",
    workflowId: 7,
    createdDate: "2024-03-05 14:07:09",
    completedDate: "",
    status: "Review",
    deviceName: "edge-fw-01",
    deviceId: "12",
    policyName: "Edge Policy",
    ruleNumber: "4",
    ruleName: "allow-web",
    assigneeOrCompleter: "Jane Doe",
    createdBy: "Casey Creator",
    locator: { deviceId: 12, policyGuid: "pol-1", ruleGuid: "rule-1" },
    details: ["10.0.0.0/24", "web-servers, 203.0.113.10", "tcp/80, tcp/443", "Any", "ACCEPT"],
    docs: ["Network Team", "CHG-1"]
  });
});

test("completed and cancelled tickets report who closed them", () => {
  const closedBy = { username: "rreviewer", displayName: null };
  const completed = projectTicketRow(
    {
      ticket: makeTicket({ status: "Completed", completed: "2024-03-06T08:00:00Z", completedBy: closedBy }),
      rule: null
    },
    fullLayout
  );
  const cancelled = projectTicketRow({ ticket: makeTicket({ status: "Cancelled", completedBy: null }), rule: null }, fullLayout);

  assert.equal(completed.assigneeOrCompleter, "rreviewer");
  assert.equal(completed.completedDate, "2024-03-06 08:00:00");
  assert.equal(cancelled.assigneeOrCompleter, "N/A");
});

test("tickets without an enriched rule render N/A in every detail and doc column", () => {
  const base = makeTicket().variables ?? {};
  const row = projectTicketRow({ ticket: makeTicket({ variables: { ...base, ruleGuid: null } }), rule: null }, fullLayout);

  assert.equal(row.locator, null);
  assert.equal(row.ruleName, "N/A");
  assert.deepEqual(row.details, ["N/A", "N/A", "N/A", "N/A", "N/A"]);
  assert.deepEqual(row.docs, ["N/A", "N/A"]);
});

test("a rule without documentation properties yields N/A doc columns", () => {
  const row = projectTicketRow({ ticket: makeTicket(), rule: makeRule({ props: null }) }, fullLayout);

  assert.deepEqual(row.docs, ["N/A", "N/A"]);
  assert.equal(row.details[4], "ACCEPT");
});

test("projectTicketRows logs and skips rows that fail to project", () => {
  const logger = createMemoryLogger(() => new Date(2024, 0, 2, 3, 4, 5));
  const result = projectTicketRows(
    [
      { ticket: makeTicket({ businessKey: "PO-1" }), rule: null },
      { ticket: makeTicket({ businessKey: "PO-2", createdDate: "not a date" }), rule: null }
    ],
    fullLayout,
    logger
  );

  assert.equal(result.skipped, 1);
  assert.deepEqual(
    result.rows.map((row) => row.ticketId),
    ["PO-1"]
  );
  assert.deepEqual(
    logger.entries.map((entry) => `${entry.level} ${entry.message}`),
    ["ERROR Error processing ticket PO-2: E_ROW_TIMESTAMP: unparseable timestamp 'not a date'"]
  );
});

test("countByStatus tallies the three ticket states", () => {
  assert.deepEqual(
    countByStatus([
      makeTicket({ status: "Review" }),
      makeTicket({ status: "Completed" }),
      makeTicket({ status: "Completed" }),
      makeTicket({ status: "Cancelled" }),
      makeTicket({ status: "Draft" })
    ]),
    { total: 5, review: 1, completed: 2, cancelled: 1 }
  );
});
