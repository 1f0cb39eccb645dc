import type { PolicyOptimizerTicket, RuleDetail } from "../../src/providers/types";
import type { ReportLayout } from "../../src/commands/types";

export function makeTicket(overrides: Partial<PolicyOptimizerTicket> = {}): PolicyOptimizerTicket {
  return {
    id: 101,
    businessKey: "PO-101",
    status: "Review",
    createdDate: "2024-03-05T14:07:09.123Z",
    assignee: { username: "jdoe", displayName: "Jane Doe" },
    createdBy: { username: "ccreator", displayName: "Casey Creator" },
    workflowVersion: { workflow: { id: 7 } },
    variables: {
      deviceId: 12,
      deviceName: "edge-fw-01",
      policyGuid: "pol-1",
      policyName: "edge-policy",
      policyDisplayName: "Edge Policy",
      ruleGuid: "rule-1",
      ruleNumber: 4
    },
    ...overrides
  };
}

export function makeRule(overrides: Partial<RuleDetail> = {}): RuleDetail {
  return {
    ruleName: "allow-web",
    ruleAction: "ACCEPT",
    sources: [{ displayName: "10.0.0.0/24" }],
    destinations: [{ displayName: "web-servers" }, { displayName: "203.0.113.10" }],
    services: [{ displayName: "web", services: [{ formattedValue: "tcp/80" }, { formattedValue: "tcp/443" }] }],
    apps: [{ displayName: "Any" }],
    props: {
      owner: "Network Team",
      change_control_number: "CHG-1"
    },
    ...overrides
  };
}

export const fullLayout: ReportLayout = {
  detailFields: ["source", "destination", "service", "application", "action"],
  docFields: ["owner", "change_control_number"],
  missingDocFields: []
};

export const plainLayout: ReportLayout = {
  detailFields: [],
  docFields: [],
  missingDocFields: []
};
