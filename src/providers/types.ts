import { z } from "zod";

export const TICKET_STATUSES = ["Review", "Completed", "Cancelled"] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];

export type TicketStatusFilter = TicketStatus | "all";

const IdentifierSchema = z.union([z.number(), z.string()]);

const PolicyOptimizerUserSchema = z.object({
  username: z.string().nullish(),
  displayName: z.string().nullish()
});

const TicketVariablesSchema = z.object({
  deviceId: IdentifierSchema.nullish(),
  deviceName: z.string().nullish(),
  policyGuid: z.string().nullish(),
  policyName: z.string().nullish(),
  policyDisplayName: z.string().nullish(),
  ruleGuid: z.string().nullish(),
  ruleNumber: IdentifierSchema.nullish()
});

export const PolicyOptimizerTicketSchema = z.object({
  id: IdentifierSchema.nullish(),
  businessKey: z.string().nullish(),
  status: z.string().nullish(),
  createdDate: z.string().nullish(),
  completed: z.string().nullish(),
  assignee: PolicyOptimizerUserSchema.nullish(),
  completedBy: PolicyOptimizerUserSchema.nullish(),
  createdBy: PolicyOptimizerUserSchema.nullish(),
  workflowVersion: z
    .object({
      workflow: z
        .object({
          id: z.number().nullish()
        })
        .nullish()
    })
    .nullish(),
  variables: TicketVariablesSchema.nullish()
});

/** Records are checked one by one so a single malformed ticket cannot sink its page. */
export const TicketPageSchema = z.object({
  results: z.array(z.unknown()).nullish()
});

const RuleNamedObjectSchema = z.object({
  displayName: z.string().nullish()
});

export const RuleDetailSchema = z.object({
  ruleName: z.string().nullish(),
  ruleAction: z.string().nullish(),
  sources: z.array(RuleNamedObjectSchema).nullish(),
  destinations: z.array(RuleNamedObjectSchema).nullish(),
  services: z
    .array(
      z.object({
        displayName: z.string().nullish(),
        services: z
          .array(
            z.object({
              formattedValue: z.string().nullish()
            })
          )
          .nullish()
      })
    )
    .nullish(),
  apps: z.array(RuleNamedObjectSchema).nullish(),
  props: z.record(z.unknown()).nullish()
});

export const RuleSearchPageSchema = z.object({
  results: z.array(RuleDetailSchema).nullish()
});

export const WorkflowPageSchema = z.object({
  results: z
    .array(
      z.object({
        id: z.number(),
        name: z.string().nullish(),
        disabled: z.boolean().nullish()
      })
    )
    .nullish()
});

export type PolicyOptimizerUser = z.infer<typeof PolicyOptimizerUserSchema>;
export type TicketVariables = z.infer<typeof TicketVariablesSchema>;
export type PolicyOptimizerTicket = z.infer<typeof PolicyOptimizerTicketSchema>;
export type RuleDetail = z.infer<typeof RuleDetailSchema>;

export interface PolicyOptimizerWorkflow {
  id: number;
  name: string;
  disabled: boolean;
}

export interface TicketSearchFilter {
  workflowId: number;
  status?: TicketStatusFilter;
  days?: number;
}

export interface RuleLocator {
  deviceId: number | string;
  policyGuid: string;
  ruleGuid: string;
}

export function isTicketStatus(value: unknown): value is TicketStatus {
  return TICKET_STATUSES.some((status) => status === value);
}
