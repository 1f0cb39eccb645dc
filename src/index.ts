export { runCli } from "./cli";
export { parseReportArgs, runReportCommand, buildReportBaseName, resolveReportSettings } from "./commands/report";
export { runWorkflowsCommand, renderWorkflowList } from "./commands/workflows";
export { renderTicketsCsv, escapeCsvField } from "./commands/render/ticketsCsv";
export { renderTicketsHtml, escapeHtml, loadReportAssets } from "./commands/render/ticketsHtml";
export { deliverReportEmail, buildEmailBody, buildEmailSubject, planSmtpTransport } from "./commands/shared/email";
export { loadRunConfig, parseRunConfig, buildGeneratedConfig, SAMPLE_RUN_CONFIG } from "./commands/shared/runConfig";
export {
  buildReportLayout,
  enrichTickets,
  extractRuleLocator,
  projectTicketRow,
  projectTicketRows,
  resolveDetailFields,
  resolveDocFields
} from "./commands/shared/ticketRows";
export {
  authenticate,
  buildRuleQuery,
  buildTicketQuery,
  getRuleDetail,
  listWorkflows,
  searchTickets
} from "./providers/policyOptimizer";
export type { PolicyOptimizerSession, PolicyOptimizerConnection } from "./providers/policyOptimizer";
export type { PolicyOptimizerTicket, PolicyOptimizerWorkflow, RuleDetail, RuleLocator, TicketStatusFilter } from "./providers/types";
export type { FieldSelection, ReportLayout, ReportSettings, TicketRow } from "./commands/types";
