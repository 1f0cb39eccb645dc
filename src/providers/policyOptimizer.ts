import { Agent, fetch, type Dispatcher } from "undici";
import { z } from "zod";

import { silentLogger, type RunLogger } from "../commands/shared/logger";
import {
  PolicyOptimizerTicketSchema,
  RuleSearchPageSchema,
  TicketPageSchema,
  WorkflowPageSchema,
  type PolicyOptimizerTicket,
  type PolicyOptimizerWorkflow,
  type RuleDetail,
  type RuleLocator,
  type TicketSearchFilter
} from "./types";

export const DEFAULT_DOMAIN_ID = 1;
export const TICKET_PAGE_SIZE = 100;
export const REQUEST_TIMEOUT_MS = 30_000;
export const AUTH_TOKEN_HEADER = "X-FM-AUTH-Token";

const MAX_ERROR_SNIPPET = 200;

export interface PolicyOptimizerConnection {
  host: string;
  domainId: number;
  /** Defaults to an agent that skips certificate verification. */
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  logger?: RunLogger;
}

export interface PolicyOptimizerSession extends PolicyOptimizerConnection {
  token: string;
}

interface ApiResponse {
  status: number;
  body: string;
}

let insecureAgent: Agent | null = null;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false
      }
    });
  }

  return insecureAgent;
}

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function snippet(body: string): string {
  return body.trim().replace(/\s+/g, " ").slice(0, MAX_ERROR_SNIPPET);
}

export function describeRequestError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  if (error.name === "AbortError") {
    return "request timed out";
  }

  const cause = error.cause instanceof Error ? error.cause.message : null;
  return cause ? `${error.message} (${cause})` : error.message;
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

function parseJsonBody(body: string): unknown {
  return JSON.parse(body) as unknown;
}

export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, "");
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }

  return `https://${trimmed}`;
}

export function securityManagerApiUrl(connection: Pick<PolicyOptimizerConnection, "host">): string {
  return `${normalizeHost(connection.host)}/securitymanager/api`;
}

export function policyOptimizerApiUrl(connection: Pick<PolicyOptimizerConnection, "host">): string {
  return `${normalizeHost(connection.host)}/policyoptimizer/api`;
}

export function buildTicketQuery(filter: TicketSearchFilter): string {
  const workflow = `workflow = ${filter.workflowId}`;
  const status = filter.status && filter.status.toLowerCase() !== "all" ? `status = '${filter.status}'` : null;
  const days = filter.days && filter.days > 0 ? `created ~ DATE('-${filter.days} days')` : null;

  if (days) {
    const predicates = [workflow, status, days].filter((item): item is string => item !== null);
    return `review { (${predicates.join(" AND ")}) }`;
  }

  if (status) {
    return `review { ${workflow} AND ${status} }`;
  }

  return `review { ${workflow} }`;
}

export function buildRuleQuery(domainId: number, locator: RuleLocator): string {
  return [
    `domain{id=${domainId}}`,
    `device{id=${locator.deviceId}}`,
    `policy{uid='${locator.policyGuid}'}`,
    `rule{uid='${locator.ruleGuid}'}`
  ]
    .join(" and ")
    .concat(" | fields(tfacount, props, controlstat, usage(date('last 30 days')), change, highlight)");
}

async function sendRequest(
  connection: PolicyOptimizerConnection,
  url: string,
  init: { method: "GET" | "POST"; headers: Record<string, string>; body?: string }
): Promise<ApiResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort();
  }, connection.timeoutMs ?? REQUEST_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      method: init.method,
      headers: init.headers,
      body: init.body,
      signal: controller.signal,
      dispatcher: connection.dispatcher ?? getInsecureAgent()
    });

    return {
      status: response.status,
      body: await response.text()
    };
  } finally {
    clearTimeout(timeout);
  }
}

function sessionHeaders(session: PolicyOptimizerSession): Record<string, string> {
  return {
    [AUTH_TOKEN_HEADER]: session.token,
    "Content-Type": "application/json"
  };
}

/**
 * Exchanges credentials for a session token. Every failure is fatal for the run
 * and surfaces as an `E_AUTH_FAILED` error.
 */
export async function authenticate(
  connection: PolicyOptimizerConnection,
  username: string,
  password: string
): Promise<PolicyOptimizerSession> {
  const logger = connection.logger ?? silentLogger;
  const url = `${securityManagerApiUrl(connection)}/authentication/login`;

  let response: ApiResponse;
  try {
    response = await sendRequest(connection, url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ username, password })
    });
  } catch (error) {
    const message = describeRequestError(error);
    logger.error(`Error during authentication request: ${message}`);
    throw makeError("E_AUTH_FAILED", message);
  }

  if (response.status !== 200) {
    logger.error(`Authentication failed: ${response.status} ${snippet(response.body)}`);
    throw makeError("E_AUTH_FAILED", `HTTP ${response.status}`);
  }

  let token: unknown;
  try {
    const payload = parseJsonBody(response.body);
    token = payload && typeof payload === "object" && "token" in payload ? payload.token : undefined;
  } catch {
    token = undefined;
  }

  if (typeof token !== "string" || token.length === 0) {
    logger.error("Authentication succeeded but token not found in response.");
    throw makeError("E_AUTH_FAILED", "token not found in response");
  }

  logger.debug("Authentication token received.");
  return {
    ...connection,
    token
  };
}

export async function listWorkflows(session: PolicyOptimizerSession): Promise<PolicyOptimizerWorkflow[]> {
  const logger = session.logger ?? silentLogger;
  const url = `${policyOptimizerApiUrl(session)}/domain/${session.domainId}/workflow/?page=0&pageSize=100&search=&sort=name`;
  logger.debug(`Fetching workflows from: ${url}`);

  try {
    const response = await sendRequest(session, url, {
      method: "GET",
      headers: sessionHeaders(session)
    });

    if (response.status !== 200) {
      logger.error(`Failed to fetch workflows: HTTP ${response.status}`);
      logger.debug(`Response: ${snippet(response.body)}`);
      return [];
    }

    const page = WorkflowPageSchema.parse(parseJsonBody(response.body));
    const workflows = (page.results ?? []).map((item) => ({
      id: item.id,
      name: item.name ?? "Unknown",
      disabled: item.disabled ?? false
    }));

    logger.info(`Successfully fetched ${workflows.length} workflows`);
    return workflows;
  } catch (error) {
    const message = error instanceof z.ZodError ? formatZodIssues(error) : describeRequestError(error);
    logger.error(`Error fetching workflows: ${message}`);
    return [];
  }
}

export function buildTicketSearchUrl(session: Pick<PolicyOptimizerSession, "host" | "domainId">, query: string, page: number): string {
  const params = [
    `q=${encodeURIComponent(query)}`,
    `page=${page}`,
    `pageSize=${TICKET_PAGE_SIZE}`,
    "sortdir=desc",
    "sort=-createdDate",
    `domainId=${session.domainId}`
  ];

  return `${policyOptimizerApiUrl(session)}/siql/domain/${session.domainId}/review/paged-search?${params.join("&")}`;
}

/**
 * Pages through every ticket matching the filter. A failure on any page aborts
 * the whole search with `E_TICKET_FETCH_FAILED`; nothing is retried. A single
 * record that does not fit the ticket shape is logged and skipped.
 */
export async function searchTickets(
  session: PolicyOptimizerSession,
  filter: TicketSearchFilter
): Promise<PolicyOptimizerTicket[]> {
  const logger = session.logger ?? silentLogger;
  const query = buildTicketQuery(filter);
  const tickets: PolicyOptimizerTicket[] = [];

  logger.debug(`Ticket query: ${query}`);

  for (let page = 0; ; page += 1) {
    const url = buildTicketSearchUrl(session, query, page);

    let response: ApiResponse;
    try {
      response = await sendRequest(session, url, {
        method: "GET",
        headers: sessionHeaders(session)
      });
    } catch (error) {
      const message = describeRequestError(error);
      logger.error(`Error fetching tickets on page ${page}: ${message}`);
      throw makeError("E_TICKET_FETCH_FAILED", `page ${page}: ${message}`);
    }

    if (response.status !== 200) {
      logger.error(`Failed to fetch tickets: ${response.status} ${snippet(response.body)}`);
      throw makeError("E_TICKET_FETCH_FAILED", `page ${page}: HTTP ${response.status}`);
    }

    let results: unknown[];
    try {
      results = TicketPageSchema.parse(parseJsonBody(response.body)).results ?? [];
    } catch (error) {
      const message = error instanceof z.ZodError ? formatZodIssues(error) : describeRequestError(error);
      logger.error(`Failed to parse tickets from response: ${message}`);
      throw makeError("E_TICKET_FETCH_FAILED", `page ${page}: unreadable response (${message})`);
    }

    if (results.length === 0) {
      break;
    }

    results.forEach((record, index) => {
      const parsed = PolicyOptimizerTicketSchema.safeParse(record);
      if (parsed.success) {
        tickets.push(parsed.data);
        return;
      }

      logger.error(`Skipping ticket ${index} on page ${page}: ${formatZodIssues(parsed.error)}`);
    });
    logger.debug(`Fetched ${results.length} tickets on page ${page}`);

    if (results.length < TICKET_PAGE_SIZE) {
      break;
    }
  }

  logger.info(`Total tickets fetched: ${tickets.length}`);
  return tickets;
}

/** Soft lookup: any failure or an empty result yields `null`. */
export async function getRuleDetail(session: PolicyOptimizerSession, locator: RuleLocator): Promise<RuleDetail | null> {
  const logger = session.logger ?? silentLogger;
  const query = buildRuleQuery(session.domainId, locator);
  const url = `${securityManagerApiUrl(session)}/siql/secrule/paged-search?q=${encodeURIComponent(query)}`;

  try {
    const response = await sendRequest(session, url, {
      method: "GET",
      headers: sessionHeaders(session)
    });

    if (response.status !== 200) {
      logger.debug(`Rule lookup for ${locator.ruleGuid} returned HTTP ${response.status}`);
      return null;
    }

    const page = RuleSearchPageSchema.parse(parseJsonBody(response.body));
    return page.results?.[0] ?? null;
  } catch (error) {
    const message = error instanceof z.ZodError ? formatZodIssues(error) : describeRequestError(error);
    logger.debug(`Rule lookup for ${locator.ruleGuid} failed: ${message}`);
    return null;
  }
}
