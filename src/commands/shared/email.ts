import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import nodemailer, { type SendMailOptions } from "nodemailer";

import type { EmailSettings, SmtpSettings } from "../types";
import { silentLogger, type RunLogger } from "./logger";
import { formatLocalDate, formatLocalDateTime } from "./time";

export const SENDMAIL_PATH = "/usr/sbin/sendmail";
export const SMTP_TIMEOUT_MS = 30_000;

export type MailTransportPlan =
  | { kind: "sendmail" }
  | {
      kind: "smtp";
      host: string;
      port: number;
      secure: boolean;
      requireTLS: boolean;
      ignoreTLS: boolean;
      auth?: { user: string; pass: string };
    };

export interface MailSender {
  sendMail(message: SendMailOptions): Promise<unknown>;
  close(): void;
}

export type MailSenderFactory = (plan: MailTransportPlan) => MailSender;

export interface ReportEmailSummary {
  generatedAt: Date;
  workflowId: number;
  totalTickets: number;
  status: string;
  days?: number;
}

export interface EmailDeliveryResult {
  /** Recipients a message was accepted for. */
  sent: string[];
  failed: string[];
  errors: string[];
}

interface DeliverReportEmailOptions {
  createSender?: MailSenderFactory;
  logger?: RunLogger;
  hostname?: string;
}

export function buildEmailSubject(generatedAt: Date): string {
  return `Policy Optimizer Tickets Report - ${formatLocalDate(generatedAt)}`;
}

export function buildEmailBody(summary: ReportEmailSummary): string {
  const dateFilter = summary.days ? `Last ${summary.days} days` : "All time";
  return [
    "Policy Optimizer Tickets Report",
    "",
    `Generated: ${formatLocalDateTime(summary.generatedAt)}`,
    `Workflow ID: ${summary.workflowId}`,
    `Total Tickets: ${summary.totalTickets}`,
    `Status Filter: ${summary.status}`,
    `Date Filter: ${dateFilter}`,
    "",
    "Please find the attached report(s).",
    ""
  ].join("\n");
}

/** 587 upgrades with STARTTLS, 465 is TLS from the first byte, anything else stays plain. */
export function planSmtpTransport(smtp: SmtpSettings): MailTransportPlan {
  const auth = smtp.user && smtp.password ? { user: smtp.user, pass: smtp.password } : undefined;

  return {
    kind: "smtp",
    host: smtp.server,
    port: smtp.port,
    secure: smtp.port === 465,
    requireTLS: smtp.port === 587,
    ignoreTLS: smtp.port !== 587 && smtp.port !== 465,
    ...(auth ? { auth } : {})
  };
}

export function createNodemailerSender(plan: MailTransportPlan): MailSender {
  if (plan.kind === "sendmail") {
    return nodemailer.createTransport({
      sendmail: true,
      newline: "unix",
      path: SENDMAIL_PATH
    });
  }

  return nodemailer.createTransport({
    host: plan.host,
    port: plan.port,
    secure: plan.secure,
    requireTLS: plan.requireTLS,
    ignoreTLS: plan.ignoreTLS,
    auth: plan.auth,
    connectionTimeout: SMTP_TIMEOUT_MS,
    greetingTimeout: SMTP_TIMEOUT_MS,
    socketTimeout: SMTP_TIMEOUT_MS
  });
}

export function buildAttachments(filePaths: string[]): NonNullable<SendMailOptions["attachments"]> {
  return filePaths
    .filter((filePath) => fs.existsSync(filePath))
    .map((filePath) => ({
      filename: path.basename(filePath),
      path: filePath,
      contentType: "application/octet-stream",
      contentTransferEncoding: "base64" as const
    }));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sends the generated reports. Without an SMTP server every recipient gets a
 * separate message through the local sendmail binary; with one, a single
 * message goes to all recipients. Failures are logged and returned, never thrown.
 */
export async function deliverReportEmail(
  settings: EmailSettings,
  summary: ReportEmailSummary,
  attachmentPaths: string[],
  options: DeliverReportEmailOptions = {}
): Promise<EmailDeliveryResult> {
  const logger = options.logger ?? silentLogger;
  const createSender = options.createSender ?? createNodemailerSender;
  const localFrom = `policy-optimizer@${options.hostname ?? os.hostname()}`;
  const subject = buildEmailSubject(summary.generatedAt);
  const text = buildEmailBody(summary);
  const attachments = buildAttachments(attachmentPaths);
  const result: EmailDeliveryResult = { sent: [], failed: [], errors: [] };

  if (!settings.smtp) {
    logger.info("Sending report e-mail through the local mail system");

    let sender: MailSender;
    try {
      sender = createSender({ kind: "sendmail" });
    } catch (error) {
      const message = describeError(error);
      logger.error(`Local mail sending failed: ${message}`);
      return { sent: [], failed: [...settings.recipients], errors: [message] };
    }

    try {
      for (const recipient of settings.recipients) {
        try {
          await sender.sendMail({ from: localFrom, to: recipient, subject, text, attachments });
          logger.info(`Email sent to ${recipient}`);
          result.sent.push(recipient);
        } catch (error) {
          const message = describeError(error);
          logger.error(`Local mail sending to ${recipient} failed: ${message}`);
          result.failed.push(recipient);
          result.errors.push(message);
        }
      }
    } finally {
      sender.close();
    }

    return result;
  }

  const smtp = settings.smtp;
  logger.info(`Sending report e-mail through ${smtp.server}:${smtp.port}`);

  let sender: MailSender | null = null;
  try {
    sender = createSender(planSmtpTransport(smtp));
    await sender.sendMail({
      from: smtp.user ?? localFrom,
      to: settings.recipients.join(", "),
      subject,
      text,
      attachments
    });
    logger.info(`Email sent successfully to ${settings.recipients.join(", ")}`);
    result.sent.push(...settings.recipients);
  } catch (error) {
    const message = describeError(error);
    logger.error(`Email sending failed: ${message}`);
    result.failed.push(...settings.recipients);
    result.errors.push(message);
  } finally {
    sender?.close();
  }

  return result;
}

export function isValidEmailAddress(value: string): boolean {
  const [local, domain, ...rest] = value.split("@");
  return rest.length === 0 && Boolean(local) && domain !== undefined && domain.includes(".");
}
