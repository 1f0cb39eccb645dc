import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import nodemailer from "nodemailer";

import {
  buildAttachments,
  buildEmailBody,
  buildEmailSubject,
  deliverReportEmail,
  isValidEmailAddress,
  planSmtpTransport,
  type MailSenderFactory,
  type MailTransportPlan
} from "../src/commands/shared/email";
import { createMemoryLogger } from "../src/commands/shared/logger";

const summary = {
  generatedAt: new Date(2024, 2, 5, 9, 30, 0),
  workflowId: 2,
  totalTickets: 5,
  status: "all",
  days: 30
};

function streamSenderFactory(plans: MailTransportPlan[], messages: string[]): MailSenderFactory {
  return (plan) => {
    plans.push(plan);
    const transport = nodemailer.createTransport({ streamTransport: true, buffer: true, newline: "unix" });
    return {
      sendMail: async (message) => {
        const info = await transport.sendMail(message);
        messages.push(Buffer.isBuffer(info.message) ? info.message.toString("utf8") : "");
        return info;
      },
      close: () => {
        transport.close();
      }
    };
  };
}

test("subject and body describe the run", () => {
  assert.equal(buildEmailSubject(summary.generatedAt), "Policy Optimizer Tickets Report - 2024-03-05");
  assert.equal(
    buildEmailBody(summary),
    [
      "Policy Optimizer Tickets Report",
      "",
      "Generated: 2024-03-05 09:30:00",
      "Workflow ID: 2",
      "Total Tickets: 5",
      "Status Filter: all",
      "Date Filter: Last 30 days",
      "",
      "Please find the attached report(s).",
      ""
    ].join("\n")
  );
  assert.ok(buildEmailBody({ ...summary, days: undefined }).includes("Date Filter: All time\n"));
});

test("planSmtpTransport picks TLS mode from the port and logs in only with both credentials", () => {
  assert.deepEqual(planSmtpTransport({ server: "smtp.example.com", port: 587, user: "mailer", password: "test-secret" }), {
    kind: "smtp",
    host: "smtp.example.com",
    port: 587,
    secure: false,
    requireTLS: true,
    ignoreTLS: false,
    auth: { user: "mailer", pass: "test-secret" }
  });
  assert.deepEqual(planSmtpTransport({ server: "smtp.example.com", port: 465, user: "mailer" }), {
    kind: "smtp",
    host: "smtp.example.com",
    port: 465,
    secure: true,
    requireTLS: false,
    ignoreTLS: false
  });
  assert.deepEqual(planSmtpTransport({ server: "smtp.example.com", port: 25 }), {
    kind: "smtp",
    host: "smtp.example.com",
    port: 25,
    secure: false,
    requireTLS: false,
    ignoreTLS: true
  });
});

test("isValidEmailAddress needs a dotted domain", () => {
  assert.equal(isValidEmailAddress("ops@example.com"), true);
  assert.equal(isValidEmailAddress("ops@localhost"), false);
  assert.equal(isValidEmailAddress("ops.example.com"), false);
  assert.equal(isValidEmailAddress("@example.com"), false);
});

test("local delivery sends one message per recipient with base64 attachments", async () => {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "po-report-mail-"));

  try {
    const csvPath = path.join(tempDir, "report.csv");
    await fs.writeFile(csvPath, "a,b\r\n", "utf8");

    const plans: MailTransportPlan[] = [];
    const messages: string[] = [];
    const result = await deliverReportEmail(
      { recipients: ["ops@example.com", "team@example.com"] },
      summary,
      [csvPath, path.join(tempDir, "missing.html")],
      { createSender: streamSenderFactory(plans, messages), hostname: "test-host" }
    );

    assert.deepEqual(result, { sent: ["ops@example.com", "team@example.com"], failed: [], errors: [] });
    assert.deepEqual(plans, [{ kind: "sendmail" }]);
    assert.equal(messages.length, 2);

    const first = messages[0] ?? "";
    assert.ok(first.includes("From: policy-optimizer@test-host\n"));
    assert.ok(first.includes("To: ops@example.com\n"));
    assert.ok(first.includes("Subject: Policy Optimizer Tickets Report - 2024-03-05\n"));
    assert.ok(first.includes("Total Tickets: 5"));
    assert.ok(first.includes("Content-Type: application/octet-stream"));
    assert.match(first, /Content-Disposition: attachment; filename="?report\.csv"?/);
    assert.ok(first.includes("Content-Transfer-Encoding: base64"));
    assert.ok(first.includes("YSxiDQo="));
    assert.equal(first.includes("missing.html"), false);
    assert.ok((messages[1] ?? "").includes("To: team@example.com\n"));
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

test("SMTP delivery sends a single message to every recipient", async () => {
  const plans: MailTransportPlan[] = [];
  const messages: string[] = [];
  const result = await deliverReportEmail(
    {
      recipients: ["ops@example.com", "team@example.com"],
      smtp: { server: "smtp.example.com", port: 2525, user: "mailer@example.com", password: "test-secret" }
    },
    summary,
    [],
    { createSender: streamSenderFactory(plans, messages), hostname: "test-host" }
  );

  assert.deepEqual(result.sent, ["ops@example.com", "team@example.com"]);
  assert.equal(plans[0]?.kind, "smtp");
  assert.equal(messages.length, 1);
  assert.ok((messages[0] ?? "").includes("From: mailer@example.com\n"));
  assert.ok((messages[0] ?? "").includes("To: ops@example.com, team@example.com\n"));
});

test("delivery failures are reported, not thrown", async () => {
  const logger = createMemoryLogger();
  const result = await deliverReportEmail(
    { recipients: ["ops@example.com"], smtp: { server: "smtp.example.com", port: 587 } },
    summary,
    [],
    {
      logger,
      createSender: () => ({
        sendMail: async () => {
          throw new Error("connection refused");
        },
        close: () => undefined
      })
    }
  );

  assert.deepEqual(result, { sent: [], failed: ["ops@example.com"], errors: ["connection refused"] });
  assert.deepEqual(
    logger.entries.map((entry) => `${entry.level} ${entry.message}`),
    ["INFO Sending report e-mail through smtp.example.com:587", "ERROR Email sending failed: connection refused"]
  );
});

test("buildAttachments keeps only files that exist", () => {
  assert.deepEqual(buildAttachments([path.join(os.tmpdir(), "po-report-definitely-missing.csv")]), []);
});
