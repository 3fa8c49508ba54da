import nodemailer from "nodemailer";
import type { SendMailOptions, Transporter } from "nodemailer";
import type { EmailConfig } from "../config.js";
import { NotificationDeliveryError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { formatTimestamp } from "../monitoring/clock.js";
import { STATUS_COLORS, STATUS_EMOJI, worstStatus } from "../monitoring/severity.js";
import { countByStatus, formatCounts } from "../monitoring/summary.js";
import type { StatusRecord } from "../types.js";
import { escapeHtml } from "./html.js";

/** The part of a nodemailer transporter the notifier needs. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export interface EmailMessage {
  subject: string;
  html: string;
  text: string;
}

export interface EmailMessageInput {
  title: string;
  records: readonly StatusRecord[];
  notes?: Readonly<Record<string, string>>;
  dashboardUrl?: string;
  generatedAt: Date;
}

/** SMTP transporter with every wait bounded by `timeout_ms`. */
export function createSmtpTransport(config: EmailConfig): Transporter {
  return nodemailer.createTransport({
    host: config.smtp_host,
    port: config.smtp_port,
    secure: config.secure,
    requireTLS: config.require_tls,
    auth: config.user ? { user: config.user, pass: config.password } : undefined,
    connectionTimeout: config.timeout_ms,
    greetingTimeout: config.timeout_ms,
    socketTimeout: config.timeout_ms,
  });
}

/** Subject, HTML table and plain-text body for one batch. */
export function buildEmailMessage(input: EmailMessageInput): EmailMessage {
  const worst = worstStatus(input.records);
  const counts = formatCounts(countByStatus(input.records));
  const checkedAt = formatTimestamp(input.generatedAt);
  const noteFor = (r: StatusRecord): string => input.notes?.[r.pipeline] ?? "";

  const rows = input.records
    .map((r) => {
      const note = noteFor(r);
      return [
        "<tr>",
        `<td>${escapeHtml(r.pipeline)}</td>`,
        `<td style="color:${STATUS_COLORS[r.status]};font-weight:bold">${STATUS_EMOJI[r.status]} ${r.status}</td>`,
        `<td>${escapeHtml(r.detail)}${note ? `<br><i>${escapeHtml(note)}</i>` : ""}</td>`,
        "</tr>",
      ].join("");
    })
    .join("\n");

  const dashboardLink = input.dashboardUrl
    ? `<p><a href="${escapeHtml(input.dashboardUrl)}">View dashboard</a></p>`
    : "";

  const html = [
    `<h2>${escapeHtml(input.title)}</h2>`,
    `<p>Checked at ${checkedAt}<br>${counts}</p>`,
    '<table border="1" cellpadding="6" cellspacing="0">',
    "<tr><th>Pipeline</th><th>Status</th><th>Detail</th></tr>",
    rows,
    "</table>",
    dashboardLink,
  ]
    .filter(Boolean)
    .join("\n");

  const text = [
    input.title,
    `Checked at ${checkedAt}`,
    counts,
    "",
    ...input.records.map((r) => {
      const note = noteFor(r);
      return `${r.status.padEnd(8)} ${r.pipeline}: ${r.detail}${note ? ` (${note})` : ""}`;
    }),
    ...(input.dashboardUrl ? ["", `Dashboard: ${input.dashboardUrl}`] : []),
  ].join("\n");

  return { subject: `[${worst}] ${input.title}`, html, text };
}

export interface EmailNotifierOptions {
  from: string;
  recipients: readonly string[];
}

export class EmailNotifier {
  private readonly log = logger.child({ component: "email" });

  constructor(
    private readonly transport: MailTransport,
    private readonly options: EmailNotifierOptions,
  ) {}

  /** @throws {NotificationDeliveryError} when the SMTP exchange fails. */
  async send(message: EmailMessage): Promise<void> {
    try {
      await this.transport.sendMail({
        from: this.options.from,
        to: [...this.options.recipients],
        subject: message.subject,
        html: message.html,
        text: message.text,
      });
    } catch (err: unknown) {
      throw new NotificationDeliveryError("email", `SMTP delivery failed: ${errorMessage(err)}`, { cause: err });
    }
    this.log.info({ recipients: this.options.recipients.length, subject: message.subject }, "email sent");
  }
}

/** Notifier for the configured SMTP server, or null when email is disabled. */
export function createEmailNotifier(config: EmailConfig): EmailNotifier | null {
  if (!config.enabled) return null;
  return new EmailNotifier(createSmtpTransport(config), {
    from: config.from,
    recipients: config.recipients,
  });
}
