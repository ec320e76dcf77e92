import nodemailer from "nodemailer";
import type { ContactMessageRecord } from "@folio/shared";
import type { SmtpConfig } from "../config.js";

/** Colors for the notification email. */
const STYLE = {
  bg: "#0c0e12",
  bgElevated: "#14171e",
  text: "#e8eaef",
  textMuted: "#8b92a3",
  accent: "#00d4aa",
  border: "#2a2f3d",
  fontSans: "system-ui, sans-serif",
};

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html: string;
  replyTo?: string;
}

export type SendResult = { sent: true } | { sent: false; error: string };

export interface Mailer {
  send(message: MailMessage): Promise<SendResult>;
}

/**
 * SMTP with authentication. Port 465 uses implicit TLS; any other port must
 * upgrade with STARTTLS or the send fails.
 * Returns { sent: true } on success, { sent: false, error } on failure.
 */
export function createSmtpMailer(smtp: SmtpConfig): Mailer {
  const implicitTls = smtp.port === 465;
  const transporter = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: { user: smtp.user, pass: smtp.password },
  });

  return {
    async send(message) {
      try {
        await transporter.sendMail({
          from: smtp.from,
          to: message.to,
          replyTo: message.replyTo?.trim() || undefined,
          subject: message.subject,
          text: message.text,
          html: message.html,
        });
        return { sent: true };
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        return { sent: false, error: msg };
      }
    },
  };
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function buildContactNotificationEmail(
  appName: string,
  record: Pick<ContactMessageRecord, "name" | "email" | "message">,
): { subject: string; text: string; html: string } {
  const { name, email, message } = record;
  const subject = `Contact from ${name}`;
  const text = [
    `Name: ${name}`,
    `Email: ${email}`,
    "",
    "---",
    "",
    message,
    "",
    "---",
    "",
    appName,
  ].join("\n");

  const safeName = escapeHtml(name);
  const safeEmail = escapeHtml(email);
  const safeMessage = escapeHtml(message).replace(/\n/g, "<br>");

  const html = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(subject)}</title>
</head>
<body style="margin:0; font-family: ${STYLE.fontSans}; background: ${STYLE.bg}; color: ${STYLE.text}; line-height: 1.6;">
  <div style="max-width: 520px; margin: 0 auto; padding: 32px 24px;">
    <div style="background: ${STYLE.bgElevated}; border: 1px solid ${STYLE.border}; border-radius: 16px; padding: 32px 28px;">
      <h1 style="margin: 0 0 20px; font-size: 1.25rem; font-weight: 700; color: ${STYLE.accent};">New Contact Message</h1>
      <table style="width: 100%; border-collapse: collapse; margin: 0 0 20px;">
        <tr>
          <td style="padding: 8px 0; font-size: 0.875rem; color: ${STYLE.textMuted}; width: 80px;">Name</td>
          <td style="padding: 8px 0; font-size: 1rem; color: ${STYLE.text};">${safeName}</td>
        </tr>
        <tr>
          <td style="padding: 8px 0; font-size: 0.875rem; color: ${STYLE.textMuted};">Email</td>
          <td style="padding: 8px 0; font-size: 1rem;"><a href="mailto:${safeEmail}" style="color: ${STYLE.accent}; text-decoration: none;">${safeEmail}</a></td>
        </tr>
      </table>
      <div style="padding: 16px; background: ${STYLE.bg}; border: 1px solid ${STYLE.border}; border-radius: 8px;">
        <p style="margin: 0; font-size: 1rem; color: ${STYLE.text}; white-space: pre-wrap;">${safeMessage}</p>
      </div>
    </div>
    <p style="margin: 24px 0 0; font-size: 0.8125rem; color: ${STYLE.textMuted}; text-align: center;">${escapeHtml(appName)}</p>
  </div>
</body>
</html>`;

  return { subject, text, html };
}
