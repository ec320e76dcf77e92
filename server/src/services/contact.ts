import type {
  ContactBody,
  ContactMessageRecord,
  ContactResponse,
} from "@folio/shared";
import { ensureDir, utcFileTimestamp } from "./paths.js";
import { writeNewFile } from "./files.js";
import {
  buildContactNotificationEmail,
  type Mailer,
  type SendResult,
} from "./email.js";

export interface ContactIntakeOptions {
  messagesDir: string;
  appName: string;
  /** Both must be present for the relay to run. */
  mailer: Mailer | null;
  adminEmail: string | null;
}

export type RelayResult =
  | { status: "skipped" }
  | { status: "sent" }
  | { status: "failed"; error: string };

export interface ContactOutcome {
  filename: string;
  record: ContactMessageRecord;
  relay: RelayResult;
}

/**
 * Persist the message as {YYYYMMDD_HHMMSS}.json. A second message in the same
 * second gets {YYYYMMDD_HHMMSS}-2.json and so on; existing files are never replaced.
 */
export async function saveContactMessage(
  messagesDir: string,
  body: ContactBody,
  now: Date = new Date(),
): Promise<{ filename: string; record: ContactMessageRecord }> {
  const record: ContactMessageRecord = {
    name: body.name,
    email: body.email,
    message: body.message,
    received_at: now.toISOString(),
  };
  await ensureDir(messagesDir, messagesDir);
  const stamp = utcFileTimestamp(now);
  const filename = await writeNewFile(
    messagesDir,
    (attempt) => (attempt === 1 ? `${stamp}.json` : `${stamp}-${attempt}.json`),
    `${JSON.stringify(record, null, 2)}\n`,
  );
  return { filename, record };
}

/** Save first, then relay. A relay failure never undoes the save. */
export async function submitContact(
  body: ContactBody,
  options: ContactIntakeOptions,
  now: Date = new Date(),
): Promise<ContactOutcome> {
  const { filename, record } = await saveContactMessage(options.messagesDir, body, now);

  if (!options.mailer || !options.adminEmail) {
    return { filename, record, relay: { status: "skipped" } };
  }

  const { subject, text, html } = buildContactNotificationEmail(options.appName, record);
  const result = await options.mailer
    .send({ to: options.adminEmail, subject, text, html, replyTo: record.email })
    .catch((err: unknown): SendResult => ({
      sent: false,
      error: err instanceof Error ? err.message : String(err),
    }));
  const relay: RelayResult = result.sent
    ? { status: "sent" }
    : { status: "failed", error: result.error };
  return { filename, record, relay };
}

export function toContactResponse(relay: RelayResult): ContactResponse {
  switch (relay.status) {
    case "sent":
      return { status: "sent" };
    case "failed":
      return { status: "saved", note: `Email delivery failed: ${relay.error}` };
    case "skipped":
      return { status: "saved" };
  }
}
