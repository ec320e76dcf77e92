import { z } from 'zod';

export const CONTACT_REQUIRED_FIELDS = ['name', 'email', 'message'] as const;
export const CONTACT_REQUIRED_ERROR = 'name, email and message are required';

/** Non-string input counts as empty; the value is trimmed before the emptiness check. */
const requiredText = z.preprocess(
  (v) => (typeof v === 'string' ? v : ''),
  z.string().trim().min(1, { error: CONTACT_REQUIRED_ERROR }),
);

/** Email is only checked for non-emptiness. */
export const contactBodySchema = z.object({
  name: requiredText,
  email: requiredText,
  message: requiredText,
});

export type ContactBody = z.infer<typeof contactBodySchema>;

export interface ContactMessageRecord extends ContactBody {
  /** ISO 8601 UTC, e.g. 2026-10-19T08:30:00.000Z */
  received_at: string;
}

export type ContactStatus = 'saved' | 'sent';

export interface ContactResponse {
  status: ContactStatus;
  note?: string;
}
