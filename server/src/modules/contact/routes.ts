import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  contactBodySchema,
  CONTACT_REQUIRED_ERROR,
  CONTACT_REQUIRED_FIELDS,
} from "@folio/shared";
import type { Mailer } from "../../services/email.js";
import { submitContact, toContactResponse } from "../../services/contact.js";

export type ContactRoutesOptions = {
  messagesDir: string;
  appName: string;
  mailer: Mailer | null;
  adminEmail: string | null;
};

export async function contactRoutes(app: FastifyInstance, opts: ContactRoutesOptions) {
  app.post(
    "/contact",
    {
      schema: {
        tags: ["Contact"],
        summary: "Submit contact form",
        description:
          "Submit a contact message. Saved to disk first; if SMTP and an admin address are configured it is also emailed. Status is \"sent\" only when the email went out.",
        response: {
          200: {
            description: "Message saved",
            type: "object",
            properties: {
              status: { type: "string", enum: ["saved", "sent"] },
              note: { type: "string" },
            },
            required: ["status"],
          },
          400: { description: "A required field is blank" },
        },
      },
    },
    async (request, reply) => {
      const parsed = contactBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: CONTACT_REQUIRED_ERROR,
          fields: CONTACT_REQUIRED_FIELDS,
          details: z.flattenError(parsed.error).fieldErrors,
        });
      }

      const outcome = await submitContact(parsed.data, opts);
      request.log.info(
        { file: outcome.filename, relay: outcome.relay.status },
        "Contact message saved",
      );
      if (outcome.relay.status === "failed") {
        request.log.warn(
          { to: opts.adminEmail, error: outcome.relay.error },
          "Contact notification email failed",
        );
      }
      return reply.send(toContactResponse(outcome.relay));
    },
  );
}
