import type { FastifyRequest, FastifyReply } from "fastify";
import { secretsEqual } from "../utils/hash.js";

export const ADMIN_TOKEN_HEADER = "x-admin-token";

function getHeaderValue(h: unknown): string | undefined {
  if (typeof h === "string") return h;
  if (Array.isArray(h)) return typeof h[0] === "string" ? h[0] : undefined;
  return undefined;
}

/**
 * preHandler that admits a request only when X-Admin-Token matches the
 * configured secret. With no secret configured every request is refused.
 */
export function requireAdminToken(expected: string | null) {
  return async function requireAdmin(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    const provided = getHeaderValue(request.headers[ADMIN_TOKEN_HEADER]);
    if (expected && provided && secretsEqual(provided, expected)) return;
    request.log.warn(
      { url: request.url, tokenPresent: Boolean(provided) },
      "Admin token rejected",
    );
    return reply.status(401).send({ error: "Unauthorized" });
  };
}
