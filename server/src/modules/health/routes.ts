import type { FastifyInstance } from "fastify";
import { readFileSync, existsSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Root package.json (monorepo root): from server/src/modules/health -> root. */
export function getRootVersion(): string | null {
  const rootPkg = join(__dirname, "..", "..", "..", "..", "package.json");
  if (!existsSync(rootPkg)) return null;
  try {
    const raw = readFileSync(rootPkg, "utf-8");
    const pkg = JSON.parse(raw) as { version?: unknown };
    return typeof pkg.version === "string" ? pkg.version : null;
  } catch {
    return null;
  }
}

export async function healthRoutes(app: FastifyInstance) {
  app.get(
    "/health",
    {
      schema: {
        tags: ["Health"],
        summary: "Health check",
        description: "Liveness probe. Returns status and the current UTC time.",
        response: {
          200: {
            description: "Server is healthy",
            type: "object",
            properties: {
              status: { type: "string" },
              time: { type: "string", format: "date-time" },
            },
            required: ["status", "time"],
          },
        },
      },
    },
    async () => {
      return { status: "ok", time: new Date().toISOString() };
    },
  );

  app.get(
    "/version",
    {
      schema: {
        tags: ["Health"],
        summary: "Version",
        description: "Returns the application version from the root package.json.",
        response: {
          200: {
            description: "Version info",
            type: "object",
            properties: { version: { type: "string" } },
            required: ["version"],
          },
        },
      },
    },
    async () => {
      return { version: getRootVersion() ?? "unknown" };
    },
  );
}
