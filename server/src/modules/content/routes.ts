import type { FastifyInstance } from "fastify";
import {
  documentCreateSchema,
  langQuerySchema,
  type DocumentCreatedResponse,
  type DocumentKind,
} from "@folio/shared";
import { isJsonObject, type DocumentStore } from "../../services/documents.js";
import { requireAdminToken } from "../../plugins/auth.js";

export type ContentRoutesOptions = {
  store: DocumentStore;
  defaultLang: string;
  adminToken: string | null;
};

const TAGS: Record<DocumentKind, string> = { pages: "Pages", projects: "Projects" };
const NOUN: Record<DocumentKind, string> = { pages: "page", projects: "project" };

const langQuerystring = {
  type: "object",
  properties: { lang: { type: "string", description: "Language directory, e.g. en" } },
} as const;

/** GET list, GET one and admin POST for one kind of document. */
function registerDocumentRoutes(
  app: FastifyInstance,
  kind: DocumentKind,
  opts: ContentRoutesOptions,
) {
  const { store, defaultLang } = opts;
  const noun = NOUN[kind];

  app.get(
    `/${kind}`,
    {
      schema: {
        tags: [TAGS[kind]],
        summary: `List ${kind}`,
        description: `Summaries of every ${noun} in a language, sorted by slug. Unreadable files are skipped.`,
        querystring: langQuerystring,
        response: {
          200: { description: "Summaries" },
          400: { description: "Invalid lang" },
        },
      },
    },
    async (request, reply) => {
      const query = langQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply
          .status(400)
          .send({ error: query.error.issues[0]?.message ?? "Invalid lang" });
      }
      const lang = query.data.lang ?? defaultLang;
      const { items, skipped } = await store.list(kind, lang);
      if (skipped.length > 0) {
        request.log.warn({ kind, lang, skipped }, "Skipped unreadable documents");
      }
      return items;
    },
  );

  app.get<{ Params: { slug: string } }>(
    `/${kind}/:slug`,
    {
      schema: {
        tags: [TAGS[kind]],
        summary: `Get ${noun}`,
        description: `Returns the stored ${noun} document as-is.`,
        params: {
          type: "object",
          properties: { slug: { type: "string" } },
          required: ["slug"],
        },
        querystring: langQuerystring,
        response: {
          200: { description: "Document" },
          404: { description: "Not found" },
        },
      },
    },
    async (request, reply) => {
      const { slug } = request.params;
      const query = langQuerySchema.safeParse(request.query);
      if (!query.success) return reply.status(404).send({ error: "Not found" });
      const result = await store.get(kind, query.data.lang ?? defaultLang, slug);
      if (result.status === "not_found") {
        return reply.status(404).send({ error: "Not found" });
      }
      return result.document;
    },
  );

  app.post(
    `/${kind}`,
    {
      preHandler: [requireAdminToken(opts.adminToken)],
      schema: {
        tags: [TAGS[kind]],
        summary: `Create ${noun}`,
        description: `Create a ${noun}. Requires the X-Admin-Token header. Body needs a unique slug and may name a lang; the body is stored verbatim.`,
        response: {
          201: { description: "Created" },
          400: { description: "Missing, invalid or duplicate slug" },
          401: { description: "Unauthorized" },
        },
      },
    },
    async (request, reply) => {
      const body = request.body;
      if (!isJsonObject(body)) {
        return reply.status(400).send({ error: "Body must be a JSON object" });
      }
      const parsed = documentCreateSchema.safeParse(body);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: parsed.error.issues[0]?.message ?? "Validation failed" });
      }
      const { slug } = parsed.data;
      const lang = parsed.data.lang ?? defaultLang;
      const result = await store.create(kind, lang, slug, body);
      switch (result.status) {
        case "conflict":
          return reply.status(400).send({ error: "slug already exists" });
        case "invalid":
          return reply.status(400).send({ error: result.error });
        case "created": {
          request.log.info({ kind, lang, slug }, "Document created");
          const response: DocumentCreatedResponse = { status: "created", slug, lang };
          return reply.status(201).send(response);
        }
      }
    },
  );
}

export async function contentRoutes(app: FastifyInstance, opts: ContentRoutesOptions) {
  registerDocumentRoutes(app, "pages", opts);
  registerDocumentRoutes(app, "projects", opts);
}
