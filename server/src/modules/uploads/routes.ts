import type { FastifyInstance } from "fastify";
import send from "@fastify/send";
import { basename, dirname, join } from "path";
import type { UploadResponse } from "@folio/shared";
import { assertPathUnder, isSafeFilename } from "../../services/paths.js";
import { extensionOf, storeUpload } from "../../services/uploads.js";
import {
  generateThumbnail,
  type Thumbnailer,
} from "../../services/thumbnails.js";
import { mimetypeForExtension } from "../../utils/images.js";

export type UploadRoutesOptions = {
  uploadsDir: string;
  allowedExtensions: string[];
  maxUploadBytes: number;
  maxUploadMb: number;
  thumbnailMaxSize: number;
  /** Resolved once at startup; null means thumbnails are skipped. */
  thumbnailer: Thumbnailer | null;
  /** URL path the routes are mounted under, e.g. "/api". */
  urlPrefix: string;
};

export async function uploadRoutes(app: FastifyInstance, opts: UploadRoutesOptions) {
  const uploadUrl = (filename: string) =>
    `${opts.urlPrefix}/uploads/${encodeURIComponent(filename)}`;

  app.post(
    "/uploads",
    {
      schema: {
        tags: ["Uploads"],
        summary: "Upload image",
        description: `Upload one image (multipart). Allowed: ${opts.allowedExtensions.join(", ")}. Max ${opts.maxUploadMb}MB. A thumbnail is generated when the server can.`,
        consumes: ["multipart/form-data"],
        response: {
          201: {
            description: "Stored",
            type: "object",
            properties: {
              url: { type: "string" },
              thumbnail_url: { type: ["string", "null"] },
            },
            required: ["url", "thumbnail_url"],
          },
          400: { description: "No file, disallowed type or too large" },
        },
      },
    },
    async (request, reply) => {
      if (!request.isMultipart()) {
        return reply.status(400).send({ error: "No file uploaded" });
      }
      const data = await request.file();
      if (!data) return reply.status(400).send({ error: "No file uploaded" });

      const stored = await storeUpload(data.file, data.filename, {
        uploadsDir: opts.uploadsDir,
        allowedExtensions: opts.allowedExtensions,
        maxBytes: opts.maxUploadBytes,
        maxMb: opts.maxUploadMb,
      });
      if (stored.status === "rejected") {
        request.log.info(
          { filename: data.filename, reason: stored.error },
          "Upload rejected",
        );
        return reply.status(400).send({ error: stored.error });
      }

      const thumb = await generateThumbnail(
        opts.thumbnailer,
        opts.uploadsDir,
        stored.filename,
        opts.thumbnailMaxSize,
      );
      if (thumb.status === "failed") {
        request.log.warn(
          { filename: stored.filename, error: thumb.error },
          "Thumbnail generation failed",
        );
      }
      request.log.info(
        { filename: stored.filename, bytes: stored.bytes, thumbnail: thumb.status },
        "Upload stored",
      );

      const response: UploadResponse = {
        url: uploadUrl(stored.filename),
        thumbnail_url: thumb.status === "created" ? uploadUrl(thumb.filename) : null,
      };
      return reply.status(201).send(response);
    },
  );

  app.get<{ Params: { "*": string } }>(
    "/uploads/*",
    {
      schema: {
        tags: ["Uploads"],
        summary: "Get uploaded file",
        description: "Streams a stored upload or thumbnail. Supports range requests.",
        response: {
          200: { description: "File binary" },
          206: { description: "Partial content" },
          400: { description: "Invalid path" },
          404: { description: "Not found" },
          416: { description: "Range not satisfiable" },
        },
      },
    },
    async (request, reply) => {
      const name = request.params["*"];
      if (!isSafeFilename(name)) {
        return reply.status(400).send({ error: "Invalid path" });
      }
      let safePath: string;
      try {
        safePath = await assertPathUnder(join(opts.uploadsDir, name), opts.uploadsDir);
      } catch {
        return reply.status(404).send({ error: "Not found" });
      }

      const result = await send(request.raw, basename(safePath), {
        root: dirname(safePath),
        contentType: false,
        acceptRanges: true,
        cacheControl: true,
        maxAge: 86400,
      });
      if (result.type === "error") {
        const err: unknown = result.metadata.error;
        const status =
          err instanceof Error && "status" in err && typeof err.status === "number"
            ? err.status
            : 404;
        return reply
          .status(status >= 500 ? 404 : status)
          .send({ error: status === 416 ? "Range not satisfiable" : "Not found" });
      }
      if (result.type !== "file") {
        return reply.status(404).send({ error: "Not found" });
      }
      reply.status(result.statusCode);
      for (const [key, value] of Object.entries(result.headers)) {
        if (value !== undefined) reply.header(key, value);
      }
      reply.header("Content-Type", mimetypeForExtension(extensionOf(safePath)));
      return reply.send(result.stream);
    },
  );
}
