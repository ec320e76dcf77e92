import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import rateLimit from "@fastify/rate-limit";
import fastifySwagger from "@fastify/swagger";
import fastifySwaggerUi from "@fastify/swagger-ui";
import type { AppConfig } from "./config.js";
import { FileDocumentStore, type DocumentStore } from "./services/documents.js";
import { createSmtpMailer, type Mailer } from "./services/email.js";
import type { Thumbnailer } from "./services/thumbnails.js";
import { ADMIN_TOKEN_HEADER } from "./plugins/auth.js";
import { getRootVersion, healthRoutes } from "./modules/health/index.js";
import { contentRoutes } from "./modules/content/index.js";
import { contactRoutes } from "./modules/contact/index.js";
import { uploadRoutes } from "./modules/uploads/index.js";

export interface AppDependencies {
  store?: DocumentStore;
  /** Defaults to an SMTP mailer when config.smtp is set, otherwise no relay. */
  mailer?: Mailer | null;
  /** Capability resolved by the caller (see detectThumbnailer). Defaults to none. */
  thumbnailer?: Thumbnailer | null;
}

function hasStatusCode(err: unknown): err is Error & { statusCode: number } {
  return (
    err instanceof Error &&
    "statusCode" in err &&
    typeof err.statusCode === "number"
  );
}

export async function buildApp(
  config: AppConfig,
  deps: AppDependencies = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: config.logger ? { level: config.debug ? "debug" : "info" } : false,
  });

  const store = deps.store ?? new FileDocumentStore(config.contentDir);
  const mailer =
    deps.mailer !== undefined
      ? deps.mailer
      : config.smtp
        ? createSmtpMailer(config.smtp)
        : null;
  const thumbnailer = deps.thumbnailer ?? null;

  await app.register(cors, {
    origin: config.corsOrigin,
    allowedHeaders: ["Content-Type", ADMIN_TOKEN_HEADER],
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitTimeWindow,
  });

  // One byte over the upload limit so storeUpload sees the overflow and reports it.
  await app.register(multipart, {
    limits: { fileSize: config.maxUploadBytes + 1, files: 1 },
  });

  const apiPrefix = config.apiPrefix ? `/${config.apiPrefix}` : "";
  await app.register(fastifySwagger, {
    openapi: {
      openapi: "3.0.0",
      info: {
        title: `${config.appName} API`,
        description: `Content, contact and upload API for ${config.appName}. Creating pages and projects requires the \`X-Admin-Token\` header.`,
        version: getRootVersion() ?? "unknown",
      },
      servers: [{ url: apiPrefix || "/", description: `${config.appName} API base` }],
    },
  });

  if (config.swaggerEnabled) {
    await app.register(fastifySwaggerUi, {
      routePrefix: `${apiPrefix}/docs`,
      uiConfig: { docExpansion: "list", tryItOutEnabled: true },
    });
  }

  app.setErrorHandler((err, request, reply) => {
    if (hasStatusCode(err) && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    request.log.error({ err }, "Unhandled error");
    return reply.status(500).send({ error: "Internal server error" });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ error: "Not found" });
  });

  await app.register(healthRoutes, { prefix: apiPrefix });
  await app.register(contentRoutes, {
    prefix: apiPrefix,
    store,
    defaultLang: config.defaultLang,
    adminToken: config.adminToken,
  });
  await app.register(contactRoutes, {
    prefix: apiPrefix,
    messagesDir: config.messagesDir,
    appName: config.appName,
    mailer,
    adminEmail: config.adminEmail,
  });
  await app.register(uploadRoutes, {
    prefix: apiPrefix,
    uploadsDir: config.uploadsDir,
    allowedExtensions: config.allowedExtensions,
    maxUploadBytes: config.maxUploadBytes,
    maxUploadMb: config.maxUploadMb,
    thumbnailMaxSize: config.thumbnailMaxSize,
    thumbnailer,
    urlPrefix: apiPrefix,
  });

  return app;
}
