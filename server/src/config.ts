import { join, resolve } from "path";
import { DEFAULT_ALLOWED_EXTENSIONS } from "@folio/shared";

/**
 * Central app config, read once from the environment at startup and passed to
 * buildApp. Nothing else reads process.env. Use .env (node --env-file) or set
 * variables in the shell when running the server.
 */

export interface SmtpConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
}

export interface AppConfig {
  /** Application display name (email footer, API docs). Env: APP_NAME. Default "Folio". */
  appName: string;
  /** Server port. Env: PORT. Default 3001. */
  port: number;
  /** Server listen host. Env: HOST. Default "0.0.0.0". */
  host: string;
  /** API path segment (no slashes). Routes live under /${apiPrefix}/. Env: API_PREFIX. Default "api". */
  apiPrefix: string;
  /** Enable Fastify logger. Env: LOGGER. Set to "false" or "0" to disable. Default true. */
  logger: boolean;
  /** Debug-level logging. Env: DEBUG. Default false. */
  debug: boolean;
  /** Allowed cross-origin sender. Env: CORS_ORIGIN. "*" (default) reflects any origin; "false" disables CORS. */
  corsOrigin: string | boolean;
  /** Root for content, messages and uploads. Env: DATA_DIR. Default "data" under cwd. */
  dataDir: string;
  /** Env: CONTENT_DIR. Default ${dataDir}/content. */
  contentDir: string;
  /** Env: MESSAGES_DIR. Default ${dataDir}/messages. */
  messagesDir: string;
  /** Env: UPLOADS_DIR. Default ${dataDir}/uploads. */
  uploadsDir: string;
  /** Language used when a request names none. Env: DEFAULT_LANG. Default "en". */
  defaultLang: string;
  /** Shared secret for X-Admin-Token. Env: ADMIN_TOKEN. Unset disables page/project creation. */
  adminToken: string | null;
  /** Lowercase extensions without dots. Env: ALLOWED_EXTENSIONS (comma-separated). Default png,jpg,jpeg,webp. */
  allowedExtensions: string[];
  /** Max image upload size (MB). Env: MAX_UPLOAD_MB. Default 5. */
  maxUploadMb: number;
  maxUploadBytes: number;
  /** Longest thumbnail edge in pixels. Env: THUMBNAIL_MAX_SIZE. Default 1200. */
  thumbnailMaxSize: number;
  /** Path to ffmpeg binary (used for thumbnails). Env: FFMPEG_PATH. Default "ffmpeg". */
  ffmpegPath: string;
  /** Null unless SMTP_HOST, SMTP_USER and SMTP_PASSWORD are all set. */
  smtp: SmtpConfig | null;
  /** Recipient for contact notifications. Env: ADMIN_EMAIL. */
  adminEmail: string | null;
  /** Global rate limit: max requests per time window. Env: RATE_LIMIT_MAX. Default 100. */
  rateLimitMax: number;
  /** Global rate limit: time window (e.g. "1 minute"). Env: RATE_LIMIT_TIME_WINDOW. Default "1 minute". */
  rateLimitTimeWindow: string;
  /** Whether to serve Swagger UI at /${apiPrefix}/docs. In non-production always true; in production set SWAGGER_ENABLED=true. */
  swaggerEnabled: boolean;
}

type Env = Record<string, string | undefined>;

function str(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function flag(env: Env, key: string): boolean {
  return env[key] === "true" || env[key] === "1";
}

function positiveNumber(env: Env, key: string, fallback: number): number {
  const n = Number(env[key]);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function parseCorsOrigin(raw: string | undefined): string | boolean {
  if (raw === undefined || raw === "*") return true;
  if (raw === "false" || raw === "0") return false;
  return raw;
}

export function parseExtensions(raw: string | undefined): string[] {
  if (!raw) return [...DEFAULT_ALLOWED_EXTENSIONS];
  const list = raw
    .split(",")
    .map((e) => e.trim().replace(/^\./, "").toLowerCase())
    .filter(Boolean);
  return list.length > 0 ? list : [...DEFAULT_ALLOWED_EXTENSIONS];
}

export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = resolve(str(env, "DATA_DIR") ?? join(process.cwd(), "data"));
  const maxUploadMb = positiveNumber(env, "MAX_UPLOAD_MB", 5);

  const smtpHost = str(env, "SMTP_HOST");
  const smtpUser = str(env, "SMTP_USER");
  // Passwords may legitimately contain surrounding spaces.
  const smtpPassword = env.SMTP_PASSWORD || undefined;
  const smtp =
    smtpHost && smtpUser && smtpPassword
      ? {
          host: smtpHost,
          port: positiveNumber(env, "SMTP_PORT", 587),
          user: smtpUser,
          password: smtpPassword,
          from: str(env, "SMTP_FROM") ?? smtpUser,
        }
      : null;

  return {
    appName: str(env, "APP_NAME") ?? "Folio",
    port: positiveNumber(env, "PORT", 3001),
    host: str(env, "HOST") ?? "0.0.0.0",
    apiPrefix: (str(env, "API_PREFIX") ?? "api").replace(/^\/+|\/+$/g, ""),
    logger: env.LOGGER !== "false" && env.LOGGER !== "0",
    debug: flag(env, "DEBUG"),
    corsOrigin: parseCorsOrigin(str(env, "CORS_ORIGIN")),
    dataDir,
    contentDir: resolve(str(env, "CONTENT_DIR") ?? join(dataDir, "content")),
    messagesDir: resolve(str(env, "MESSAGES_DIR") ?? join(dataDir, "messages")),
    uploadsDir: resolve(str(env, "UPLOADS_DIR") ?? join(dataDir, "uploads")),
    defaultLang: str(env, "DEFAULT_LANG") ?? "en",
    adminToken: str(env, "ADMIN_TOKEN") ?? null,
    allowedExtensions: parseExtensions(str(env, "ALLOWED_EXTENSIONS")),
    maxUploadMb,
    maxUploadBytes: Math.floor(maxUploadMb * 1024 * 1024),
    thumbnailMaxSize: positiveNumber(env, "THUMBNAIL_MAX_SIZE", 1200),
    ffmpegPath: env.FFMPEG_PATH ?? "ffmpeg",
    smtp,
    adminEmail: str(env, "ADMIN_EMAIL") ?? null,
    rateLimitMax: positiveNumber(env, "RATE_LIMIT_MAX", 100),
    rateLimitTimeWindow: str(env, "RATE_LIMIT_TIME_WINDOW") ?? "1 minute",
    swaggerEnabled:
      env.NODE_ENV !== "production" || env.SWAGGER_ENABLED === "true",
  };
}
