import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, type AppConfig } from "../config.js";

export const TEST_ADMIN_TOKEN = "test-secret";

/** Config rooted in a fresh temp directory, logging and Swagger UI off. */
export async function tempConfig(
  overrides: Partial<AppConfig> = {},
): Promise<{ config: AppConfig; cleanup: () => Promise<void> }> {
  const dataDir = await mkdtemp(join(tmpdir(), "folio-app-"));
  const config: AppConfig = {
    ...loadConfig({ DATA_DIR: dataDir, LOGGER: "false", NODE_ENV: "production" }),
    ...overrides,
  };
  return {
    config,
    cleanup: () => rm(dataDir, { recursive: true, force: true }),
  };
}

export interface MultipartPart {
  name: string;
  filename?: string;
  contentType?: string;
  content: string | Buffer;
}

/** Encode parts as multipart/form-data for app.inject. */
export function multipartPayload(parts: MultipartPart[]): {
  payload: Buffer;
  headers: Record<string, string>;
} {
  const boundary = "----foliotestboundary7MA4YWxk";
  const chunks: Buffer[] = [];
  for (const part of parts) {
    let head = `--${boundary}\r\nContent-Disposition: form-data; name="${part.name}"`;
    if (part.filename !== undefined) {
      head += `; filename="${part.filename}"\r\nContent-Type: ${part.contentType ?? "application/octet-stream"}`;
    }
    head += "\r\n\r\n";
    chunks.push(
      Buffer.from(head),
      typeof part.content === "string" ? Buffer.from(part.content) : part.content,
      Buffer.from("\r\n"),
    );
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`));
  return {
    payload: Buffer.concat(chunks),
    headers: { "content-type": `multipart/form-data; boundary=${boundary}` },
  };
}
