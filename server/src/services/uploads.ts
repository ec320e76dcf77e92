import { createWriteStream } from "fs";
import { rm } from "fs/promises";
import { extname, join } from "path";
import { pipeline } from "stream/promises";
import { Transform } from "stream";
import { ensureDir, utcFileTimestamp } from "./paths.js";
import { writeNewFile } from "./files.js";
import { THUMBNAIL_PREFIX } from "./thumbnails.js";

const MAX_FILENAME_LENGTH = 255;
// Widest prefix a stored name gets ("YYYYMMDD_HHMMSS-100_") plus the thumbnail prefix.
const MAX_UPLOAD_NAME_LENGTH =
  MAX_FILENAME_LENGTH - "YYYYMMDD_HHMMSS-100_".length - THUMBNAIL_PREFIX.length;

export class FileTooLargeError extends Error {
  constructor(message = "File too large") {
    super(message);
    this.name = "FileTooLargeError";
  }
}

/**
 * Stream an incoming file to disk while counting bytes and enforcing a max size.
 * Returns total bytes written. Deletes partial file on error.
 */
export async function streamToFileWithLimit(
  input: NodeJS.ReadableStream,
  destPath: string,
  maxBytes: number,
): Promise<number> {
  let bytes = 0;
  const counter = new Transform({
    transform(chunk: Buffer, _enc, cb) {
      bytes += chunk.byteLength;
      if (bytes > maxBytes) {
        cb(new FileTooLargeError());
        return;
      }
      cb(null, chunk);
    },
  });

  const out = createWriteStream(destPath, { flags: "w" });
  try {
    await pipeline(input, counter, out);
    return bytes;
  } catch (err) {
    await rm(destPath, { force: true });
    throw err;
  }
}

/**
 * Reduce a client-supplied filename to [A-Za-z0-9_.-]: non-ASCII dropped after
 * NFKD, separators and whitespace become "_", leading/trailing "." and "_" removed.
 * May return "" when nothing usable is left.
 */
export function sanitizeFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[^\x20-\x7e]/g, "");
  return ascii
    .replace(/[/\\]/g, " ")
    .trim()
    .split(/\s+/)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}

/** Shorten the stem of a sanitized name so the whole name fits in maxLength, keeping the extension. */
export function fitFilename(name: string, maxLength: number): string {
  if (name.length <= maxLength) return name;
  const ext = extname(name);
  const stem = name.slice(0, name.length - ext.length);
  const cut = stem.slice(0, Math.max(0, maxLength - ext.length)).replace(/[._]+$/, "");
  return `${cut}${ext}`;
}

/** Lowercase extension without the dot ("" when there is none). */
export function extensionOf(filename: string): string {
  return extname(filename).slice(1).toLowerCase();
}

export interface UploadPolicy {
  uploadsDir: string;
  /** Lowercase, no dots. */
  allowedExtensions: string[];
  maxBytes: number;
  maxMb: number;
}

export type StoreUploadResult =
  | { status: "stored"; filename: string; path: string; bytes: number }
  | { status: "rejected"; error: string };

function isSizeLimitError(err: unknown): boolean {
  if (err instanceof FileTooLargeError) return true;
  return err instanceof Error && "code" in err && err.code === "FST_REQ_FILE_TOO_LARGE";
}

/**
 * Validate and store one uploaded file as {YYYYMMDD_HHMMSS}_{sanitized} in the
 * uploads directory. Nothing is left on disk when the upload is rejected.
 */
export async function storeUpload(
  input: NodeJS.ReadableStream,
  originalName: string,
  policy: UploadPolicy,
  now: Date = new Date(),
): Promise<StoreUploadResult> {
  const reject = (error: string): StoreUploadResult => {
    input.resume();
    return { status: "rejected", error };
  };

  const sanitized = fitFilename(sanitizeFilename(originalName), MAX_UPLOAD_NAME_LENGTH);
  if (!sanitized) return reject("Missing filename");
  if (!policy.allowedExtensions.includes(extensionOf(sanitized))) {
    return reject("File type not allowed");
  }

  await ensureDir(policy.uploadsDir, policy.uploadsDir);
  const stamp = utcFileTimestamp(now);
  // Claim the name first so a same-second upload of the same file gets its own name.
  const filename = await writeNewFile(
    policy.uploadsDir,
    (attempt) =>
      attempt === 1 ? `${stamp}_${sanitized}` : `${stamp}-${attempt}_${sanitized}`,
    "",
  );
  const path = join(policy.uploadsDir, filename);

  const tooLarge = `File too large (max ${policy.maxMb}MB)`;
  try {
    const bytes = await streamToFileWithLimit(input, path, policy.maxBytes);
    return { status: "stored", filename, path, bytes };
  } catch (err) {
    if (isSizeLimitError(err)) return reject(tooLarge);
    throw err;
  }
}
