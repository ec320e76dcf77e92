import { execFile } from "child_process";
import { promisify } from "util";
import { rm } from "fs/promises";
import { join } from "path";

const exec = promisify(execFile);

export const THUMBNAIL_PREFIX = "thumb_";

export function thumbnailName(filename: string): string {
  return `${THUMBNAIL_PREFIX}${filename}`;
}

/** Produces a copy of an image that fits within maxSize x maxSize. */
export interface Thumbnailer {
  readonly name: string;
  create(sourcePath: string, destPath: string, maxSize: number): Promise<void>;
}

export type ThumbnailResult =
  | { status: "created"; filename: string }
  | { status: "unavailable" }
  | { status: "failed"; error: string };

/** Scale down (never up) keeping aspect ratio; one frame so still images stay still. */
export function createFfmpegThumbnailer(ffmpegPath: string): Thumbnailer {
  return {
    name: "ffmpeg",
    async create(sourcePath, destPath, maxSize) {
      await exec(ffmpegPath, [
        "-hide_banner",
        "-loglevel", "error",
        "-y",
        "-i", sourcePath,
        "-vf", `scale='min(${maxSize},iw)':'min(${maxSize},ih)':force_original_aspect_ratio=decrease`,
        "-frames:v", "1",
        "-update", "1",
        destPath,
      ], { maxBuffer: 1024 * 1024 });
    },
  };
}

/** True when the command starts and exits 0 within the timeout. */
export function commandRuns(path: string, args: string[], timeoutMs = 5000): Promise<boolean> {
  return exec(path, args, { timeout: timeoutMs }).then(
    () => true,
    () => false,
  );
}

/**
 * Resolve the thumbnailing capability once at startup. Returns null when
 * ffmpeg cannot be run, and uploads then skip thumbnails.
 */
export async function detectThumbnailer(
  ffmpegPath: string,
): Promise<Thumbnailer | null> {
  const available = await commandRuns(ffmpegPath, ["-version"]);
  return available ? createFfmpegThumbnailer(ffmpegPath) : null;
}

/**
 * Best-effort: failure is returned as a result, never thrown, and any partial
 * thumbnail is removed.
 */
export async function generateThumbnail(
  thumbnailer: Thumbnailer | null,
  dir: string,
  filename: string,
  maxSize: number,
): Promise<ThumbnailResult> {
  if (!thumbnailer) return { status: "unavailable" };
  const thumbFilename = thumbnailName(filename);
  const destPath = join(dir, thumbFilename);
  try {
    await thumbnailer.create(join(dir, filename), destPath, maxSize);
    return { status: "created", filename: thumbFilename };
  } catch (err) {
    await rm(destPath, { force: true }).catch(() => undefined);
    return {
      status: "failed",
      error: err instanceof Error ? err.message : String(err),
    };
  }
}
