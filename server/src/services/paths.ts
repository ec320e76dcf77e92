import { resolve, sep } from "path";
import { mkdir, realpath } from "fs/promises";
import { IDENTIFIER_REGEX } from "@folio/shared";

/** Only allow IDs that cannot be used for path traversal (alphanumeric, hyphen, underscore). */
export function isSafeId(id: string): boolean {
  return IDENTIFIER_REGEX.test(id);
}

/** A single path segment that names a stored upload: no separators, no leading dot. */
const SAFE_FILENAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export function isSafeFilename(name: string): boolean {
  return SAFE_FILENAME.test(name) && !name.includes("..");
}

/**
 * UTC timestamp in format YYYYMMDD_HHMMSS, used as the prefix of stored
 * filenames. Second granularity.
 * Example: 20261019_083005
 */
export function utcFileTimestamp(now: Date = new Date()): string {
  const year = String(now.getUTCFullYear());
  const month = String(now.getUTCMonth() + 1).padStart(2, "0");
  const day = String(now.getUTCDate()).padStart(2, "0");
  const hours = String(now.getUTCHours()).padStart(2, "0");
  const minutes = String(now.getUTCMinutes()).padStart(2, "0");
  const seconds = String(now.getUTCSeconds()).padStart(2, "0");
  return `${year}${month}${day}_${hours}${minutes}${seconds}`;
}

/**
 * Resolve path to real path and assert it is under allowedBase. Throws if path escapes or doesn't exist.
 * Use this when the path already exists (e.g. before read). For paths that don't exist yet (e.g. before write), use assertResolvedPathUnder.
 */
export async function assertPathUnder(
  pathToCheck: string,
  allowedBase: string,
): Promise<string> {
  const base = resolve(await realpath(allowedBase));
  const resolved = resolve(await realpath(pathToCheck));
  if (resolved !== base && !resolved.startsWith(base + sep)) {
    throw new Error("Path escapes allowed directory");
  }
  return resolved;
}

/**
 * Asserts that pathToCheck, when resolved, is under allowedBase. Does not require pathToCheck to exist.
 */
export function assertResolvedPathUnder(
  pathToCheck: string,
  allowedBase: string,
): void {
  const base = resolve(allowedBase);
  const resolved = resolve(pathToCheck);
  if (resolved !== base && !resolved.startsWith(base + sep)) {
    throw new Error("Path escapes allowed directory");
  }
}

/** mkdir -p below allowedBase. */
export async function ensureDir(dir: string, allowedBase: string): Promise<void> {
  assertResolvedPathUnder(dir, allowedBase);
  await mkdir(dir, { recursive: true });
}
