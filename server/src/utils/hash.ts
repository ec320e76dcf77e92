import { createHash, timingSafeEqual } from "crypto";

/** SHA-256 hash of string as 64-char hex. */
export function sha256Hex(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

/** Compare two secrets in constant time (digests first, so lengths never leak). */
export function secretsEqual(provided: string, expected: string): boolean {
  return timingSafeEqual(
    Buffer.from(sha256Hex(provided), "hex"),
    Buffer.from(sha256Hex(expected), "hex"),
  );
}
