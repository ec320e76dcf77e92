/** Lowercase extension without dot -> Content-Type for served uploads. */
const EXT_TO_MIMETYPE: Record<string, string> = {
  png: "image/png",
  webp: "image/webp",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  avif: "image/avif",
  svg: "image/svg+xml",
};

const DEFAULT_MIMETYPE = "application/octet-stream";

export function mimetypeForExtension(ext: string): string {
  return EXT_TO_MIMETYPE[ext.toLowerCase()] ?? DEFAULT_MIMETYPE;
}
