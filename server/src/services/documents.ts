import { join } from "path";
import { readFile, readdir, writeFile } from "fs/promises";
import type {
  DocumentKind,
  DocumentSummary,
  JsonDocument,
  PageSummary,
  ProjectSummary,
} from "@folio/shared";
import { ensureDir, isSafeId } from "./paths.js";

export type GetResult =
  | { status: "found"; document: JsonDocument }
  | { status: "not_found" };

export type CreateResult =
  | { status: "created" }
  | { status: "conflict" }
  | { status: "invalid"; error: string };

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface ListResult<K extends DocumentKind> {
  items: DocumentSummary<K>[];
  skipped: SkippedFile[];
}

/**
 * Storage seam for content documents. The filesystem implementation below is
 * the only one; callers depend on this interface so another backing store can
 * replace it.
 */
export interface DocumentStore {
  get(kind: DocumentKind, lang: string, slug: string): Promise<GetResult>;
  list<K extends DocumentKind>(kind: K, lang: string): Promise<ListResult<K>>;
  create(
    kind: DocumentKind,
    lang: string,
    slug: string,
    document: JsonDocument,
  ): Promise<CreateResult>;
}

export function isJsonObject(value: unknown): value is JsonDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function stringField(doc: JsonDocument, key: string): string {
  const v = doc[key];
  return typeof v === "string" ? v : "";
}

export function toPageSummary(slug: string, doc: JsonDocument): PageSummary {
  return { slug, title: stringField(doc, "title") };
}

export function toProjectSummary(slug: string, doc: JsonDocument): ProjectSummary {
  const images = Array.isArray(doc.images)
    ? doc.images.filter((v): v is string => typeof v === "string")
    : [];
  return {
    slug,
    title: stringField(doc, "title"),
    summary: stringField(doc, "summary"),
    images,
  };
}

function summarize<K extends DocumentKind>(
  kind: K,
  slug: string,
  doc: JsonDocument,
): DocumentSummary<K>;
function summarize(
  kind: DocumentKind,
  slug: string,
  doc: JsonDocument,
): PageSummary | ProjectSummary {
  return kind === "projects" ? toProjectSummary(slug, doc) : toPageSummary(slug, doc);
}

async function readJsonObject(path: string): Promise<JsonDocument> {
  const raw = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!isJsonObject(parsed)) throw new Error("Document is not a JSON object");
  return parsed;
}

/**
 * One pretty-printed JSON file per document:
 *   pages    -> {root}/{lang}/{slug}.json
 *   projects -> {root}/{lang}/projects/{slug}.json
 */
export class FileDocumentStore implements DocumentStore {
  constructor(private readonly root: string) {}

  private dirFor(kind: DocumentKind, lang: string): string {
    return kind === "projects"
      ? join(this.root, lang, "projects")
      : join(this.root, lang);
  }

  async get(kind: DocumentKind, lang: string, slug: string): Promise<GetResult> {
    if (!isSafeId(lang) || !isSafeId(slug)) return { status: "not_found" };
    try {
      const document = await readJsonObject(join(this.dirFor(kind, lang), `${slug}.json`));
      return { status: "found", document };
    } catch {
      // Absent, unreadable and unparsable files all read as missing.
      return { status: "not_found" };
    }
  }

  async list<K extends DocumentKind>(kind: K, lang: string): Promise<ListResult<K>> {
    const result: ListResult<K> = { items: [], skipped: [] };
    if (!isSafeId(lang)) return result;
    const dir = this.dirFor(kind, lang);

    const entries = await readdir(dir, { withFileTypes: true }).catch(
      (err: unknown) => {
        if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "ENOTDIR")) return null;
        throw err;
      },
    );
    if (!entries) return result;

    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(".json")) continue;
      const slug = entry.name.slice(0, -".json".length);
      try {
        const doc = await readJsonObject(join(dir, entry.name));
        result.items.push(summarize(kind, slug, doc));
      } catch (err) {
        result.skipped.push({
          file: entry.name,
          reason: err instanceof Error ? err.message : String(err),
        });
      }
    }

    result.items.sort((a, b) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
    return result;
  }

  async create(
    kind: DocumentKind,
    lang: string,
    slug: string,
    document: JsonDocument,
  ): Promise<CreateResult> {
    if (!isSafeId(lang)) return { status: "invalid", error: "Invalid lang" };
    if (!isSafeId(slug)) return { status: "invalid", error: "Invalid slug" };
    const dir = this.dirFor(kind, lang);
    await ensureDir(dir, this.root);
    try {
      // wx: fail instead of overwriting, so concurrent creates cannot clobber each other.
      await writeFile(
        join(dir, `${slug}.json`),
        `${JSON.stringify(document, null, 2)}\n`,
        { encoding: "utf8", flag: "wx" },
      );
    } catch (err) {
      if (isErrnoCode(err, "EEXIST")) return { status: "conflict" };
      throw err;
    }
    return { status: "created" };
  }
}
