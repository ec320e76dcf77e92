import { z } from 'zod';

/** Slugs and language codes double as path segments, so only these characters are allowed. */
export const IDENTIFIER_REGEX = /^[a-zA-Z0-9_-]+$/;

/** pages live in {lang}/, projects in {lang}/projects/. */
export type DocumentKind = 'pages' | 'projects';

export type JsonDocument = Record<string, unknown>;

export interface PageSummary {
  slug: string;
  title: string;
}

export interface ProjectSummary {
  slug: string;
  title: string;
  summary: string;
  images: string[];
}

export type DocumentSummary<K extends DocumentKind> = K extends 'projects'
  ? ProjectSummary
  : PageSummary;

export const langSchema = z
  .string()
  .trim()
  .min(1, { error: 'lang is required' })
  .regex(IDENTIFIER_REGEX, { error: 'lang: letters, numbers, hyphens and underscores only' });

/** An empty ?lang= counts as absent, so the default language applies. */
export const langQuerySchema = z.object({
  lang: z.preprocess(
    (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
    langSchema.optional(),
  ),
});

/** Create body: slug (and optionally lang) are checked, every other field is kept as sent. */
export const documentCreateSchema = z.looseObject({
  slug: z
    .string({ error: 'slug is required' })
    .min(1, { error: 'slug is required' })
    .regex(IDENTIFIER_REGEX, { error: 'slug: letters, numbers, hyphens and underscores only' }),
  lang: langSchema.optional(),
});

export interface DocumentCreatedResponse {
  status: 'created';
  slug: string;
  lang: string;
}
