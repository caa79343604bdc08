import { z } from 'zod';

/** Columns the exporter reads, per table. Anything else in the file is ignored. */
export const REQUIRED_COLUMNS: Record<'content' | 'Bookmark', readonly string[]> = {
  content: ['ContentID', 'ContentType', 'BookID', 'Title', 'Attribution', 'VolumeIndex'],
  Bookmark: ['VolumeID', 'ContentID', 'Text', 'Annotation', 'DateCreated', 'ChapterProgress'],
};

export type KoboTable = keyof typeof REQUIRED_COLUMNS;

/** `content.ContentType` of a whole volume */
export const CONTENT_TYPE_BOOK = 6;

/** `content.ContentType` of a navigable TOC entry */
export const CONTENT_TYPE_TOC = 899;

const nullableText = z.string().nullable().optional();

// SQLite hands back whatever was stored; numeric columns sometimes hold text
const nullableNumber = z.union([z.number(), z.bigint(), z.string(), z.null()]).optional().transform(value => {
  if (value === null || value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
});

export const BookRowSchema = z.object({
  ContentID: z.string().min(1),
  Title: nullableText,
  Attribution: nullableText,
});

export const TocRowSchema = z.object({
  ContentID: z.string(),
  Title: nullableText,
  VolumeIndex: nullableNumber,
});

export const BookmarkRowSchema = z.object({
  ContentID: z.string(),
  Text: z.string(),
  Annotation: nullableText,
  DateCreated: nullableText,
  ChapterProgress: nullableNumber,
});
