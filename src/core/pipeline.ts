import type { Book, BookDocument, ContentEntry, ExportOptions, Highlight } from '../types.js';
import type { KoboDatabase } from '../reader/database.js';
import { LOG_PREFIX } from '../shared/errors.js';
import { buildTocTree } from './toc-tree.js';
import { attachHighlights } from './matcher.js';
import { assembleSections } from './assembler.js';

/** Reconcile one book's TOC rows and highlights into an ordered document */
export function buildBookDocument(
  book: Book,
  entries: readonly ContentEntry[],
  highlights: readonly Highlight[],
  options: ExportOptions = {},
): BookDocument {
  const tree = buildTocTree(entries, { bookId: book.id });
  const matched = attachHighlights(tree, highlights, { order: options.order });
  const { sections, uncategorized } = assembleSections(matched.tree, matched.unmatched, {
    maxHeadingLevel: options.maxHeadingLevel,
    order: options.order,
  });

  return {
    book,
    sections,
    uncategorized,
    warnings: matched.tree.warnings,
    highlightCount: highlights.length,
  };
}

/**
 * Read one book from an open database. Returns null when the book has no
 * highlights, since there is nothing to export.
 */
export function readBookDocument(db: KoboDatabase, book: Book, options: ExportOptions = {}): BookDocument | null {
  const readWarnings: string[] = [];
  const highlights = db.listHighlights(book.id, readWarnings);
  if (highlights.length === 0) {
    reportWarnings(book, readWarnings);
    return null;
  }

  const entries = db.listContentEntries(book.id, readWarnings);
  const document = buildBookDocument(book, entries, highlights, options);
  document.warnings = [...readWarnings, ...document.warnings];
  reportWarnings(book, document.warnings);
  return document;
}

/**
 * Documents for every book with at least one highlight, in library order.
 * `onBooksListed` sees every book of the library before any is read.
 */
export function exportLibrary(
  db: KoboDatabase,
  options: ExportOptions = {},
  onBooksListed?: (books: readonly Book[]) => void,
): BookDocument[] {
  const bookWarnings: string[] = [];
  const books = db.listBooks(bookWarnings);
  for (const warning of bookWarnings) console.warn(`${LOG_PREFIX} ${warning}`);
  onBooksListed?.(books);

  const documents: BookDocument[] = [];
  for (const book of books) {
    const document = readBookDocument(db, book, options);
    if (document) documents.push(document);
  }
  return documents;
}

function reportWarnings(book: Book, warnings: readonly string[]): void {
  if (warnings.length === 0) return;
  console.warn(`${LOG_PREFIX} ${book.title}: ${warnings.length} data warning(s)`);
  for (const warning of warnings) console.warn(`${LOG_PREFIX}   ${warning}`);
}
