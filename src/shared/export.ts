import type { Book, BookDocument, Highlight } from '../types.js';
import { UNCATEGORIZED_HEADING } from '../types.js';

/**
 * Render one highlight as Markdown lines: the passage as a blockquote,
 * then the note and the creation date when present.
 */
export function formatHighlight(h: Highlight): string[] {
  const lines = h.text.split(/\r?\n/).map(line => (line.trim() ? `> ${line}` : '>'));

  if (h.note) {
    lines.push('', `**Note:** ${h.note}`);
  }
  if (h.createdAt) {
    lines.push('', `*${h.createdAt}*`);
  }
  return lines;
}

/**
 * Generate the Markdown document for a book.
 *
 * Shared between the CLI, which writes it to disk, and the MCP server.
 */
export function generateBookMarkdown(doc: BookDocument): string {
  const lines: string[] = [`# ${doc.book.title}`, ''];
  if (doc.book.author) {
    lines.push(`**Author:** ${doc.book.author}`, '');
  }
  lines.push('---', '');

  for (const section of doc.sections) {
    lines.push(`${'#'.repeat(section.level)} ${section.heading}`, '');
    for (const h of section.highlights) {
      lines.push(...formatHighlight(h), '');
    }
  }

  if (doc.uncategorized.length > 0) {
    lines.push(`## ${UNCATEGORIZED_HEADING}`, '');
    for (const h of doc.uncategorized) {
      lines.push(...formatHighlight(h), '');
    }
  }

  return lines.join('\n');
}

/** Letters, digits, spaces and dashes of the title, plus `.md` */
export function bookFileName(book: Book): string {
  const base = book.title.replace(/[^\p{L}\p{N} -]/gu, '').trim();
  return `${base || 'untitled'}.md`;
}
