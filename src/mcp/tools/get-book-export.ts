import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { KoboLibrary } from '../../reader/library.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { textResult } from '../types.js';
import { generateBookMarkdown } from '../../shared/export.js';
import { loadBook } from './load-book.js';

export async function getBookExportHandler(
  library: KoboLibrary,
  params: { bookId: string },
): Promise<ToolResult | ErrorResult> {
  const loaded = loadBook(library, params.bookId);
  if ('error' in loaded) return loaded.error;

  if (!loaded.document) {
    return textResult('This book has no highlights.');
  }
  return textResult(generateBookMarkdown(loaded.document));
}

export function register(server: McpServer, library: KoboLibrary): void {
  server.tool(
    'get_book_export',
    'Get the Markdown export of one book: its highlights and notes under the chapter headings they belong to, with an Uncategorized section for the rest.',
    { bookId: z.string().min(1).describe('The book ID from list_books') },
    async (params) => getBookExportHandler(library, params),
  );
}
