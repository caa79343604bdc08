import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { KoboLibrary } from '../../reader/library.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { textResult } from '../types.js';
import { loadBook } from './load-book.js';

export async function getBookOutlineHandler(
  library: KoboLibrary,
  params: { bookId: string },
): Promise<ToolResult | ErrorResult> {
  const loaded = loadBook(library, params.bookId);
  if ('error' in loaded) return loaded.error;

  const { document } = loaded;
  const outline = {
    bookId: params.bookId,
    title: document?.book.title,
    author: document?.book.author,
    sections: document?.sections ?? [],
    uncategorized: document?.uncategorized ?? [],
    warnings: document?.warnings ?? [],
  };

  return textResult(JSON.stringify(outline, null, 2));
}

export function register(server: McpServer, library: KoboLibrary): void {
  server.tool(
    'get_book_outline',
    'Get the highlights of one book grouped under its table-of-contents headings, as JSON. Sections are in document order; highlights that fit no chapter are under "uncategorized".',
    { bookId: z.string().min(1).describe('The book ID from list_books') },
    async (params) => getBookOutlineHandler(library, params),
  );
}
