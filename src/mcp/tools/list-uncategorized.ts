import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { KoboLibrary } from '../../reader/library.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { textResult } from '../types.js';
import { loadBook } from './load-book.js';

export async function listUncategorizedHandler(
  library: KoboLibrary,
  params: { bookId: string },
): Promise<ToolResult | ErrorResult> {
  const loaded = loadBook(library, params.bookId);
  if ('error' in loaded) return loaded.error;

  const uncategorized = loaded.document?.uncategorized ?? [];
  return textResult(JSON.stringify(uncategorized, null, 2));
}

export function register(server: McpServer, library: KoboLibrary): void {
  server.tool(
    'list_uncategorized',
    'List the highlights of one book that could not be placed under any chapter or section of its table of contents, with their content location.',
    { bookId: z.string().min(1).describe('The book ID from list_books') },
    async (params) => listUncategorizedHandler(library, params),
  );
}
