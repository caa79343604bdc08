import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { KoboLibrary } from '../../reader/library.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { errorResult, textResult } from '../types.js';
import { errorMessage } from '../../shared/errors.js';

export async function listBooksHandler(
  library: KoboLibrary,
  params: { withHighlightsOnly?: boolean },
): Promise<ToolResult | ErrorResult> {
  try {
    const books = library.listBooks();
    const filtered = params.withHighlightsOnly
      ? books.filter(b => b.highlightCount > 0)
      : books;
    return textResult(JSON.stringify(filtered, null, 2));
  } catch (err) {
    return errorResult(errorMessage(err));
  }
}

export function register(server: McpServer, library: KoboLibrary): void {
  server.tool(
    'list_books',
    'List the books in the Kobo library with their ID, title, author and number of highlights. Use the ID with the other tools.',
    {
      withHighlightsOnly: z.boolean().optional().describe('Only list books that have at least one highlight'),
    },
    async (params) => listBooksHandler(library, params),
  );
}
