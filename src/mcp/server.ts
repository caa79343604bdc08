import { resolve } from 'node:path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { KoboLibrary } from '../reader/library.js';
import { register as registerListBooks } from './tools/list-books.js';
import { register as registerGetBookOutline } from './tools/get-book-outline.js';
import { register as registerGetBookExport } from './tools/get-book-export.js';
import { register as registerListUncategorized } from './tools/list-uncategorized.js';

export function parseDbPath(argv: string[]): string {
  const idx = argv.indexOf('--db');
  const value = idx !== -1 && idx + 1 < argv.length ? argv[idx + 1] : undefined;
  const raw = value ?? './KoboReader.sqlite';
  return resolve(process.cwd(), raw);
}

export function createServer(library: KoboLibrary): McpServer {
  const server = new McpServer({
    name: 'kobo-highlights-mcp',
    version: '0.1.0',
  });

  registerListBooks(server, library);
  registerGetBookOutline(server, library);
  registerGetBookExport(server, library);
  registerListUncategorized(server, library);

  return server;
}

export async function main(argv: string[]): Promise<void> {
  const library = new KoboLibrary(parseDbPath(argv));
  const server = createServer(library);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
