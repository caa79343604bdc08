import type { Book, BookDocument, ExportOptions } from '../types.js';
import { withKoboDatabase } from './database.js';
import { exportLibrary, readBookDocument } from '../core/pipeline.js';

export interface BookSummary extends Book {
  highlightCount: number;
}

/**
 * Access to a Kobo database by path.
 *
 * Every call opens the file, reads what it needs and closes it again, so
 * the device can be plugged and unplugged between calls and a long-lived
 * caller (the MCP server) never holds the file open.
 */
export class KoboLibrary {
  readonly dbPath: string;
  private options: ExportOptions;

  constructor(dbPath: string, options: ExportOptions = {}) {
    this.dbPath = dbPath;
    this.options = options;
  }

  listBooks(): BookSummary[] {
    return withKoboDatabase(this.dbPath, db =>
      db.listBooks().map(book => ({ ...book, highlightCount: db.listHighlights(book.id).length })),
    );
  }

  /**
   * The document of one book, or null when it has no highlights.
   * Returns undefined when no book has that id.
   */
  getBook(bookId: string): BookDocument | null | undefined {
    return withKoboDatabase(this.dbPath, db => {
      const book = db.listBooks().find(b => b.id === bookId);
      if (!book) return undefined;
      return readBookDocument(db, book, this.options);
    });
  }

  exportAll(): BookDocument[] {
    return withKoboDatabase(this.dbPath, db => exportLibrary(db, this.options));
  }
}
