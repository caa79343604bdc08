import type { BookDocument } from '../../types.js';
import type { KoboLibrary } from '../../reader/library.js';
import type { ErrorResult } from '../types.js';
import { errorResult } from '../types.js';
import { errorMessage } from '../../shared/errors.js';

/**
 * Read a book for a tool call. A missing book or an unreadable database
 * becomes an error result; a book without highlights is `null`.
 */
export function loadBook(
  library: KoboLibrary,
  bookId: string,
): { document: BookDocument | null } | { error: ErrorResult } {
  try {
    const document = library.getBook(bookId);
    if (document === undefined) {
      return { error: errorResult(`Book with ID "${bookId}" not found`) };
    }
    return { document };
  } catch (err) {
    return { error: errorResult(errorMessage(err)) };
  }
}
