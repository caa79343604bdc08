import { copyFileSync, existsSync, mkdtempSync, rmSync, statSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type { Book, ContentEntry, Highlight } from '../types.js';
import { SchemaMismatchError, SourceAccessError, errorMessage } from '../shared/errors.js';
import { extractLevel, stripLevelSuffix } from '../core/content-id.js';
import {
  BookRowSchema,
  BookmarkRowSchema,
  CONTENT_TYPE_BOOK,
  CONTENT_TYPE_TOC,
  REQUIRED_COLUMNS,
  TocRowSchema,
} from './schema.js';
import type { KoboTable } from './schema.js';

const TableNameSchema = z.array(z.object({ name: z.string() }));

function isCorruptionError(err: unknown): boolean {
  return err instanceof Database.SqliteError && (err.code === 'SQLITE_NOTADB' || err.code === 'SQLITE_CORRUPT');
}

function parseRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rows: unknown[],
  table: KoboTable,
  warnings: string[],
): T[] {
  const parsed: T[] = [];
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      warnings.push(`Skipped malformed ${table} row: ${result.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join(', ')}`);
    }
  }
  return parsed;
}

interface Snapshot {
  dir: string;
  file: string;
}

/**
 * Copy the database, and a write-ahead log found beside it, into a fresh
 * temporary directory. SQLite keeps its `-wal`/`-shm` files next to the file
 * it opens, so they end up there instead of on the reader's volume.
 */
function takeSnapshot(path: string): Snapshot {
  const dir = mkdtempSync(join(tmpdir(), 'kobo-highlights-'));
  const file = join(dir, 'KoboReader.sqlite');
  try {
    copyFileSync(path, file);
    if (existsSync(`${path}-wal`)) copyFileSync(`${path}-wal`, `${file}-wal`);
  } catch (err) {
    rmSync(dir, { recursive: true, force: true });
    throw new SourceAccessError(path, errorMessage(err));
  }
  return { dir, file };
}

/**
 * Read-only view of a `KoboReader.sqlite` file.
 *
 * Queries run against a private snapshot of the file with `query_only` on.
 * The source and its directory are only ever read, whatever the journal
 * mode, and the snapshot is removed on `close()`. Row-level problems are
 * appended to the optional `warnings` array of each call instead of throwing.
 */
export class KoboDatabase {
  readonly path: string;
  private db: Database.Database;
  /** Temporary directory holding the copy being read */
  readonly snapshotDir: string;
  private hiddenColumn: boolean;

  private constructor(path: string, db: Database.Database, snapshotDir: string, hiddenColumn: boolean) {
    this.path = path;
    this.db = db;
    this.snapshotDir = snapshotDir;
    this.hiddenColumn = hiddenColumn;
  }

  /**
   * Open and validate a database.
   * Throws SourceAccessError when the file cannot be opened and
   * SchemaMismatchError when it is not a Kobo database.
   */
  static open(path: string): KoboDatabase {
    try {
      if (!statSync(path).isFile()) throw new SourceAccessError(path, 'not a regular file');
    } catch (err) {
      if (err instanceof SourceAccessError) throw err;
      const code = err instanceof Error && 'code' in err ? (err as NodeJS.ErrnoException).code : undefined;
      throw new SourceAccessError(path, code === 'ENOENT' ? 'file not found' : errorMessage(err));
    }

    const snapshot = takeSnapshot(path);
    const discard = (): void => rmSync(snapshot.dir, { recursive: true, force: true });

    // Writable so SQLite can rebuild the WAL index of the copied log
    let db: Database.Database;
    try {
      db = new Database(snapshot.file, { fileMustExist: true });
    } catch (err) {
      discard();
      if (isCorruptionError(err)) throw new SchemaMismatchError(path, 'not a SQLite database');
      throw new SourceAccessError(path, errorMessage(err));
    }

    try {
      const hiddenColumn = checkSchema(db, path);
      db.pragma('query_only = ON');
      return new KoboDatabase(path, db, snapshot.dir, hiddenColumn);
    } catch (err) {
      db.close();
      discard();
      throw err;
    }
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /** Every volume in the library, by title */
  listBooks(warnings: string[] = []): Book[] {
    const rows = this.db
      .prepare(
        `SELECT ContentID, Title, Attribution
         FROM content
         WHERE BookID IS NULL AND ContentType = ?
         ORDER BY Title, ContentID`,
      )
      .all(CONTENT_TYPE_BOOK);

    return parseRows(BookRowSchema, rows, 'content', warnings).map(row => {
      const book: Book = { id: row.ContentID, title: row.Title?.trim() || row.ContentID };
      const author = row.Attribution?.trim();
      if (author) book.author = author;
      return book;
    });
  }

  /**
   * TOC rows of one book. The trailing `-N` of a TOC ContentID is its level
   * and is stripped so the id lines up with bookmark ContentIDs.
   */
  listContentEntries(bookId: string, warnings: string[] = []): ContentEntry[] {
    const rows = this.db
      .prepare(
        `SELECT ContentID, Title, VolumeIndex
         FROM content
         WHERE BookID = ? AND ContentType = ?
         ORDER BY VolumeIndex, ContentID`,
      )
      .all(bookId, CONTENT_TYPE_TOC);

    return parseRows(TocRowSchema, rows, 'content', warnings).map(row => {
      const entry: ContentEntry = {
        id: stripLevelSuffix(row.ContentID),
        title: row.Title?.trim() ?? '',
        level: extractLevel(row.ContentID),
      };
      if (row.VolumeIndex !== undefined) entry.order = row.VolumeIndex;
      return entry;
    });
  }

  /** Text highlights of one book; dogears and empty bookmarks are left out */
  listHighlights(bookId: string, warnings: string[] = []): Highlight[] {
    const hidden = this.hiddenColumn ? `AND (Hidden IS NULL OR Hidden = 0 OR Hidden = 'false')` : '';
    const rows = this.db
      .prepare(
        `SELECT ContentID, Text, Annotation, DateCreated, ChapterProgress
         FROM Bookmark
         WHERE VolumeID = ?
           AND Text IS NOT NULL
           AND Text != ''
           ${hidden}
         ORDER BY ContentID, ChapterProgress, rowid`,
      )
      .all(bookId);

    const highlights: Highlight[] = [];
    for (const row of parseRows(BookmarkRowSchema, rows, 'Bookmark', warnings)) {
      const text = row.Text.trim();
      if (!text) continue;
      const highlight: Highlight = { text, location: row.ContentID };
      const note = row.Annotation?.trim();
      if (note) highlight.note = note;
      if (row.DateCreated) highlight.createdAt = row.DateCreated;
      if (row.ChapterProgress !== undefined) highlight.position = row.ChapterProgress;
      highlights.push(highlight);
    }
    return highlights;
  }

  close(): void {
    if (this.db.open) this.db.close();
    rmSync(this.snapshotDir, { recursive: true, force: true });
  }
}

/**
 * Fail fast when the file is not a database or lacks a table/column we read.
 * Returns whether `Bookmark.Hidden` exists.
 */
function checkSchema(db: Database.Database, path: string): boolean {
  let tables: Set<string>;
  try {
    const rows = TableNameSchema.parse(db.prepare(`SELECT name FROM sqlite_master WHERE type = 'table'`).all());
    tables = new Set(rows.map(r => r.name.toLowerCase()));
  } catch (err) {
    if (isCorruptionError(err)) throw new SchemaMismatchError(path, 'not a SQLite database');
    throw new SourceAccessError(path, errorMessage(err));
  }

  let hiddenColumn = false;
  for (const [table, required] of Object.entries(REQUIRED_COLUMNS)) {
    if (!tables.has(table.toLowerCase())) {
      throw new SchemaMismatchError(path, `missing table "${table}"`);
    }
    const columns = TableNameSchema.parse(db.prepare(`PRAGMA table_info("${table}")`).all());
    const present = new Set(columns.map(c => c.name.toLowerCase()));
    const missing = required.filter(column => !present.has(column.toLowerCase()));
    if (missing.length > 0) {
      throw new SchemaMismatchError(path, `table "${table}" lacks column(s) ${missing.join(', ')}`);
    }
    if (table === 'Bookmark') hiddenColumn = present.has('hidden');
  }
  return hiddenColumn;
}

/**
 * Run `fn` against an open database and always close it afterwards,
 * whether `fn` returns or throws.
 */
export function withKoboDatabase<T>(path: string, fn: (db: KoboDatabase) => T): T {
  const db = KoboDatabase.open(path);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}
