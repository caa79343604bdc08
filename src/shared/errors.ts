export const LOG_PREFIX = '[kobo-highlights]';

/** Base class for every error the exporter raises on purpose */
export class ExporterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The database file is missing, unreadable, or cannot be opened read-only */
export class SourceAccessError extends ExporterError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot open database ${path}: ${reason}`);
    this.path = path;
  }
}

/** The file opened but is not a Kobo database this exporter understands */
export class SchemaMismatchError extends ExporterError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Unrecognized database ${path}: ${detail}`);
    this.path = path;
  }
}

/** A TOC node does not lead back to the book root */
export class TocCycleError extends ExporterError {
  constructor(entryId: string) {
    super(`Cycle in table of contents at "${entryId}"`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
