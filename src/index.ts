export type {
  Book,
  BookDocument,
  ContentEntry,
  ExportOptions,
  Highlight,
  HighlightOrder,
  Section,
  TocNode,
  TocTree,
} from './types.js';
export { DEFAULT_MAX_HEADING_LEVEL, UNCATEGORIZED_HEADING } from './types.js';
export { KoboDatabase, withKoboDatabase } from './reader/database.js';
export { KoboLibrary } from './reader/library.js';
export type { BookSummary } from './reader/library.js';
export { buildTocTree, walkDocumentOrder } from './core/toc-tree.js';
export { attachHighlights, findNodeForLocation, sortHighlights } from './core/matcher.js';
export { assembleSections } from './core/assembler.js';
export { buildBookDocument, exportLibrary, readBookDocument } from './core/pipeline.js';
export { bookFileName, formatHighlight, generateBookMarkdown } from './shared/export.js';
export { ExporterError, SchemaMismatchError, SourceAccessError, TocCycleError } from './shared/errors.js';
