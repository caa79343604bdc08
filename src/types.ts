/** A volume in the reader's library */
export interface Book {
  id: string;
  title: string;
  author?: string;
}

/**
 * One node of a book's internal structure as stored on the device:
 * the book root, a chapter, or a sub-section.
 */
export interface ContentEntry {
  /** Path-like identifier; its segment prefixes denote ancestor entries */
  id: string;
  title: string;
  /** Declared TOC level (1 = top) */
  level?: number;
  /** Document-order key used to sort siblings */
  order?: number;
}

/** A highlighted passage with its optional note */
export interface Highlight {
  text: string;
  note?: string;
  createdAt?: string;
  /** Identifier of the content container the highlight was made in */
  location: string;
  /** Fractional position inside the container */
  position?: number;
}

/** How highlights are ordered inside a section */
export type HighlightOrder = 'created' | 'position';

export interface TocNode {
  index: number;
  entry: ContentEntry;
  /** Segments of `entry.id` */
  path: string[];
  /** Distance from the synthetic root (root = 0) */
  depth: number;
  parent: number | null;
  children: number[];
  highlights: Highlight[];
}

/**
 * Arena of TOC nodes. Index 0 is always the synthetic root standing
 * for the whole book; edges are stored as indices.
 */
export interface TocTree {
  nodes: TocNode[];
  /** Row-level anomalies found while building */
  warnings: string[];
}

/** A heading of the assembled document with the highlights under it */
export interface Section {
  heading: string;
  depth: number;
  /** Markdown heading level, clamped */
  level: number;
  highlights: Highlight[];
}

export interface BookDocument {
  book: Book;
  sections: Section[];
  uncategorized: Highlight[];
  warnings: string[];
  highlightCount: number;
}

export interface ExportOptions {
  /** Highlight order inside a section (default: 'created') */
  order?: HighlightOrder;
  /** Deepest Markdown heading level emitted (default: 6) */
  maxHeadingLevel?: number;
}

export const DEFAULT_MAX_HEADING_LEVEL = 6;

export const UNCATEGORIZED_HEADING = 'Uncategorized';
