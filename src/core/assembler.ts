import type { Highlight, HighlightOrder, Section, TocTree } from '../types.js';
import { DEFAULT_MAX_HEADING_LEVEL } from '../types.js';
import { ROOT_INDEX } from './toc-tree.js';
import { sortHighlights } from './matcher.js';

export interface AssembleOptions {
  maxHeadingLevel?: number;
  /** Order to restore in sections that absorb an untitled node's highlights */
  order?: HighlightOrder;
}

export interface AssembledDocument {
  sections: Section[];
  uncategorized: Highlight[];
}

/** H1 is the book title, so section headings live in 2..6 */
export function clampHeadingLevel(maxHeadingLevel: number | undefined): number {
  const requested = maxHeadingLevel ?? DEFAULT_MAX_HEADING_LEVEL;
  if (!Number.isFinite(requested)) return DEFAULT_MAX_HEADING_LEVEL;
  return Math.min(DEFAULT_MAX_HEADING_LEVEL, Math.max(2, Math.floor(requested)));
}

/**
 * Flatten a highlighted tree into headings in document order.
 *
 * Only nodes that carry a highlight themselves or through a descendant are
 * emitted. Untitled nodes get no heading: their children move up to their
 * depth and their highlights join the enclosing section.
 */
export function assembleSections(
  tree: TocTree,
  unmatched: readonly Highlight[],
  options: AssembleOptions = {},
): AssembledDocument {
  const maxLevel = clampHeadingLevel(options.maxHeadingLevel);
  const { nodes } = tree;

  const carries = new Map<number, boolean>();
  const carriesHighlights = (index: number): boolean => {
    const known = carries.get(index);
    if (known !== undefined) return known;
    const node = nodes[index];
    const result = node.highlights.length > 0 || node.children.some(carriesHighlights);
    carries.set(index, result);
    return result;
  };

  const sections: Section[] = [];
  const homeless: Highlight[] = [];
  const merged = new Set<Section>();

  const visit = (index: number, depth: number, enclosing: Section | null): void => {
    if (!carriesHighlights(index)) return;
    const node = nodes[index];
    const heading = node.entry.title.trim();

    if (index === ROOT_INDEX || heading === '') {
      if (node.highlights.length > 0) {
        if (enclosing) {
          enclosing.highlights.push(...node.highlights);
          merged.add(enclosing);
        } else {
          homeless.push(...node.highlights);
        }
      }
      for (const child of node.children) visit(child, depth, enclosing);
      return;
    }

    const section: Section = {
      heading,
      depth,
      level: Math.min(depth + 1, maxLevel),
      highlights: [...node.highlights],
    };
    sections.push(section);
    for (const child of node.children) visit(child, depth + 1, section);
  };

  visit(ROOT_INDEX, 1, null);

  for (const section of merged) section.highlights = sortHighlights(section.highlights, options.order);

  return { sections, uncategorized: [...sortHighlights(homeless, options.order), ...unmatched] };
}
