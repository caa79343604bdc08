import type { Highlight, HighlightOrder, TocNode, TocTree } from '../types.js';
import { isPathPrefix, splitContentId } from './content-id.js';
import { ROOT_INDEX } from './toc-tree.js';

export interface MatchResult {
  /** Copy of the input tree with highlights attached to its nodes */
  tree: TocTree;
  unmatched: Highlight[];
}

export interface AttachOptions {
  order?: HighlightOrder;
}

function earlierOrder(a: TocNode, b: TocNode): boolean {
  const x = a.entry.order;
  const y = b.entry.order;
  if (x === undefined) return false;
  return y === undefined || x < y;
}

/**
 * Find the node a location belongs to: the one whose id is the longest
 * segment-prefix of the location. The root never matches, so a location
 * under the book but outside every chapter yields null.
 */
export function findNodeForLocation(tree: TocTree, location: string): number | null {
  const path = splitContentId(location);
  if (!path) return null;

  let best: TocNode | null = null;
  for (const node of tree.nodes) {
    if (node.index === ROOT_INDEX || !isPathPrefix(node.path, path)) continue;
    if (
      !best ||
      node.path.length > best.path.length ||
      (node.path.length === best.path.length && earlierOrder(node, best))
    ) {
      best = node;
    }
  }
  return best ? best.index : null;
}

function timestampOf(h: Highlight): number {
  if (!h.createdAt) return Number.NaN;
  return Date.parse(h.createdAt);
}

/** Missing values sort last; equal values keep their input order (stable sort) */
function compareMaybe(a: number | undefined, b: number | undefined): number {
  const bMissing = b === undefined || Number.isNaN(b);
  if (a === undefined || Number.isNaN(a)) return bMissing ? 0 : 1;
  if (b === undefined || bMissing) return -1;
  return a - b;
}

export function sortHighlights(highlights: readonly Highlight[], order: HighlightOrder = 'created'): Highlight[] {
  const sorted = [...highlights];
  if (order === 'position') {
    sorted.sort((a, b) => compareMaybe(a.position, b.position));
  } else {
    sorted.sort((a, b) => compareMaybe(timestampOf(a), timestampOf(b)));
  }
  return sorted;
}

/**
 * Give every highlight exactly one owner: the node it matches, or the
 * unmatched list. Locations that cannot be parsed are unmatched and noted
 * in the returned tree's warnings.
 */
export function attachHighlights(
  tree: TocTree,
  highlights: readonly Highlight[],
  options: AttachOptions = {},
): MatchResult {
  const nodes: TocNode[] = tree.nodes.map(node => ({ ...node, children: [...node.children], highlights: [] }));
  const warnings = [...tree.warnings];
  const result: TocTree = { nodes, warnings };
  const unmatched: Highlight[] = [];

  for (const highlight of highlights) {
    if (!splitContentId(highlight.location)) {
      warnings.push(`Highlight with unparseable location ${JSON.stringify(highlight.location)} left uncategorized`);
      unmatched.push(highlight);
      continue;
    }
    const index = findNodeForLocation(result, highlight.location);
    if (index === null) {
      unmatched.push(highlight);
    } else {
      nodes[index].highlights.push(highlight);
    }
  }

  for (const node of nodes) {
    if (node.highlights.length > 1) node.highlights = sortHighlights(node.highlights, options.order);
  }

  return { tree: result, unmatched: sortHighlights(unmatched, options.order) };
}
