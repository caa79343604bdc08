import type { ContentEntry, TocNode, TocTree } from '../types.js';
import { TocCycleError } from '../shared/errors.js';
import { comparePaths, isProperPathPrefix, splitContentId } from './content-id.js';

export const ROOT_INDEX = 0;

export interface BuildTreeOptions {
  /** Identifier of the book itself; an entry with this id is merged into the root */
  bookId?: string;
}

interface PreparedEntry {
  entry: ContentEntry;
  path: string[];
}

/** Missing order keys sort after present ones */
function compareOrder(a: number | undefined, b: number | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a - b;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function comparePrepared(a: PreparedEntry, b: PreparedEntry): number {
  return (
    comparePaths(a.path, b.path) ||
    compareOrder(a.entry.order, b.entry.order) ||
    compareText(a.entry.title, b.entry.title) ||
    compareOrder(a.entry.level, b.entry.level)
  );
}

/**
 * Rebuild a book's table of contents from its flat content rows.
 *
 * Parentage comes from identifier prefixes: an entry hangs under the closest
 * entry whose id is a proper segment-prefix of its own, or under the root.
 * Siblings are then ordered by their order key and, where rows declare a TOC
 * level, deeper-level siblings nest under the preceding shallower one.
 * The result does not depend on the order of `entries`.
 */
export function buildTocTree(entries: readonly ContentEntry[], options: BuildTreeOptions = {}): TocTree {
  const warnings: string[] = [];
  const bookPath = options.bookId !== undefined ? splitContentId(options.bookId) : null;

  const prepared: PreparedEntry[] = [];
  for (const entry of entries) {
    const path = splitContentId(entry.id);
    if (!path) {
      warnings.push(`Ignored content entry with unparseable id ${JSON.stringify(entry.id)}`);
      continue;
    }
    prepared.push({ entry, path });
  }
  prepared.sort(comparePrepared);

  const root: TocNode = {
    index: ROOT_INDEX,
    entry: { id: options.bookId ?? '', title: '' },
    path: bookPath ?? [],
    depth: 0,
    parent: null,
    children: [],
    highlights: [],
  };
  const nodes: TocNode[] = [root];

  // Chain of ancestors of the most recently placed entry
  const stack: TocNode[] = [];
  let previous: PreparedEntry | undefined;

  for (const item of prepared) {
    if (previous && comparePaths(previous.path, item.path) === 0) {
      warnings.push(`Ignored duplicate content entry "${item.entry.id}"`);
      continue;
    }
    previous = item;

    if (bookPath && comparePaths(bookPath, item.path) === 0) {
      root.entry = { ...root.entry, title: item.entry.title, order: item.entry.order };
      continue;
    }

    while (stack.length > 0 && !isProperPathPrefix(stack[stack.length - 1].path, item.path)) {
      stack.pop();
    }
    const parent = stack.length > 0 ? stack[stack.length - 1] : root;

    const node: TocNode = {
      index: nodes.length,
      entry: item.entry,
      path: item.path,
      depth: 0,
      parent: parent.index,
      children: [],
      highlights: [],
    };
    nodes.push(node);
    parent.children.push(node.index);
    stack.push(node);
  }

  const bySiblingOrder = (a: number, b: number): number =>
    compareOrder(nodes[a].entry.order, nodes[b].entry.order) ||
    compareText(nodes[a].entry.id, nodes[b].entry.id) ||
    a - b;

  for (const node of nodes) node.children.sort(bySiblingOrder);
  nestByLevel(nodes, ROOT_INDEX, bySiblingOrder);
  assignDepths(nodes);

  return { nodes, warnings };
}

/**
 * Sibling TOC fragments of one file share no path prefix, so the declared
 * level is what says that "1. Section" belongs to the chapter before it.
 */
function nestByLevel(nodes: TocNode[], parentIndex: number, bySiblingOrder: (a: number, b: number) => number): void {
  const parent = nodes[parentIndex];
  const kept: number[] = [];
  const open: TocNode[] = [];
  const adopters = new Set<TocNode>();

  for (const childIndex of parent.children) {
    const child = nodes[childIndex];
    const level = child.entry.level;
    if (level === undefined) {
      open.length = 0;
      kept.push(childIndex);
      continue;
    }

    while (open.length > 0 && (open[open.length - 1].entry.level ?? 0) >= level) {
      open.pop();
    }
    if (open.length > 0) {
      const adopter = open[open.length - 1];
      adopter.children.push(childIndex);
      adopters.add(adopter);
      child.parent = adopter.index;
    } else {
      kept.push(childIndex);
    }
    open.push(child);
  }

  parent.children = kept;
  for (const adopter of adopters) adopter.children.sort(bySiblingOrder);

  for (const childIndex of parent.children) {
    nestByLevel(nodes, childIndex, bySiblingOrder);
  }
}

function assignDepths(nodes: TocNode[]): void {
  const queue: number[] = [ROOT_INDEX];
  const seen = new Set<number>([ROOT_INDEX]);
  for (let i = 0; i < queue.length; i++) {
    const node = nodes[queue[i]];
    for (const childIndex of node.children) {
      if (seen.has(childIndex)) throw new TocCycleError(nodes[childIndex].entry.id);
      seen.add(childIndex);
      nodes[childIndex].depth = node.depth + 1;
      queue.push(childIndex);
    }
  }
  for (const node of nodes) {
    if (!seen.has(node.index)) throw new TocCycleError(node.entry.id);
  }
}

/** Indices of the nodes in document order, root first */
export function walkDocumentOrder(tree: TocTree): number[] {
  const order: number[] = [];
  const visit = (index: number): void => {
    order.push(index);
    for (const child of tree.nodes[index].children) visit(child);
  };
  visit(ROOT_INDEX);
  return order;
}
