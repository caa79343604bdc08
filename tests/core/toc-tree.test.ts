import { describe, it, expect } from 'vitest';
import { buildTocTree, walkDocumentOrder, ROOT_INDEX } from '../../src/core/toc-tree.js';
import type { ContentEntry, TocTree } from '../../src/types.js';

/** `title@depth` for every node in document order, root excluded */
function outline(tree: TocTree): string[] {
  return walkDocumentOrder(tree)
    .filter(index => index !== ROOT_INDEX)
    .map(index => `${tree.nodes[index].entry.title}@${tree.nodes[index].depth}`);
}

/** Order-independent description of the tree: each id with its parent's id and its children's ids */
function shape(tree: TocTree): string[] {
  return walkDocumentOrder(tree).map(index => {
    const node = tree.nodes[index];
    const parent = node.parent === null ? '-' : tree.nodes[node.parent].entry.id;
    const children = node.children.map(c => tree.nodes[c].entry.id).join(',');
    return `${node.entry.id}<${parent}>[${children}]`;
  });
}

function entry(id: string, title: string, order?: number, level?: number): ContentEntry {
  const e: ContentEntry = { id, title };
  if (order !== undefined) e.order = order;
  if (level !== undefined) e.level = level;
  return e;
}

describe('buildTocTree', () => {
  it('merges the book entry into the root and hangs chapters under it', () => {
    const tree = buildTocTree(
      [entry('b1', 'Book Root', 0), entry('b1/c1', 'Chapter 1', 1), entry('b1/c2', 'Chapter 2', 2)],
      { bookId: 'b1' },
    );

    expect(tree.nodes).toHaveLength(3);
    expect(tree.nodes[ROOT_INDEX].entry.title).toBe('Book Root');
    expect(outline(tree)).toEqual(['Chapter 1@1', 'Chapter 2@1']);
    expect(tree.warnings).toEqual([]);
  });

  it('nests entries by the longest existing prefix', () => {
    const tree = buildTocTree([entry('A/1/2', 'Deep'), entry('A', 'Top'), entry('A/1', 'Mid')]);

    expect(outline(tree)).toEqual(['Top@1', 'Mid@2', 'Deep@3']);
  });

  it('attaches an entry to the nearest existing ancestor when the direct parent is missing', () => {
    const tree = buildTocTree([entry('A', 'Top'), entry('A/1/2', 'Deep')]);

    const deep = tree.nodes.find(n => n.entry.id === 'A/1/2');
    expect(deep?.parent).not.toBeNull();
    expect(tree.nodes[deep?.parent ?? ROOT_INDEX].entry.id).toBe('A');
    expect(outline(tree)).toEqual(['Top@1', 'Deep@2']);
  });

  it('attaches entries without any existing ancestor to the root', () => {
    const tree = buildTocTree([entry('X/1', 'Orphan'), entry('A', 'Top')]);

    expect(tree.nodes[ROOT_INDEX].children.map(i => tree.nodes[i].entry.id)).toEqual(['A', 'X/1']);
  });

  it('orders siblings by order key, then puts entries without a key last', () => {
    const tree = buildTocTree([
      entry('r/c', 'Third', 7),
      entry('r/a', 'No key'),
      entry('r/b', 'First', 1),
      entry('r/d', 'Second', 3),
    ]);

    expect(outline(tree)).toEqual(['First@1', 'Second@1', 'Third@1', 'No key@1']);
  });

  it('breaks order-key ties by identifier', () => {
    const tree = buildTocTree([entry('r/z', 'Z', 1), entry('r/m', 'M', 1), entry('r/a', 'A', 1)]);

    expect(outline(tree)).toEqual(['A@1', 'M@1', 'Z@1']);
  });

  it('breaks order-key ties by the plain identifier text, not by path segments', () => {
    const tree = buildTocTree([entry('r/a/b', 'Slash', 1), entry('r/a-x', 'Dash', 1)]);

    expect(outline(tree)).toEqual(['Dash@1', 'Slash@1']);
  });

  it('builds the same tree from any row order', () => {
    const rows = [
      entry('bk', 'Book', 0),
      entry('bk!p1', 'Part 1', 1),
      entry('bk!p1#s1', 'Section 1.1', 2),
      entry('bk!p1#s2', 'Section 1.2', 3),
      entry('bk!p2', 'Part 2', 4),
      entry('bk!p2#s1', 'Section 2.1', 5),
      entry('bk!appendix', 'Appendix'),
    ];
    const expected = shape(buildTocTree(rows, { bookId: 'bk' }));

    const permutations = [
      [...rows].reverse(),
      [rows[3], rows[6], rows[0], rows[5], rows[1], rows[4], rows[2]],
      [rows[6], rows[5], rows[1], rows[2], rows[0], rows[3], rows[4]],
    ];
    for (const permutation of permutations) {
      expect(shape(buildTocTree(permutation, { bookId: 'bk' }))).toEqual(expected);
    }
  });

  it('keeps the first of duplicate ids and reports the rest', () => {
    const tree = buildTocTree([entry('A/1', 'Later copy', 5), entry('A', 'Top', 0), entry('A/1', 'Earlier copy', 2)]);

    expect(outline(tree)).toEqual(['Top@1', 'Earlier copy@2']);
    expect(tree.warnings).toEqual(['Ignored duplicate content entry "A/1"']);
  });

  it('drops entries whose id cannot be parsed', () => {
    const tree = buildTocTree([entry('', 'Nameless'), entry('A', 'Top')]);

    expect(outline(tree)).toEqual(['Top@1']);
    expect(tree.warnings).toEqual(['Ignored content entry with unparseable id ""']);
  });

  it('keeps untitled entries, leaving pruning to the assembler', () => {
    const tree = buildTocTree([entry('A', ''), entry('A/1', 'Named')]);

    expect(outline(tree)).toEqual(['@1', 'Named@2']);
  });

  it('nests sibling fragments by their declared level', () => {
    const tree = buildTocTree([
      entry('bk!ch01.xhtml#ch01', 'KAPITEL I', 0, 1),
      entry('bk!ch01.xhtml#ch01_1', '1. Abschnitt', 1, 2),
      entry('bk!ch02.xhtml#ch02', 'KAPITEL II', 2, 1),
      entry('bk!ch02.xhtml#ch02_1', '1. Abschnitt', 3, 2),
    ]);

    expect(outline(tree)).toEqual(['KAPITEL I@1', '1. Abschnitt@2', 'KAPITEL II@1', '1. Abschnitt@2']);
  });

  it('closes deeper levels when a shallower sibling follows', () => {
    const tree = buildTocTree([
      entry('f#id_1', 'Forest', 0, 1),
      entry('f#id_2', 'Cave', 1, 2),
      entry('f#id_3', 'Door', 2, 3),
      entry('f#id_4', 'Key', 3, 4),
      entry('f#id_5', 'Pass', 4, 2),
    ]);

    expect(outline(tree)).toEqual(['Forest@1', 'Cave@2', 'Door@3', 'Key@4', 'Pass@2']);
  });

  it('does not nest entries that declare no level', () => {
    const tree = buildTocTree([entry('f#a', 'A', 0, 1), entry('f#b', 'B', 1), entry('f#c', 'C', 2, 2)]);

    expect(outline(tree)).toEqual(['A@1', 'B@1', 'C@1']);
  });

  it('returns only the root for no entries', () => {
    const tree = buildTocTree([], { bookId: 'bk' });

    expect(tree.nodes).toHaveLength(1);
    expect(tree.nodes[ROOT_INDEX].entry.id).toBe('bk');
    expect(tree.nodes[ROOT_INDEX].depth).toBe(0);
  });
});

describe('walkDocumentOrder', () => {
  it('lists the root first and visits children before later siblings', () => {
    const tree = buildTocTree([entry('A', 'A', 0), entry('A/1', 'A1', 1), entry('B', 'B', 2)]);

    expect(walkDocumentOrder(tree).map(i => tree.nodes[i].entry.title)).toEqual(['', 'A', 'A1', 'B']);
  });
});
