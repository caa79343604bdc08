import { describe, it, expect } from 'vitest';
import { bookFileName, formatHighlight, generateBookMarkdown } from '../../src/shared/export.js';
import type { BookDocument, Highlight } from '../../src/types.js';

function makeHighlight(overrides: Partial<Highlight> = {}): Highlight {
  return { text: 'Some highlighted text', location: 'bk!ch01.xhtml', ...overrides };
}

function makeDocument(overrides: Partial<BookDocument> = {}): BookDocument {
  return {
    book: { id: 'bk', title: 'Test Book', author: 'Author Name' },
    sections: [],
    uncategorized: [],
    warnings: [],
    highlightCount: 0,
    ...overrides,
  };
}

describe('formatHighlight', () => {
  it('quotes the passage', () => {
    expect(formatHighlight(makeHighlight())).toEqual(['> Some highlighted text']);
  });

  it('quotes every line of a multi-line passage', () => {
    expect(formatHighlight(makeHighlight({ text: 'Line one\n\nLine two' }))).toEqual([
      '> Line one',
      '>',
      '> Line two',
    ]);
  });

  it('adds the note and the date after the quote', () => {
    expect(formatHighlight(makeHighlight({ text: 'Text', note: 'My note', createdAt: '2024-01-15T10:30:00' }))).toEqual([
      '> Text',
      '',
      '**Note:** My note',
      '',
      '*2024-01-15T10:30:00*',
    ]);
  });
});

describe('generateBookMarkdown', () => {
  it('writes the title, author, sections and uncategorized bucket', () => {
    const doc = makeDocument({
      sections: [
        { heading: 'Chapter I', depth: 1, level: 2, highlights: [] },
        {
          heading: 'Section 1',
          depth: 2,
          level: 3,
          highlights: [makeHighlight({ text: 'Important text', note: 'remember' })],
        },
      ],
      uncategorized: [makeHighlight({ text: 'orphan' })],
    });

    expect(generateBookMarkdown(doc)).toBe(
      [
        '# Test Book',
        '',
        '**Author:** Author Name',
        '',
        '---',
        '',
        '## Chapter I',
        '',
        '### Section 1',
        '',
        '> Important text',
        '',
        '**Note:** remember',
        '',
        '## Uncategorized',
        '',
        '> orphan',
        '',
      ].join('\n'),
    );
  });

  it('omits the author line and the uncategorized heading when there is nothing to show', () => {
    const doc = makeDocument({
      book: { id: 'bk', title: 'T' },
      sections: [{ heading: 'Ch', depth: 1, level: 2, highlights: [makeHighlight({ text: 'matched' })] }],
    });

    expect(generateBookMarkdown(doc)).toBe('# T\n\n---\n\n## Ch\n\n> matched\n');
  });
});

describe('bookFileName', () => {
  it('keeps letters, digits, spaces and dashes', () => {
    expect(bookFileName({ id: 'x', title: 'Hello World - 2024' })).toBe('Hello World - 2024.md');
  });

  it('removes other characters', () => {
    expect(bookFileName({ id: 'x', title: 'Book: A «Story»!' })).toBe('Book A Story.md');
  });

  it('keeps non-Latin letters', () => {
    expect(bookFileName({ id: 'x', title: 'Über Bäume' })).toBe('Über Bäume.md');
  });

  it('trims whitespace', () => {
    expect(bookFileName({ id: 'x', title: '  Hello  ' })).toBe('Hello.md');
  });

  it('falls back to untitled', () => {
    expect(bookFileName({ id: 'x', title: '???' })).toBe('untitled.md');
  });
});
