import { describe, it, expect } from 'vitest';
import { parsePages } from '../schemas';
import { InvalidInputError } from '../errors';

const validPage = {
  lines: [
    {
      text: 'Hello',
      words: [{ topLeft: { x: 1, y: 2 }, bottomRight: { x: 30, y: 12 } }],
    },
  ],
  regions: [
    {
      id: 'r1',
      label: 'title',
      bbox: { topLeft: { x: 0, y: 0 }, bottomRight: { x: 100, y: 20 } },
      confidence: 0.9,
    },
  ],
  dimensions: { width: 600, height: 800 },
};

describe('parsePages', () => {
  it('accepts well-formed pages', () => {
    const pages = parsePages([validPage]);
    expect(pages).toHaveLength(1);
    expect(pages[0].regions[0].label).toBe('title');
    expect(pages[0].lines[0].words).toHaveLength(1);
  });

  it('accepts pages without dimensions', () => {
    const { dimensions: _dimensions, ...page } = validPage;
    expect(parsePages([page])[0].dimensions).toBeUndefined();
  });

  it('rejects unknown labels with the failing path', () => {
    const raw = [{ ...validPage, regions: [{ ...validPage.regions[0], label: 'sidebar' }] }];

    try {
      parsePages(raw);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      const issues = (err as InvalidInputError).context.issues;
      expect(Array.isArray(issues) ? issues[0] : undefined).toMatch(/^0\.regions\.0\.label: /);
    }
  });

  it('rejects non-array input', () => {
    expect(() => parsePages({ lines: [] })).toThrow(InvalidInputError);
  });

  it('keeps empty word lists for the assembler to report', () => {
    const pages = parsePages([{ ...validPage, lines: [{ text: 'x', words: [] }] }]);
    expect(pages[0].lines[0].words).toEqual([]);
  });
});
