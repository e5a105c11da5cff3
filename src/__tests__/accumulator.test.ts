import { describe, it, expect } from 'vitest';
import { BlockAccumulator } from '../accumulator';
import { bbox } from '../geometry';
import { BlockConflictError } from '../errors';

describe('BlockAccumulator', () => {
  it('creates a block of the label\'s type on first sight', () => {
    const acc = new BlockAccumulator(3);
    acc.accumulate('r1', 'section-header', 'Methods', bbox(0, 0, 50, 10));

    const blocks = acc.finalize();
    expect(blocks.get('r1')).toEqual({
      type: 'subtitle',
      text: 'Methods',
      bbox: bbox(0, 0, 50, 10),
      metadata: {},
      pageRange: [3, 3],
    });
  });

  it('joins merged lines with a newline and unions the boxes', () => {
    const acc = new BlockAccumulator(0)
      .accumulate('r1', 'text', 'L1', bbox(5, 2, 95, 10))
      .accumulate('r1', 'text', 'L2', bbox(3, 11, 90, 19));

    const block = acc.finalize().get('r1');
    expect(block?.text).toBe('L1\nL2');
    expect(block?.bbox).toEqual(bbox(3, 2, 95, 19));
  });

  it('keeps the union box but reverses the text when lines arrive reversed', () => {
    const reversed = new BlockAccumulator(0)
      .accumulate('r1', 'text', 'L2', bbox(3, 11, 90, 19))
      .accumulate('r1', 'text', 'L1', bbox(5, 2, 95, 10));

    const block = reversed.finalize().get('r1');
    expect(block?.text).toBe('L2\nL1');
    expect(block?.bbox).toEqual(bbox(3, 2, 95, 19));
  });

  it('keeps separate ids apart, in first-seen order', () => {
    const acc = new BlockAccumulator(0)
      .accumulate('b', 'title', 'Title', bbox(0, 50, 10, 60))
      .accumulate('a', 'undefined', 'stray', bbox(0, 0, 10, 10));

    expect(acc.size).toBe(2);
    expect(acc.has('a')).toBe(true);
    expect([...acc.finalize().keys()]).toEqual(['b', 'a']);
  });

  it('maps the undefined label to an undefined block carrying the line text', () => {
    const block = new BlockAccumulator(0)
      .accumulate('gen-0', 'undefined', 'orphan', bbox(0, 0, 10, 10))
      .finalize()
      .get('gen-0');

    expect(block?.type).toBe('undefined');
    expect(block?.text).toBe('orphan');
  });

  it.each(['table', 'picture'] as const)('rejects a line matched to a %s region', (label) => {
    const acc = new BlockAccumulator(1);
    expect(() => acc.accumulate('t1', label, 'cell text', bbox(0, 0, 10, 10), { lineIndex: 7 }))
      .toThrow(BlockConflictError);

    try {
      acc.accumulate('t1', label, 'cell text', bbox(0, 0, 10, 10), { lineIndex: 7 });
    } catch (err) {
      expect((err as BlockConflictError).context).toMatchObject({ pageIndex: 1, lineIndex: 7, blockId: 't1', label });
    }
    expect(acc.has('t1')).toBe(false);
  });

  it('returns frozen blocks and refuses lines after finalize', () => {
    const acc = new BlockAccumulator(0).accumulate('r1', 'text', 'x', bbox(0, 0, 1, 1));
    const block = acc.finalize().get('r1');

    expect(Object.isFrozen(block)).toBe(true);
    expect(() => acc.accumulate('r1', 'text', 'y', bbox(0, 0, 1, 1))).toThrow('already finalized');
  });
});
