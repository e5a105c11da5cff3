import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { fromDoctr, type DoctrDocument } from '../doctr';
import { fromLayoutDetections, type LayoutDetection } from '../layout';
import { assembleDocument } from '../../assembler';
import { bbox } from '../../geometry';
import { InvalidInputError } from '../../errors';

import doctrSample from './fixtures/doctr-sample.json';
import layoutSample from './fixtures/layout-sample.json';

const doctrDoc = doctrSample as unknown as DoctrDocument;
const layouts = layoutSample as unknown as LayoutDetection[][];

describe('fromLayoutDetections', () => {
  it('maps class ids to labels and keeps detector order', () => {
    const regions = fromLayoutDetections(layouts[0]);

    expect(regions.map(r => [r.id, r.label])).toEqual([
      ['9d1f3c2a-0001', 'title'],
      ['9d1f3c2a-0002', 'text'],
      ['9d1f3c2a-0003', 'picture'],
    ]);
    expect(regions[0].bbox).toEqual(bbox(0.08, 0.04, 0.9, 0.1));
    expect(regions[0].confidence).toBe(0.93);
  });

  it('rejects unknown class ids', () => {
    const detection: LayoutDetection = {
      bbox_id: 'x',
      label: 11,
      prob: 0.5,
      bbox: { top_left: { x: 0, y: 0 }, bottom_right: { x: 1, y: 1 } },
    };

    try {
      fromLayoutDetections([detection], 2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect((err as InvalidInputError).context).toMatchObject({ pageIndex: 2, detectionIndex: 0, regionId: 'x' });
    }
  });
});

describe('fromDoctr', () => {
  it('flattens blocks into lines with word boxes and joined text', () => {
    const [page] = fromDoctr(doctrDoc, layouts);

    expect(page.lines.map(l => l.text)).toEqual([
      'Annual Review',
      'Membership grew steadily',
      'through spring',
    ]);
    expect(page.lines[0].words).toEqual([bbox(0.1, 0.05, 0.3, 0.08), bbox(0.32, 0.05, 0.5, 0.08)]);
    expect(page.dimensions).toEqual({ width: 600, height: 800 });
    expect(page.regions).toHaveLength(3);
  });

  it('feeds the assembler end to end', () => {
    const doc = assembleDocument(fromDoctr(doctrDoc, layouts), { logger: pino({ level: 'silent' }) });

    expect(doc.detectionOrigin).toBe('doctr');
    expect(doc.content).toEqual([
      { type: 'title', text: 'Annual Review', bbox: bbox(0.1, 0.05, 0.5, 0.08), metadata: {}, pageRange: [0, 0] },
      {
        type: 'text',
        text: 'Membership grew steadily\nthrough spring',
        bbox: bbox(0.1, 0.15, 0.85, 0.24),
        metadata: {},
        pageRange: [0, 0],
      },
      { type: 'image', text: '', bbox: bbox(0.1, 0.4, 0.9, 0.7), metadata: {}, pageRange: [0, 0] },
    ]);
  });

  it('rejects a block holding both lines and artefacts', () => {
    const [sourcePage] = doctrDoc.pages;
    const mixed: DoctrDocument = {
      pages: [{
        ...sourcePage,
        blocks: [{ ...sourcePage.blocks[0], artefacts: sourcePage.blocks[2].artefacts }],
      }],
    };

    try {
      fromDoctr(mixed, layouts);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect((err as InvalidInputError).message).toBe('Block should not contain both lines and artefacts');
      expect((err as InvalidInputError).context).toEqual({ pageIndex: 0, blockIndex: 0 });
    }
  });

  it('rejects mismatched page counts', () => {
    expect(() => fromDoctr(doctrDoc, [...layouts, []])).toThrow(InvalidInputError);
  });
});
