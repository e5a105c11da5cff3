import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { compileFixture, getFixture, listFixtures, loadFixture } from '../fixtures';
import { bbox } from '../geometry';

const silent = pino({ level: 'silent' });

describe('fixtures', () => {
  it('lists every fixture', () => {
    expect(listFixtures()).toEqual(['article', 'two-page-report']);
  });

  it('assembles the article into six ordered blocks', () => {
    const doc = loadFixture('article', { logger: silent });

    expect(doc.content.map(block => block.type)).toEqual([
      'title',
      'text',
      'image',
      'caption',
      'undefined',
      'footer',
    ]);
    expect(doc.content[1].bbox).toEqual(bbox(50, 100, 360, 125));
    expect(doc.metadata).toMatchObject({ documentId: 'sample-article', fileName: 'field-notes.pdf', totalPages: 1 });
  });

  it('lets options override fixture metadata', () => {
    const doc = compileFixture(getFixture('two-page-report'), {
      logger: silent,
      detectionOrigin: 'replay',
      metadata: { fileName: 'renamed.pdf' },
    });

    expect(doc.detectionOrigin).toBe('replay');
    expect(doc.metadata.fileName).toBe('renamed.pdf');
    expect(doc.metadata.pageDimensions).toEqual([
      { width: 600, height: 800 },
      { width: 600, height: 800 },
    ]);
  });
});
