/**
 * Sample Fixtures
 *
 * Pre-built detector outputs for demos and tests, no OCR or layout model
 * required. Coordinates are page pixels.
 *
 * @example
 * import { loadFixture, renderMarkdown } from 'layout-assembler';
 *
 * const doc = loadFixture('article');
 * console.log(renderMarkdown(doc));
 */

import { DocAssembler } from './assembler';
import { bbox } from './geometry';
import type { AssemblerOptions, AssemblyPage, LayoutDocument, TextLine } from './types';

// ============================================================================
// Fixture Types
// ============================================================================

export interface FixtureData {
  metadata: {
    documentId: string;
    fileName: string;
    detectionOrigin: string;
  };
  pages: AssemblyPage[];
}

export type FixtureName = 'article' | 'two-page-report';

/** Line whose words are laid out left to right at fixed width */
function line(text: string, x: number, y: number, height = 10, wordWidth = 40): TextLine {
  return {
    text,
    words: text.split(' ').map((_, i) => bbox(x + i * (wordWidth + 5), y, x + i * (wordWidth + 5) + wordWidth, y + height)),
  };
}

// ============================================================================
// Embedded Fixtures
// ============================================================================

const articleFixture: FixtureData = {
  metadata: {
    documentId: 'sample-article',
    fileName: 'field-notes.pdf',
    detectionOrigin: 'doctr',
  },
  pages: [
    {
      dimensions: { width: 600, height: 800 },
      regions: [
        { id: 'r-title', label: 'title', bbox: bbox(40, 30, 560, 70), confidence: 0.97 },
        { id: 'r-body', label: 'text', bbox: bbox(40, 90, 560, 160), confidence: 0.94 },
        { id: 'r-figure', label: 'picture', bbox: bbox(40, 180, 560, 480), confidence: 0.91 },
        { id: 'r-caption', label: 'caption', bbox: bbox(40, 490, 560, 515), confidence: 0.88 },
        { id: 'r-footer', label: 'page-footer', bbox: bbox(40, 760, 560, 790), confidence: 0.8 },
      ],
      lines: [
        line('Field Notes', 50, 40, 20),
        line('Tide pools were surveyed at dawn', 50, 100),
        line('across three sites on the north shore', 50, 115),
        line('Figure 1 Survey transect', 50, 495),
        line('Page 1', 280, 765),
        line('draft', 500, 600),
      ],
    },
  ],
};

const twoPageReportFixture: FixtureData = {
  metadata: {
    documentId: 'sample-report',
    fileName: 'quarterly-summary.pdf',
    detectionOrigin: 'doctr',
  },
  pages: [
    {
      dimensions: { width: 600, height: 800 },
      regions: [
        { id: 'p1-header', label: 'page-header', bbox: bbox(40, 10, 560, 30) },
        { id: 'p1-heading', label: 'section-header', bbox: bbox(40, 50, 560, 75) },
        { id: 'p1-list', label: 'list-item', bbox: bbox(40, 90, 560, 140) },
        { id: 'p1-table', label: 'table', bbox: bbox(40, 200, 560, 400) },
      ],
      lines: [
        line('Quarterly Summary', 50, 15),
        line('Highlights', 50, 55, 15),
        line('Output rose', 50, 95),
        line('Costs held', 50, 115),
      ],
    },
    {
      dimensions: { width: 600, height: 800 },
      regions: [
        { id: 'p2-body', label: 'text', bbox: bbox(40, 60, 560, 120) },
        { id: 'p2-note', label: 'footnote', bbox: bbox(40, 700, 560, 730) },
      ],
      lines: [
        line('Next quarter targets follow', 50, 65),
        line('Figures are unaudited', 50, 705),
      ],
    },
  ],
};

// ============================================================================
// Exports
// ============================================================================

/**
 * Raw fixture data by name
 */
export const fixtures: Record<FixtureName, FixtureData> = {
  'article': articleFixture,
  'two-page-report': twoPageReportFixture,
};

/**
 * List available fixture names
 */
export function listFixtures(): FixtureName[] {
  return ['article', 'two-page-report'];
}

/**
 * Get raw fixture data
 */
export function getFixture(name: FixtureName): FixtureData {
  const fixture = fixtures[name];
  if (!fixture) {
    throw new Error(`Unknown fixture: ${name}. Available: ${listFixtures().join(', ')}`);
  }
  return fixture;
}

/**
 * Assemble fixture data into a LayoutDocument
 *
 * @example
 * const doc = compileFixture(getFixture('article'), { threshold: 0.5 });
 */
export function compileFixture(data: FixtureData, options: AssemblerOptions = {}): LayoutDocument {
  return new DocAssembler({
    detectionOrigin: data.metadata.detectionOrigin,
    ...options,
    metadata: {
      documentId: data.metadata.documentId,
      fileName: data.metadata.fileName,
      ...options.metadata,
    },
  })
    .addPages(data.pages)
    .assemble();
}

/**
 * Load a named fixture and assemble it
 *
 * @example
 * const doc = loadFixture('two-page-report');
 * doc.content.filter(b => b.type === 'table').length; // 1
 */
export function loadFixture(name: FixtureName, options?: AssemblerOptions): LayoutDocument {
  return compileFixture(getFixture(name), options);
}
