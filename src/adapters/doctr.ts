import type { AssemblyPage, TextLine } from '../types';
import type { GeometryTuple } from './types';
import { fromLayoutDetections, type LayoutDetection } from './layout';
import { bbox } from '../geometry';
import { InvalidInputError } from '../errors';

/**
 * doctr adapter (OCR predictor, Document.export())
 *
 * Output: pages → blocks → lines → words
 * Bbox format: geometry [[x0, y0], [x1, y1]], relative 0-1 for straight pages
 * Page size: dimensions [height, width] in pixels
 *
 * Blocks carry either text lines or artefacts (logos, stamps), never both.
 */

export interface DoctrWord {
  value: string;
  confidence: number;
  geometry: GeometryTuple;
  objectness_score?: number;
}

export interface DoctrLine {
  geometry: GeometryTuple;
  words: DoctrWord[];
  objectness_score?: number;
}

export interface DoctrArtefact {
  artefact_type: string;
  confidence: number;
  geometry: GeometryTuple;
}

export interface DoctrBlock {
  geometry: GeometryTuple;
  lines: DoctrLine[];
  artefacts: DoctrArtefact[];
  objectness_score?: number;
}

export interface DoctrPage {
  page_idx: number;
  dimensions: [number, number];
  blocks: DoctrBlock[];
  orientation?: { value: number | null; confidence: number | null };
  language?: { value: string | null; confidence: number | null };
}

export interface DoctrDocument {
  pages: DoctrPage[];
}

/** Words joined by single spaces */
function renderLine(line: DoctrLine): string {
  return line.words.map(word => word.value).join(' ');
}

function toTextLine(line: DoctrLine): TextLine {
  return {
    text: renderLine(line),
    words: line.words.map(({ geometry: [[x0, y0], [x1, y1]] }) => bbox(x0, y0, x1, y1)),
  };
}

/**
 * Pair a doctr export with per-page layout detections.
 *
 * @param layouts one detection list per exported page, same order
 */
export function fromDoctr(doc: DoctrDocument, layouts: LayoutDetection[][]): AssemblyPage[] {
  if (doc.pages.length !== layouts.length) {
    throw new InvalidInputError(
      `Got ${doc.pages.length} OCR pages but ${layouts.length} layout pages`,
      { ocrPages: doc.pages.length, layoutPages: layouts.length },
    );
  }

  return doc.pages.map((page, pageIndex) => {
    const lines: TextLine[] = [];

    page.blocks.forEach((block, blockIndex) => {
      if (block.lines.length > 0 && block.artefacts.length > 0) {
        throw new InvalidInputError('Block should not contain both lines and artefacts', {
          pageIndex,
          blockIndex,
        });
      }
      lines.push(...block.lines.map(toTextLine));
    });

    const [height, width] = page.dimensions;

    return {
      lines,
      regions: fromLayoutDetections(layouts[pageIndex], pageIndex),
      dimensions: { width, height },
    };
  });
}
