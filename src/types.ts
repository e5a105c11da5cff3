/**
 * Layout Document Types
 *
 * Two detections over the same page go in:
 *   - text lines (OCR) with recognized text
 *   - layout regions (title, table, picture, ...) from a layout detector
 *
 * One flat, reading-ordered sequence of typed blocks comes out:
 *   Document → Block[] (pages concatenated in order)
 */

import type { Logger } from 'pino';

// ============================================================================
// Geometry
// ============================================================================

export interface Point2D {
  x: number;
  y: number;
}

/**
 * Axis-aligned rectangle in page pixels or normalized 0-1 coordinates.
 * topLeft must not lie right of or below bottomRight.
 */
export interface BBox {
  topLeft: Point2D;
  bottomRight: Point2D;
}

// ============================================================================
// Detector Inputs
// ============================================================================

/**
 * Layout classes emitted by the layout detector, in class-id order (0-10).
 */
export type LayoutLabel =
  | 'caption'
  | 'footnote'
  | 'formula'
  | 'list-item'
  | 'page-footer'
  | 'page-header'
  | 'picture'
  | 'section-header'
  | 'table'
  | 'text'
  | 'title';

/** Label reported by the matcher when no region covers a line */
export type MatchLabel = LayoutLabel | 'undefined';

export interface LayoutRegion {
  id: string;
  label: LayoutLabel;
  bbox: BBox;
  confidence?: number;
}

/** One recognized line; its box is the union of its word boxes */
export interface TextLine {
  text: string;
  words: BBox[];
}

export interface PageDimensions {
  width: number;
  height: number;
}

export interface AssemblyPage {
  lines: TextLine[];
  /** Ordered by the layout detector; earlier regions win overlap ties */
  regions: LayoutRegion[];
  dimensions?: PageDimensions;
}

// ============================================================================
// Blocks
// ============================================================================

export type TextBlockType =
  | 'text'
  | 'title'
  | 'subtitle'
  | 'header'
  | 'footer'
  | 'caption'
  | 'list-element'
  | 'undefined';

export type NonTextBlockType = 'table' | 'image';

export type BlockType = TextBlockType | NonTextBlockType;

/** Inclusive, 0-based [start, end] page indices */
export type PageRange = readonly [number, number];

interface BlockBase<T extends BlockType> {
  readonly type: T;
  readonly text: string;
  readonly bbox: BBox;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly pageRange: PageRange;
}

export type TextualBlock<T extends TextBlockType = TextBlockType> = BlockBase<T>;

export interface NonTextBlock<T extends NonTextBlockType = NonTextBlockType> extends BlockBase<T> {
  readonly text: '';
}

export type TextBlock = TextualBlock<'text'>;
export type TitleBlock = TextualBlock<'title'>;
export type SubTitleBlock = TextualBlock<'subtitle'>;
export type HeaderBlock = TextualBlock<'header'>;
export type FooterBlock = TextualBlock<'footer'>;
export type CaptionBlock = TextualBlock<'caption'>;
export type ListElementBlock = TextualBlock<'list-element'>;
export type UndefinedBlock = TextualBlock<'undefined'>;
export type TableBlock = NonTextBlock<'table'>;
export type ImageBlock = NonTextBlock<'image'>;

/** Tagged on `type`; narrow with isTextBlock or a switch on the tag */
export type Block = TextualBlock | NonTextBlock;

// ============================================================================
// Document
// ============================================================================

export interface DocumentMetadata {
  totalPages: number;
  totalBlocks: number;
  /** One entry per input page, null when the page carried no dimensions */
  pageDimensions: (PageDimensions | null)[];
  [key: string]: unknown;
}

export interface LayoutDocument {
  metadata: DocumentMetadata;
  content: Block[];
  /** Tag naming the pipeline that produced the raw detections */
  detectionOrigin: string;
}

/** Output of one page's pass, before concatenation */
export interface PageResult {
  pageIndex: number;
  blocks: Block[];
}

// ============================================================================
// Assembler Options
// ============================================================================

/**
 * What to do with a line whose best region is a table or picture.
 *   reject - raise BlockConflictError
 *   drop   - skip the line; the injected table/image block covers it
 */
export type NonTextLinePolicy = 'reject' | 'drop';

export interface AssemblerOptions {
  /** Fraction of a line's area a region must cover, exclusive (default 0.6) */
  threshold?: number;

  /** Detection-origin tag on the output document (default 'doctr') */
  detectionOrigin?: string;

  /** Extra document-level metadata */
  metadata?: Record<string, unknown>;

  nonTextLines?: NonTextLinePolicy;

  /** Identifier source for unmatched lines and injected regions */
  generateId?: () => string;

  logger?: Logger;

  /** Worker count for assembleConcurrently (default 4) */
  concurrency?: number;
}
