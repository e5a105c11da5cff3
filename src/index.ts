/**
 * Layout Assembler
 *
 * Reconciles OCR text lines with layout-detector regions into one typed,
 * reading-ordered document.
 *
 * Structure: Document → Block[] (pages concatenated, top to bottom per page)
 *
 * @example
 * const pages = fromDoctr(ocrExport, layoutDetections);
 * const doc = assembleDocument(pages, { threshold: 0.6 });
 *
 * doc.content.filter(block => block.type === 'title');
 * renderMarkdown(doc);
 */

// Types
export type {
  Point2D,
  BBox,
  LayoutLabel,
  MatchLabel,
  LayoutRegion,
  TextLine,
  PageDimensions,
  AssemblyPage,
  TextBlockType,
  NonTextBlockType,
  BlockType,
  PageRange,
  TextualBlock,
  NonTextBlock,
  TextBlock,
  TitleBlock,
  SubTitleBlock,
  HeaderBlock,
  FooterBlock,
  CaptionBlock,
  ListElementBlock,
  UndefinedBlock,
  TableBlock,
  ImageBlock,
  Block,
  DocumentMetadata,
  LayoutDocument,
  PageResult,
  NonTextLinePolicy,
  AssemblerOptions,
} from './types';

// Geometry
export { bbox, frozenBBox, assertValidBBox, area, intersectionArea, unionBBox, lineBBox } from './geometry';

// Labels
export {
  LAYOUT_LABELS,
  BLOCK_TYPE_BY_LABEL,
  blockTypeForLabel,
  labelForClassId,
  isLayoutLabel,
  isNonTextType,
  isStandaloneLabel,
  isTextBlock,
  isNonTextBlock,
} from './labels';

// Matching and accumulation
export { matchRegion, coverageRatio, DEFAULT_MATCH_THRESHOLD } from './matcher';
export type { RegionMatch, MatchOptions } from './matcher';
export { BlockAccumulator } from './accumulator';

// Assembler
export { DocAssembler, createAssembler, assembleDocument, mergePageResults } from './assembler';

// Configuration
export { resolveAssemblerOptions, DEFAULT_DETECTION_ORIGIN, DEFAULT_CONCURRENCY } from './config';
export type { ResolvedAssemblerOptions } from './config';

// Errors
export {
  AssemblyError,
  InvalidGeometryError,
  EmptyLineGeometryError,
  BlockConflictError,
  InvalidInputError,
  isAssemblyError,
} from './errors';
export type { AssemblyErrorCode } from './errors';

// Raw input validation
export { parsePages, assemblyPageSchema, assemblyPagesSchema, layoutRegionSchema, textLineSchema, bboxSchema } from './schemas';

// Detector adapters
export { fromDoctr, fromLayoutDetections } from './adapters';
export type {
  DoctrDocument,
  DoctrPage,
  DoctrBlock,
  DoctrLine,
  DoctrWord,
  DoctrArtefact,
  LayoutDetection,
} from './adapters';

// Rendering
export { renderMarkdown, formatDocument } from './render';

// Logging
export { logger, createChildLogger } from './logger';

// Sample fixtures
export {
  fixtures,
  loadFixture,
  compileFixture,
  listFixtures,
  getFixture,
} from './fixtures';
export type { FixtureData, FixtureName } from './fixtures';
