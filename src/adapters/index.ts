/**
 * Detector adapters: normalize raw detector output into assembler pages.
 */

// Shared types
export type {
  PointTuple,
  GeometryTuple,
  SerializedPoint,
  SerializedBBox,
} from './types';

// Layout detector
export { fromLayoutDetections } from './layout';
export type { LayoutDetection } from './layout';

// doctr OCR predictor
export { fromDoctr } from './doctr';
export type { DoctrDocument, DoctrPage, DoctrBlock, DoctrLine, DoctrWord, DoctrArtefact } from './doctr';
