/**
 * Label vocabulary
 *
 * Layout detector classes and the block type each one produces.
 *
 *   class id → LayoutLabel → BlockType
 *   0 caption        → caption
 *   1 footnote       → text
 *   2 formula        → text
 *   3 list-item      → list-element
 *   4 page-footer    → footer
 *   5 page-header    → header
 *   6 picture        → image   (injected, never merged)
 *   7 section-header → subtitle
 *   8 table          → table   (injected, never merged)
 *   9 text           → text
 *  10 title          → title
 */

import type { Block, BlockType, LayoutLabel, MatchLabel, NonTextBlock, NonTextBlockType, TextualBlock } from './types';

/** Detector class ids, index = id */
export const LAYOUT_LABELS = [
  'caption',
  'footnote',
  'formula',
  'list-item',
  'page-footer',
  'page-header',
  'picture',
  'section-header',
  'table',
  'text',
  'title',
] as const satisfies readonly LayoutLabel[];

export const BLOCK_TYPE_BY_LABEL: Readonly<Record<MatchLabel, BlockType>> = {
  'caption': 'caption',
  'footnote': 'text',
  'formula': 'text',
  'list-item': 'list-element',
  'page-footer': 'footer',
  'page-header': 'header',
  'picture': 'image',
  'section-header': 'subtitle',
  'table': 'table',
  'text': 'text',
  'title': 'title',
  'undefined': 'undefined',
};

const NON_TEXT_TYPES: ReadonlySet<BlockType> = new Set<NonTextBlockType>(['table', 'image']);

export function blockTypeForLabel(label: MatchLabel): BlockType {
  return BLOCK_TYPE_BY_LABEL[label];
}

/** Label for a numeric detector class, undefined when out of range */
export function labelForClassId(classId: number): LayoutLabel | undefined {
  return Number.isInteger(classId) ? LAYOUT_LABELS[classId] : undefined;
}

export function isLayoutLabel(value: string): value is LayoutLabel {
  return LAYOUT_LABELS.some(label => label === value);
}

export function isNonTextType(type: BlockType): type is NonTextBlockType {
  return NON_TEXT_TYPES.has(type);
}

/** Regions with these labels are emitted as standalone table/image blocks */
export function isStandaloneLabel(label: MatchLabel): boolean {
  return isNonTextType(blockTypeForLabel(label));
}

export function isTextBlock(block: Block): block is TextualBlock {
  return !isNonTextType(block.type);
}

export function isNonTextBlock(block: Block): block is NonTextBlock {
  return isNonTextType(block.type);
}
