/**
 * BlockAccumulator - per-page, identifier-keyed block builder
 *
 * Owned by exactly one page pass. Lines must be fed in detection order:
 * merged text is concatenated in the order accumulate() is called.
 *
 * Usage:
 *   const acc = new BlockAccumulator(pageIndex);
 *   acc.accumulate(match.id, match.label, line.text, box);
 *   const blocks = acc.finalize(); // Map<id, block>
 */

import type { BBox, MatchLabel, TextBlockType, TextualBlock } from './types';
import { blockTypeForLabel, isNonTextType } from './labels';
import { frozenBBox, unionBBox } from './geometry';
import { BlockConflictError } from './errors';

interface DraftBlock {
  type: TextBlockType;
  lines: string[];
  bbox: BBox;
}

export class BlockAccumulator {
  private drafts = new Map<string, DraftBlock>();
  private finalized = false;

  constructor(public readonly pageIndex: number) {}

  get size(): number {
    return this.drafts.size;
  }

  has(id: string): boolean {
    return this.drafts.has(id);
  }

  /**
   * Start a block for a new id, or merge the line into the existing one:
   * text joined with '\n', box grown to the union.
   *
   * @throws BlockConflictError when the label maps to a table/image block
   */
  accumulate(
    id: string,
    label: MatchLabel,
    text: string,
    box: BBox,
    context: Record<string, unknown> = {},
  ): this {
    if (this.finalized) {
      throw new Error(`Accumulator for page ${this.pageIndex} is already finalized`);
    }

    const type = blockTypeForLabel(label);
    if (isNonTextType(type)) {
      throw new BlockConflictError(
        `Text line matched ${label} region '${id}', which only takes direct injection`,
        { ...context, pageIndex: this.pageIndex, blockId: id, label, text },
      );
    }

    const existing = this.drafts.get(id);
    if (existing) {
      existing.lines.push(text);
      existing.bbox = unionBBox(existing.bbox, box);
    } else {
      this.drafts.set(id, { type, lines: [text], bbox: box });
    }
    return this;
  }

  /**
   * Freeze the drafts into blocks, keyed by id in first-seen order.
   */
  finalize(): Map<string, TextualBlock> {
    this.finalized = true;

    const blocks = new Map<string, TextualBlock>();
    for (const [id, draft] of this.drafts) {
      const block: TextualBlock = {
        type: draft.type,
        text: draft.lines.join('\n'),
        bbox: frozenBBox(draft.bbox),
        metadata: Object.freeze({}),
        pageRange: Object.freeze([this.pageIndex, this.pageIndex] as const),
      };
      blocks.set(id, Object.freeze(block));
    }
    return blocks;
  }
}
