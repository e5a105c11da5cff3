/**
 * DocAssembler - Reconciles OCR lines and layout regions into a LayoutDocument
 *
 * Per page:
 *   1. match every text line to a region and merge it into that region's block
 *   2. inject one block per picture/table region
 *   3. sort blocks top to bottom (stable)
 * then concatenate pages in input order.
 *
 * Usage:
 *   const assembler = new DocAssembler({ detectionOrigin: 'doctr' });
 *   assembler.addPages(pages);
 *   const doc = assembler.assemble();
 */

import type { Logger } from 'pino';
import type {
  AssemblerOptions,
  AssemblyPage,
  Block,
  DocumentMetadata,
  LayoutDocument,
  NonTextBlock,
  PageResult,
} from './types';
import { BlockAccumulator } from './accumulator';
import { matchRegion } from './matcher';
import { assertValidBBox, frozenBBox, lineBBox } from './geometry';
import { blockTypeForLabel, isNonTextType, isStandaloneLabel } from './labels';
import { BlockConflictError, InvalidInputError } from './errors';
import { resolveAssemblerOptions, type ResolvedAssemblerOptions } from './config';

// ============================================================================
// Page Results
// ============================================================================

/**
 * Concatenate page results in page order, whatever order they finished in.
 */
export function mergePageResults(results: readonly PageResult[]): Block[] {
  return [...results]
    .sort((a, b) => a.pageIndex - b.pageIndex)
    .flatMap(result => result.blocks);
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

// ============================================================================
// DocAssembler Class
// ============================================================================

export class DocAssembler {
  private options: ResolvedAssemblerOptions;
  private log: Logger;
  private pages: AssemblyPage[] = [];

  constructor(options: AssemblerOptions = {}) {
    this.options = resolveAssemblerOptions(options);
    this.log = this.options.logger.child({ component: 'assembler' });
  }

  // --------------------------------------------------------------------------
  // Data Input Methods
  // --------------------------------------------------------------------------

  /**
   * Add one page; page index is its position among added pages
   */
  addPage(page: AssemblyPage): this {
    this.pages.push(page);
    return this;
  }

  addPages(pages: AssemblyPage[]): this {
    this.pages.push(...pages);
    return this;
  }

  /**
   * Reset assembler state for reuse
   */
  reset(): this {
    this.pages = [];
    return this;
  }

  // --------------------------------------------------------------------------
  // Assembly
  // --------------------------------------------------------------------------

  /**
   * Assemble all added pages sequentially
   */
  assemble(): LayoutDocument {
    const pages = [...this.pages];
    const results = pages.map((page, pageIndex) => this.assemblePage(page, pageIndex));
    return this.buildDocument(results, pages);
  }

  /**
   * Assemble pages on up to `concurrency` async workers.
   * Output is identical to assemble() for any worker count. Pages added or
   * reset while the call is pending do not affect its result.
   */
  async assembleConcurrently(concurrency = this.options.concurrency): Promise<LayoutDocument> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidInputError('Concurrency must be a positive integer', { concurrency });
    }

    const pages = [...this.pages];
    const results: PageResult[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < pages.length) {
        const pageIndex = next++;
        await yieldToEventLoop();
        results.push(this.assemblePage(pages[pageIndex], pageIndex));
      }
    };

    const workerCount = Math.min(concurrency, pages.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return this.buildDocument(results, pages);
  }

  /**
   * Run matching, accumulation, injection and ordering for one page.
   * Pure in the page's own lines and regions.
   */
  assemblePage(page: AssemblyPage, pageIndex: number): PageResult {
    const { threshold, generateId, nonTextLines } = this.options;
    const log = this.log.child({ pageIndex });

    this.validateRegions(page, pageIndex);

    const accumulator = new BlockAccumulator(pageIndex);
    let fallbacks = 0;
    let dropped = 0;

    page.lines.forEach((line, lineIndex) => {
      const box = lineBBox(line, { pageIndex, lineIndex });
      const match = matchRegion(box, page.regions, { threshold, generateId });

      if (match.label === 'undefined') {
        fallbacks++;
      } else if (nonTextLines === 'drop' && isStandaloneLabel(match.label)) {
        dropped++;
        log.debug({ lineIndex, regionId: match.id, label: match.label }, 'Dropped line inside non-text region');
        return;
      }

      accumulator.accumulate(match.id, match.label, line.text, box, { lineIndex });
    });

    // Injected blocks join the page under fresh ids, never through the accumulator
    const pageBlocks = new Map<string, Block>(accumulator.finalize());
    for (const region of page.regions) {
      const type = blockTypeForLabel(region.label);
      if (!isNonTextType(type)) continue;

      if (accumulator.has(region.id)) {
        throw new BlockConflictError(
          `Region '${region.id}' holds merged text lines and is also injected as ${type}`,
          { pageIndex, regionId: region.id, label: region.label },
        );
      }

      const id = generateId();
      if (pageBlocks.has(id)) {
        throw new BlockConflictError(`Generated id '${id}' already names a block on this page`, {
          pageIndex,
          regionId: region.id,
          blockId: id,
        });
      }

      const block: NonTextBlock = {
        type,
        text: '',
        bbox: frozenBBox(region.bbox),
        metadata: Object.freeze({}),
        pageRange: Object.freeze([pageIndex, pageIndex] as const),
      };
      pageBlocks.set(id, Object.freeze(block));
    }

    const blocks = Array.from(pageBlocks.values())
      .sort((a, b) => a.bbox.topLeft.y - b.bbox.topLeft.y);

    log.debug(
      { lines: page.lines.length, regions: page.regions.length, blocks: blocks.length, fallbacks, dropped },
      'Assembled page',
    );

    return { pageIndex, blocks };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private validateRegions(page: AssemblyPage, pageIndex: number): void {
    const seen = new Set<string>();
    for (const region of page.regions) {
      assertValidBBox(region.bbox, { pageIndex, regionId: region.id });
      if (seen.has(region.id)) {
        throw new InvalidInputError(`Duplicate layout region id '${region.id}'`, {
          pageIndex,
          regionId: region.id,
        });
      }
      seen.add(region.id);
    }
  }

  private buildDocument(results: PageResult[], pages: readonly AssemblyPage[]): LayoutDocument {
    const content = mergePageResults(results);

    const metadata: DocumentMetadata = {
      ...this.options.metadata,
      totalPages: pages.length,
      totalBlocks: content.length,
      pageDimensions: pages.map(page => page.dimensions ?? null),
    };

    this.log.debug(
      { pages: metadata.totalPages, blocks: metadata.totalBlocks, detectionOrigin: this.options.detectionOrigin },
      'Assembled document',
    );

    return {
      metadata,
      content,
      detectionOrigin: this.options.detectionOrigin,
    };
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new DocAssembler instance
 */
export function createAssembler(options?: AssemblerOptions): DocAssembler {
  return new DocAssembler(options);
}

/**
 * Quick assemble from pages
 */
export function assembleDocument(pages: AssemblyPage[], options?: AssemblerOptions): LayoutDocument {
  return new DocAssembler(options)
    .addPages(pages)
    .assemble();
}
