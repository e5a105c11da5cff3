import type { BBox, TextLine } from './types';
import { EmptyLineGeometryError, InvalidGeometryError } from './errors';

/**
 * Bounding-box math. Pure functions; every entry point rejects inverted or
 * non-finite boxes instead of correcting them.
 */

export function bbox(x0: number, y0: number, x1: number, y1: number): BBox {
  return { topLeft: { x: x0, y: y0 }, bottomRight: { x: x1, y: y1 } };
}

/** Frozen copy that shares no objects with the given box */
export function frozenBBox(box: BBox): BBox {
  return Object.freeze({
    topLeft: Object.freeze({ x: box.topLeft.x, y: box.topLeft.y }),
    bottomRight: Object.freeze({ x: box.bottomRight.x, y: box.bottomRight.y }),
  });
}

export function assertValidBBox(box: BBox, context: Record<string, unknown> = {}): void {
  const { topLeft, bottomRight } = box;
  const coords = [topLeft.x, topLeft.y, bottomRight.x, bottomRight.y];

  if (!coords.every(Number.isFinite)) {
    throw new InvalidGeometryError('Bounding box has non-finite coordinates', { ...context, bbox: box });
  }
  if (topLeft.x > bottomRight.x || topLeft.y > bottomRight.y) {
    throw new InvalidGeometryError('Bounding box corners are inverted', { ...context, bbox: box });
  }
}

/** Width × height; degenerate boxes have zero area */
export function area(box: BBox): number {
  assertValidBBox(box);
  return (box.bottomRight.x - box.topLeft.x) * (box.bottomRight.y - box.topLeft.y);
}

/** Area of the clipped overlap, 0 when the boxes are disjoint */
export function intersectionArea(a: BBox, b: BBox): number {
  assertValidBBox(a);
  assertValidBBox(b);

  const width = Math.min(a.bottomRight.x, b.bottomRight.x) - Math.max(a.topLeft.x, b.topLeft.x);
  const height = Math.min(a.bottomRight.y, b.bottomRight.y) - Math.max(a.topLeft.y, b.topLeft.y);

  return Math.max(0, width) * Math.max(0, height);
}

/** Smallest box covering both */
export function unionBBox(a: BBox, b: BBox): BBox {
  return bbox(
    Math.min(a.topLeft.x, b.topLeft.x),
    Math.min(a.topLeft.y, b.topLeft.y),
    Math.max(a.bottomRight.x, b.bottomRight.x),
    Math.max(a.bottomRight.y, b.bottomRight.y),
  );
}

/**
 * Line box = union of its word boxes.
 */
export function lineBBox(line: TextLine, context: Record<string, unknown> = {}): BBox {
  if (line.words.length === 0) {
    throw new EmptyLineGeometryError({ ...context, text: line.text });
  }

  const [first, ...rest] = line.words;
  assertValidBBox(first, { ...context, wordIndex: 0 });

  return rest.reduce((acc, word, i) => {
    assertValidBBox(word, { ...context, wordIndex: i + 1 });
    return unionBBox(acc, word);
  }, bbox(first.topLeft.x, first.topLeft.y, first.bottomRight.x, first.bottomRight.y));
}
