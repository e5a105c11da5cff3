import type { BBox, LayoutRegion, MatchLabel } from './types';
import { area, intersectionArea } from './geometry';

export const DEFAULT_MATCH_THRESHOLD = 0.6;

export interface RegionMatch {
  /** Region id, or a freshly generated one when nothing matched */
  id: string;
  label: MatchLabel;
  /** The matched region, absent on the undefined fallback */
  region?: LayoutRegion;
}

export interface MatchOptions {
  threshold?: number;
  generateId: () => string;
}

/**
 * Share of the line's own area covered by the region.
 * Not IoU: a small line inside a large region scores 1.
 */
export function coverageRatio(lineBox: BBox, regionBox: BBox): number {
  const lineArea = area(lineBox);
  if (lineArea === 0) return 0;
  return intersectionArea(lineBox, regionBox) / lineArea;
}

/**
 * Pick the region a line belongs to.
 *
 * Regions are scanned in detector order and the first one whose coverage
 * strictly exceeds the threshold wins, so earlier regions take ties.
 * Lines no region covers get a fresh id and the 'undefined' label, as do
 * zero-area lines whatever the threshold.
 */
export function matchRegion(
  lineBox: BBox,
  regions: readonly LayoutRegion[],
  options: MatchOptions,
): RegionMatch {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;

  if (area(lineBox) === 0) {
    return { id: options.generateId(), label: 'undefined' };
  }

  for (const region of regions) {
    if (coverageRatio(lineBox, region.bbox) > threshold) {
      return { id: region.id, label: region.label, region };
    }
  }

  return { id: options.generateId(), label: 'undefined' };
}
