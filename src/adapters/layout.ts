import type { LayoutRegion } from '../types';
import type { SerializedBBox } from './types';
import { labelForClassId } from '../labels';
import { bbox } from '../geometry';
import { InvalidInputError } from '../errors';

/**
 * Layout detector adapter
 *
 * Output: one record per detected region, already in the detector's
 * priority order (that order breaks overlap ties during matching)
 * Label format: integer class id 0-10, see labels.ts
 * Bbox format: top_left / bottom_right points, same space as the OCR words
 */

export interface LayoutDetection {
  bbox_id: string;
  label: number;
  prob: number;
  bbox: SerializedBBox;
}

/**
 * Convert layout detector records to regions, preserving order
 */
export function fromLayoutDetections(detections: LayoutDetection[], pageIndex?: number): LayoutRegion[] {
  return detections.map((det, index) => {
    const label = labelForClassId(det.label);
    if (!label) {
      throw new InvalidInputError(`Unknown layout class id ${det.label}`, {
        pageIndex,
        detectionIndex: index,
        regionId: det.bbox_id,
      });
    }

    const { top_left, bottom_right } = det.bbox;
    return {
      id: det.bbox_id,
      label,
      bbox: bbox(top_left.x, top_left.y, bottom_right.x, bottom_right.y),
      confidence: det.prob,
    };
  });
}
