/**
 * Shared types for detector adapters.
 *
 * Detectors hand over serialized JSON (files, worker messages, API
 * responses). These types describe that JSON loosely; the assembler
 * validates geometry itself.
 */

/** [x, y] pair as serialized by the OCR engine */
export type PointTuple = [number, number];

/** [[x0, y0], [x1, y1]] top-left / bottom-right */
export type GeometryTuple = [PointTuple, PointTuple];

export interface SerializedPoint {
  x: number;
  y: number;
}

export interface SerializedBBox {
  top_left: SerializedPoint;
  bottom_right: SerializedPoint;
}
