/**
 * Logical-to-pixel coordinate mapping.
 */

import type { CanvasSize, Point } from '../types';

/**
 * True when a size cannot be divided by (canvas not laid out yet).
 */
export function isDegenerateSize(size: CanvasSize): boolean {
  return !(
    size.width > 0 &&
    size.height > 0 &&
    Number.isFinite(size.width) &&
    Number.isFinite(size.height)
  );
}

/**
 * Convert a point in logical input units to surface pixels.
 * Returns null when the logical size is degenerate or the point is not finite;
 * the caller drops the event.
 */
export function toPixel(
  point: Point,
  logicalSize: CanvasSize,
  pixelSize: CanvasSize
): Point | null {
  if (isDegenerateSize(logicalSize)) return null;
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) return null;
  const mapped = {
    x: (pixelSize.width * point.x) / logicalSize.width,
    y: (pixelSize.height * point.y) / logicalSize.height,
  };
  return Number.isFinite(mapped.x) && Number.isFinite(mapped.y) ? mapped : null;
}
