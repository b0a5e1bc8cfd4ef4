/**
 * Canvas renderer - composites completed then in-progress strokes onto a 2D surface.
 */

import type { DrawingSurface, Path, StrokeStyle, TouchId } from '../types';

/**
 * Apply a stroke style to the surface's drawing state.
 */
export function applyStrokeStyle(surface: DrawingSurface, style: StrokeStyle): void {
  surface.strokeStyle = style.color;
  surface.lineWidth = style.stroke_width;
  surface.lineCap = style.stroke_linecap;
  surface.lineJoin = style.stroke_linejoin;
  surface.globalAlpha = style.opacity;
}

/**
 * Stroke a single path as connected line segments.
 * Returns false for an empty path (nothing drawn).
 */
export function strokePath(surface: DrawingSurface, path: Path): boolean {
  const [first, ...rest] = path.points;
  if (!first) return false;

  surface.beginPath();
  surface.moveTo(first.x, first.y);
  for (const point of rest) {
    surface.lineTo(point.x, point.y);
  }
  // A lone point still strokes; round caps show it as a dot
  surface.stroke();
  return true;
}

/**
 * Produce the current frame.
 *
 * Clears the surface, draws completed paths in stored order, then
 * in-progress paths in map iteration order, so active strokes sit on top.
 *
 * @returns Number of paths drawn
 */
export function renderStrokes(
  surface: DrawingSurface,
  completedPaths: readonly Path[],
  inProgressPaths: ReadonlyMap<TouchId, Path>,
  style: StrokeStyle
): number {
  surface.clearRect(0, 0, surface.canvas.width, surface.canvas.height);
  applyStrokeStyle(surface, style);

  let drawn = 0;
  for (const path of completedPaths) {
    if (strokePath(surface, path)) drawn++;
  }
  for (const path of inProgressPaths.values()) {
    if (strokePath(surface, path)) drawn++;
  }
  return drawn;
}
