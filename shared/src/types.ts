/**
 * Shared type definitions for finger painting.
 * Platform-agnostic - hosts translate their native touch events into these.
 */

// Geometry
export interface Point {
  x: number;
  y: number;
}

export interface CanvasSize {
  width: number;
  height: number;
}

// Touch input types

/**
 * Opaque contact identifier. Stable from press until release/cancel,
 * may be reused by the platform afterwards.
 */
export type TouchId = number;

/**
 * Normalized touch event types.
 * 'entered' / 'exited' are hover notifications (mouse, pen) and never affect strokes.
 */
export type TouchEventType = 'pressed' | 'moved' | 'released' | 'cancelled' | 'entered' | 'exited';

export interface TouchInput {
  id: TouchId;
  type: TouchEventType;
  /** Location in logical input coordinates (not yet pixel-mapped) */
  location: Point;
  /** Whether the contact is touching the surface; a 'moved' with false is a hover */
  inContact?: boolean;
}

// Path types

/**
 * One continuous stroke. Points are in pixel coordinates, in insertion order.
 */
export interface Path {
  readonly type: 'polyline';
  readonly points: readonly Point[];
}

// Drawing style types
export interface StrokeStyle {
  color: string; // Hex color
  stroke_width: number; // Stroke width in pixels
  opacity: number; // 0-1 alpha value
  stroke_linecap: 'round' | 'butt' | 'square';
  stroke_linejoin: 'round' | 'miter' | 'bevel';
}

/**
 * Stroke collections owned by the tracker.
 * Each version is immutable; a change produces a new object.
 */
export interface StrokeState {
  /** Strokes for touches currently down, keyed by touch id (insertion ordered) */
  inProgress: ReadonlyMap<TouchId, Path>;
  /** Released strokes, in completion order. Frozen once completed */
  completed: readonly Readonly<Path>[];
}

/**
 * Subset of CanvasRenderingContext2D the renderer draws through.
 */
export interface DrawingSurface {
  readonly canvas: CanvasSize;
  strokeStyle: CanvasRenderingContext2D['strokeStyle'];
  lineWidth: number;
  lineCap: CanvasLineCap;
  lineJoin: CanvasLineJoin;
  globalAlpha: number;
  clearRect(x: number, y: number, w: number, h: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  stroke(): void;
}
