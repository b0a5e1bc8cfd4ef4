/**
 * Drawing configuration defaults and validation.
 */

import type { StrokeStyle } from './types';

/**
 * Default stroke style: solid blue, 10px wide, rounded.
 */
export const DEFAULT_STROKE_STYLE: StrokeStyle = Object.freeze({
  color: '#0000FF',
  stroke_width: 10,
  opacity: 1.0,
  stroke_linecap: 'round',
  stroke_linejoin: 'round',
});

/**
 * Thrown when a stroke style override has an unusable value.
 */
export class StrokeStyleError extends Error {
  readonly field: keyof StrokeStyle;

  constructor(field: keyof StrokeStyle, message: string) {
    super(message);
    this.name = 'StrokeStyleError';
    this.field = field;
  }
}

const LINE_CAPS: ReadonlyArray<StrokeStyle['stroke_linecap']> = ['round', 'butt', 'square'];
const LINE_JOINS: ReadonlyArray<StrokeStyle['stroke_linejoin']> = ['round', 'miter', 'bevel'];

/**
 * Build a frozen stroke style from defaults plus overrides.
 * Undefined overrides fall back to the defaults. Throws StrokeStyleError for a
 * non-positive width, an opacity outside 0-1, an empty color or an unknown cap/join.
 */
export function createStrokeStyle(overrides: Partial<StrokeStyle> = {}): StrokeStyle {
  const style: StrokeStyle = {
    color: overrides.color ?? DEFAULT_STROKE_STYLE.color,
    stroke_width: overrides.stroke_width ?? DEFAULT_STROKE_STYLE.stroke_width,
    opacity: overrides.opacity ?? DEFAULT_STROKE_STYLE.opacity,
    stroke_linecap: overrides.stroke_linecap ?? DEFAULT_STROKE_STYLE.stroke_linecap,
    stroke_linejoin: overrides.stroke_linejoin ?? DEFAULT_STROKE_STYLE.stroke_linejoin,
  };

  if (!Number.isFinite(style.stroke_width) || style.stroke_width <= 0) {
    throw new StrokeStyleError(
      'stroke_width',
      `stroke_width must be a positive number, got ${style.stroke_width}`
    );
  }
  if (!Number.isFinite(style.opacity) || style.opacity < 0 || style.opacity > 1) {
    throw new StrokeStyleError('opacity', `opacity must be between 0 and 1, got ${style.opacity}`);
  }
  if (typeof style.color !== 'string' || style.color.trim() === '') {
    throw new StrokeStyleError('color', 'color must not be empty');
  }
  if (!LINE_CAPS.includes(style.stroke_linecap)) {
    throw new StrokeStyleError(
      'stroke_linecap',
      `stroke_linecap must be one of ${LINE_CAPS.join(', ')}, got ${style.stroke_linecap}`
    );
  }
  if (!LINE_JOINS.includes(style.stroke_linejoin)) {
    throw new StrokeStyleError(
      'stroke_linejoin',
      `stroke_linejoin must be one of ${LINE_JOINS.join(', ')}, got ${style.stroke_linejoin}`
    );
  }

  return Object.freeze(style);
}

/**
 * Whether debug logging is requested through the environment.
 */
export function isDebugRequested(): boolean {
  if (typeof process === 'undefined') return false;
  const flag = process.env.FINGERPAINT_DEBUG;
  return flag === '1' || flag === 'true';
}
