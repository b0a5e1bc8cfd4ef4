/**
 * Renderer module.
 *
 * Draws stroke state onto any surface that implements the
 * CanvasRenderingContext2D subset in DrawingSurface.
 */

export { applyStrokeStyle, renderStrokes, strokePath } from './canvasRenderer';
