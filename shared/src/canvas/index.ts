/**
 * Stroke state management exports.
 */

export { countStrokes, initialStrokeState, strokeReducer } from './reducer';

export type { StrokeAction } from './reducer';
