/**
 * Shared React hooks.
 */

export { useStrokeTracker } from './useStrokeTracker';
export type { UseStrokeTrackerOptions, UseStrokeTrackerReturn } from './useStrokeTracker';
