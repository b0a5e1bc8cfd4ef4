/**
 * Services - core logic extracted for testability.
 */

export { StrokeTracker } from './StrokeTracker';
export type { StrokeTrackerDeps } from './StrokeTracker';

export { RedrawScheduler } from './RedrawScheduler';
export type { RedrawSchedulerDeps } from './RedrawScheduler';
