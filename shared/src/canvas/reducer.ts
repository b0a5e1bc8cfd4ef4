/**
 * Stroke state reducer - platform-agnostic touch-to-path state machine.
 *
 * Every action is total: it either applies a well-defined change or is a
 * no-op. No-ops return the identical state object so callers can detect
 * change by reference.
 */

import type { Path, Point, StrokeState, TouchId } from '../types';

export type StrokeAction =
  | { type: 'TOUCH_PRESSED'; id: TouchId; point: Point }
  | { type: 'TOUCH_MOVED'; id: TouchId; point: Point }
  | { type: 'TOUCH_RELEASED'; id: TouchId }
  | { type: 'TOUCH_CANCELLED'; id: TouchId }
  | { type: 'CLEAR' };

export const initialStrokeState: StrokeState = {
  inProgress: new Map(),
  completed: [],
};

// Copy-on-write helpers for the in-progress map
const withEntry = (
  map: ReadonlyMap<TouchId, Path>,
  id: TouchId,
  path: Path
): ReadonlyMap<TouchId, Path> => {
  const next = new Map(map);
  next.set(id, path);
  return next;
};

const withoutEntry = (map: ReadonlyMap<TouchId, Path>, id: TouchId): ReadonlyMap<TouchId, Path> => {
  const next = new Map(map);
  next.delete(id);
  return next;
};

export function strokeReducer(state: StrokeState, action: StrokeAction): StrokeState {
  switch (action.type) {
    case 'TOUCH_PRESSED': {
      // Duplicate press without a release keeps the existing stroke
      if (state.inProgress.has(action.id)) return state;
      const path: Path = { type: 'polyline', points: [action.point] };
      return { ...state, inProgress: withEntry(state.inProgress, action.id, path) };
    }

    case 'TOUCH_MOVED': {
      const path = state.inProgress.get(action.id);
      // Moves never start a stroke
      if (!path) return state;
      const extended: Path = { ...path, points: [...path.points, action.point] };
      return { ...state, inProgress: withEntry(state.inProgress, action.id, extended) };
    }

    case 'TOUCH_RELEASED': {
      const path = state.inProgress.get(action.id);
      if (!path) return state;
      // Completed paths are never touched again
      const finished: Path = Object.freeze({ ...path, points: Object.freeze([...path.points]) });
      return {
        inProgress: withoutEntry(state.inProgress, action.id),
        completed: [...state.completed, finished],
      };
    }

    case 'TOUCH_CANCELLED': {
      if (!state.inProgress.has(action.id)) return state;
      return { ...state, inProgress: withoutEntry(state.inProgress, action.id) };
    }

    case 'CLEAR':
      if (state.inProgress.size === 0 && state.completed.length === 0) return state;
      return initialStrokeState;

    default:
      return state;
  }
}

/**
 * Number of strokes currently visible (completed + in progress).
 */
export function countStrokes(state: StrokeState): number {
  return state.completed.length + state.inProgress.size;
}
