/**
 * StrokeTracker - maps per-finger touch events to growing vector paths.
 *
 * This class owns the stroke state machine:
 * 1. Converts touch locations from logical to pixel coordinates
 * 2. Dispatches reducer actions (pressed/moved/released/cancelled)
 * 3. Signals the host display loop when state changed
 * 4. Renders the current snapshot when the host pulls a frame
 *
 * The host owns the loop and timing; requestRedraw is a signal only.
 */

import { initialStrokeState, strokeReducer } from '../canvas/reducer';
import type { StrokeAction } from '../canvas/reducer';
import { DEFAULT_STROKE_STYLE } from '../config';
import { renderStrokes } from '../renderer/canvasRenderer';
import type {
  CanvasSize,
  DrawingSurface,
  Point,
  StrokeState,
  StrokeStyle,
  TouchEventType,
  TouchId,
  TouchInput,
} from '../types';
import { toPixel } from '../utils/coordinates';

export interface StrokeTrackerDeps {
  /** Fire-and-forget signal that a new frame is needed */
  requestRedraw: () => void;
  /** Style applied to every stroke at render time */
  style?: StrokeStyle;
  /** Starting state (defaults to an empty canvas) */
  initialState?: StrokeState;
  /** Logical (input) canvas size; defaults to unset (0 x 0) */
  logicalSize?: CanvasSize;
  /** Pixel (surface) canvas size; defaults to the logical size */
  pixelSize?: CanvasSize;
  /** Optional logger for debugging */
  log?: (message: string, ...args: unknown[]) => void;
}

const UNSET_SIZE: CanvasSize = { width: 0, height: 0 };

export class StrokeTracker {
  private state: StrokeState;
  private logicalSize: CanvasSize;
  private pixelSize: CanvasSize;

  private readonly requestRedraw: () => void;
  private readonly style: StrokeStyle;
  private readonly log: (message: string, ...args: unknown[]) => void;

  constructor(deps: StrokeTrackerDeps) {
    this.requestRedraw = deps.requestRedraw;
    this.style = deps.style ?? DEFAULT_STROKE_STYLE;
    this.state = deps.initialState ?? initialStrokeState;
    const logicalSize = deps.logicalSize ?? UNSET_SIZE;
    const pixelSize = deps.pixelSize ?? logicalSize;
    this.logicalSize = { width: logicalSize.width, height: logicalSize.height };
    this.pixelSize = { width: pixelSize.width, height: pixelSize.height };
    this.log = deps.log ?? (() => {});
  }

  /**
   * Process one normalized touch event.
   *
   * @param location - Point in logical input coordinates
   * @returns Whether stroke state changed (and a redraw was requested)
   */
  handleTouch(id: TouchId, type: TouchEventType, location: Point): boolean {
    const action = this.toAction(id, type, location);
    if (!action) return false;
    return this.dispatch(action);
  }

  /**
   * Process a touch event object from the host's input adapter.
   * A move reported without contact (pen or mouse hover) is ignored.
   */
  handleInput(input: TouchInput): boolean {
    if (input.type === 'moved' && input.inContact === false) {
      this.log('[StrokeTracker] Ignored hover move for touch', input.id);
      return false;
    }
    return this.handleTouch(input.id, input.type, input.location);
  }

  /**
   * Remove every stroke, completed and in progress.
   */
  clear(): boolean {
    return this.dispatch({ type: 'CLEAR' });
  }

  /**
   * Record the canvas sizes used for coordinate mapping.
   * Called by the host on layout and on resize.
   */
  setCanvasSize(logicalSize: CanvasSize, pixelSize: CanvasSize = logicalSize): void {
    this.logicalSize = { width: logicalSize.width, height: logicalSize.height };
    this.pixelSize = { width: pixelSize.width, height: pixelSize.height };
  }

  /**
   * Current immutable snapshot. Safe to hold across later events.
   */
  getState(): StrokeState {
    return this.state;
  }

  /**
   * Render the current snapshot. Invoked by the host display loop.
   *
   * @returns Number of paths drawn
   */
  render(surface: DrawingSurface): number {
    const { completed, inProgress } = this.state;
    return renderStrokes(surface, completed, inProgress, this.style);
  }

  private toAction(id: TouchId, type: TouchEventType, location: Point): StrokeAction | null {
    switch (type) {
      case 'pressed':
      case 'moved': {
        const point = toPixel(location, this.logicalSize, this.pixelSize);
        if (!point) {
          this.log('[StrokeTracker] Dropping', type, 'for touch', id, '- no mappable location');
          return null;
        }
        return type === 'pressed'
          ? { type: 'TOUCH_PRESSED', id, point }
          : { type: 'TOUCH_MOVED', id, point };
      }
      case 'released':
        return { type: 'TOUCH_RELEASED', id };
      case 'cancelled':
        return { type: 'TOUCH_CANCELLED', id };
      case 'entered':
      case 'exited':
        return null;
    }
  }

  private dispatch(action: StrokeAction): boolean {
    const next = strokeReducer(this.state, action);
    if (next === this.state) {
      this.log('[StrokeTracker] Ignored', action.type, '- no state change');
      return false;
    }
    this.state = next;
    this.requestRedraw();
    return true;
  }
}
