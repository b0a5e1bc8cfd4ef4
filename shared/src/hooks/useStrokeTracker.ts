/**
 * React hook binding a StrokeTracker to a host canvas.
 *
 * Touch handlers call handleTouch; redraw requests are coalesced into
 * animation frames that render onto the surface returned by getSurface.
 */

import { useCallback, useEffect, useRef, useState } from 'react';

import { initialStrokeState } from '../canvas/reducer';
import { DEFAULT_STROKE_STYLE } from '../config';
import { RedrawScheduler } from '../services/RedrawScheduler';
import { StrokeTracker } from '../services/StrokeTracker';
import { createLogger } from '../utils/debugLog';
import type {
  CanvasSize,
  DrawingSurface,
  Point,
  StrokeState,
  StrokeStyle,
  TouchEventType,
  TouchId,
} from '../types';

export interface UseStrokeTrackerOptions {
  /** Returns the 2D surface to draw on, or null before the canvas mounts */
  getSurface: () => DrawingSurface | null;
  /** Canvas size in logical input units (e.g. CSS pixels) */
  logicalSize: CanvasSize;
  /** Canvas size in surface pixels (e.g. backing-store pixels) */
  pixelSize: CanvasSize;
  /** Style applied to every stroke (read once on mount) */
  style?: StrokeStyle;
  /** Custom requestAnimationFrame for testing (defaults to global) */
  requestFrame?: (callback: () => void) => void;
  /** Logger for debugging (defaults to the 'Canvas' debug log category) */
  log?: (message: string, ...args: unknown[]) => void;
}

const defaultLog = createLogger('Canvas');

export interface UseStrokeTrackerReturn {
  /** Latest stroke state (updated once per rendered frame) */
  state: StrokeState;
  /** Forward one normalized touch event */
  handleTouch: (id: TouchId, type: TouchEventType, location: Point) => boolean;
  /** Remove every stroke */
  clear: () => void;
  /** The underlying tracker */
  tracker: StrokeTracker;
}

export function useStrokeTracker({
  getSurface,
  logicalSize,
  pixelSize,
  style = DEFAULT_STROKE_STYLE,
  requestFrame,
  log = defaultLog,
}: UseStrokeTrackerOptions): UseStrokeTrackerReturn {
  const getSurfaceRef = useRef(getSurface);
  const [state, setState] = useState<StrokeState>(initialStrokeState);

  // Keep surface getter up to date without recreating the tracker
  useEffect(() => {
    getSurfaceRef.current = getSurface;
  }, [getSurface]);

  // Tracker and scheduler live for the lifetime of the component
  const servicesRef = useRef<{ tracker: StrokeTracker; scheduler: RedrawScheduler } | null>(
    null
  );
  if (servicesRef.current === null) {
    const scheduler = new RedrawScheduler({
      onFrame: () => {
        const services = servicesRef.current;
        if (!services) return;
        const surface = getSurfaceRef.current();
        if (surface) {
          services.tracker.render(surface);
        } else {
          log('[useStrokeTracker] No surface yet, skipping frame');
        }
        setState(services.tracker.getState());
      },
      requestFrame,
      log,
    });
    const tracker = new StrokeTracker({
      requestRedraw: () => scheduler.request(),
      style,
      logicalSize,
      pixelSize,
      log,
    });
    servicesRef.current = { tracker, scheduler };
  }
  const { tracker, scheduler } = servicesRef.current;

  // Sync sizes on layout changes
  useEffect(() => {
    tracker.setCanvasSize(logicalSize, pixelSize);
  }, [tracker, logicalSize.width, logicalSize.height, pixelSize.width, pixelSize.height]);

  // Stop drawing for good on unmount, even if a host still holds handleTouch
  useEffect(() => {
    return () => {
      scheduler.dispose();
    };
  }, [scheduler]);

  const handleTouch = useCallback(
    (id: TouchId, type: TouchEventType, location: Point) =>
      tracker.handleTouch(id, type, location),
    [tracker]
  );

  const clear = useCallback(() => {
    tracker.clear();
  }, [tracker]);

  return { state, handleTouch, clear, tracker };
}
