/**
 * Tests for StrokeTracker - touch event handling, coordinate mapping and redraw signalling.
 */

import { StrokeTracker, createStrokeStyle } from '@fingerpaint/shared';
import type { CanvasSize, TouchInput } from '@fingerpaint/shared';

import { createRecordingSurface, strokedPaths } from './recordingSurface';

const SQUARE = { width: 100, height: 100 };

const createTracker = (options: { logical?: CanvasSize; pixel?: CanvasSize } = {}) => {
  const requestRedraw = jest.fn();
  const tracker = new StrokeTracker({
    requestRedraw,
    logicalSize: options.logical ?? SQUARE,
    pixelSize: options.pixel ?? SQUARE,
  });
  return { tracker, requestRedraw };
};

describe('StrokeTracker', () => {
  describe('single touch lifecycle', () => {
    it('completes a pressed, moved, released stroke', () => {
      const { tracker } = createTracker();

      tracker.handleTouch(1, 'pressed', { x: 0, y: 0 });
      tracker.handleTouch(1, 'moved', { x: 10, y: 0 });
      tracker.handleTouch(1, 'moved', { x: 10, y: 10 });
      tracker.handleTouch(1, 'released', { x: 10, y: 10 });

      const state = tracker.getState();
      expect(state.completed).toEqual([
        {
          type: 'polyline',
          points: [
            { x: 0, y: 0 },
            { x: 10, y: 0 },
            { x: 10, y: 10 },
          ],
        },
      ]);
      expect(state.inProgress.size).toBe(0);
    });

    it('never completes a cancelled stroke', () => {
      const { tracker } = createTracker();

      tracker.handleTouch(4, 'pressed', { x: 1, y: 1 });
      tracker.handleTouch(4, 'moved', { x: 2, y: 2 });
      tracker.handleTouch(4, 'cancelled', { x: 2, y: 2 });

      expect(tracker.getState().completed).toEqual([]);
      expect(tracker.getState().inProgress.has(4)).toBe(false);
    });

    it('accepts event objects through handleInput', () => {
      const { tracker } = createTracker();
      const events: TouchInput[] = [
        { id: 2, type: 'pressed', location: { x: 5, y: 5 }, inContact: true },
        { id: 2, type: 'released', location: { x: 5, y: 5 }, inContact: false },
      ];

      events.forEach((event) => tracker.handleInput(event));

      expect(tracker.getState().completed).toHaveLength(1);
    });

    it('ignores moves reported without contact', () => {
      const { tracker, requestRedraw } = createTracker();
      tracker.handleInput({ id: 2, type: 'pressed', location: { x: 5, y: 5 } });

      const changed = tracker.handleInput({
        id: 2,
        type: 'moved',
        location: { x: 8, y: 8 },
        inContact: false,
      });
      tracker.handleInput({ id: 2, type: 'moved', location: { x: 9, y: 9 }, inContact: true });

      expect(changed).toBe(false);
      expect(tracker.getState().inProgress.get(2)?.points).toEqual([
        { x: 5, y: 5 },
        { x: 9, y: 9 },
      ]);
      expect(requestRedraw).toHaveBeenCalledTimes(2);
    });

    it('keeps a held snapshot unchanged by later events', () => {
      const { tracker } = createTracker();
      tracker.handleTouch(1, 'pressed', { x: 0, y: 0 });
      tracker.handleTouch(1, 'released', { x: 0, y: 0 });
      const snapshot = tracker.getState();

      tracker.handleTouch(2, 'pressed', { x: 1, y: 1 });
      tracker.handleTouch(2, 'moved', { x: 2, y: 2 });
      tracker.handleTouch(2, 'released', { x: 2, y: 2 });
      tracker.handleTouch(3, 'pressed', { x: 4, y: 4 });

      expect(snapshot.completed).toEqual([{ type: 'polyline', points: [{ x: 0, y: 0 }] }]);
      expect(snapshot.inProgress.size).toBe(0);
      expect(tracker.getState().completed).toHaveLength(2);
    });
  });

  describe('redraw requests', () => {
    it('requests one redraw per state change', () => {
      const { tracker, requestRedraw } = createTracker();

      tracker.handleTouch(1, 'pressed', { x: 0, y: 0 });
      tracker.handleTouch(1, 'moved', { x: 1, y: 1 });
      tracker.handleTouch(1, 'released', { x: 1, y: 1 });

      expect(requestRedraw).toHaveBeenCalledTimes(3);
    });

    it('does not request a redraw for no-op events', () => {
      const { tracker, requestRedraw } = createTracker();

      expect(tracker.handleTouch(9, 'moved', { x: 1, y: 1 })).toBe(false);
      expect(tracker.handleTouch(9, 'released', { x: 1, y: 1 })).toBe(false);
      expect(tracker.handleTouch(9, 'cancelled', { x: 1, y: 1 })).toBe(false);

      tracker.handleTouch(1, 'pressed', { x: 0, y: 0 });
      expect(tracker.handleTouch(1, 'pressed', { x: 3, y: 3 })).toBe(false);

      expect(requestRedraw).toHaveBeenCalledTimes(1);
    });

    it('ignores hover enter and exit events', () => {
      const { tracker, requestRedraw } = createTracker();

      expect(tracker.handleTouch(1, 'entered', { x: 0, y: 0 })).toBe(false);
      expect(tracker.handleTouch(1, 'exited', { x: 0, y: 0 })).toBe(false);

      expect(tracker.getState().inProgress.size).toBe(0);
      expect(requestRedraw).not.toHaveBeenCalled();
    });
  });

  describe('coordinate mapping', () => {
    it('stores points in pixel coordinates', () => {
      const { tracker } = createTracker({ pixel: { width: 200, height: 300 } });

      tracker.handleTouch(1, 'pressed', { x: 50, y: 50 });
      tracker.handleTouch(1, 'moved', { x: 100, y: 0 });

      expect(tracker.getState().inProgress.get(1)?.points).toEqual([
        { x: 100, y: 150 },
        { x: 200, y: 0 },
      ]);
    });

    it('drops presses and moves while the canvas has no size', () => {
      const { tracker, requestRedraw } = createTracker({ logical: { width: 0, height: 100 } });

      expect(tracker.handleTouch(1, 'pressed', { x: 5, y: 5 })).toBe(false);

      expect(tracker.getState().inProgress.size).toBe(0);
      expect(requestRedraw).not.toHaveBeenCalled();
    });

    it('drops presses at non-finite locations', () => {
      const { tracker, requestRedraw } = createTracker();

      expect(tracker.handleTouch(1, 'pressed', { x: Number.NaN, y: 1 })).toBe(false);

      expect(tracker.getState().inProgress.size).toBe(0);
      expect(requestRedraw).not.toHaveBeenCalled();
    });

    it('copies the sizes given at construction', () => {
      const logical = { width: 100, height: 100 };
      const tracker = new StrokeTracker({ requestRedraw: jest.fn(), logicalSize: logical });

      logical.width = 0;
      tracker.handleTouch(1, 'pressed', { x: 5, y: 5 });

      expect(tracker.getState().inProgress.get(1)?.points).toEqual([{ x: 5, y: 5 }]);
    });

    it('uses sizes recorded by setCanvasSize', () => {
      const { tracker } = createTracker({ logical: { width: 0, height: 0 } });

      tracker.setCanvasSize({ width: 10, height: 10 }, { width: 20, height: 20 });
      tracker.handleTouch(1, 'pressed', { x: 5, y: 1 });

      expect(tracker.getState().inProgress.get(1)?.points).toEqual([{ x: 10, y: 2 }]);
    });

    it('still releases a stroke after the canvas collapses', () => {
      const { tracker } = createTracker();

      tracker.handleTouch(1, 'pressed', { x: 5, y: 5 });
      tracker.setCanvasSize({ width: 0, height: 0 });
      tracker.handleTouch(1, 'moved', { x: 6, y: 6 });
      tracker.handleTouch(1, 'released', { x: 6, y: 6 });

      expect(tracker.getState().completed).toEqual([
        { type: 'polyline', points: [{ x: 5, y: 5 }] },
      ]);
    });
  });

  describe('multi-touch', () => {
    it('tracks concurrent fingers without cross-contamination', () => {
      const { tracker } = createTracker();

      tracker.handleTouch(1, 'pressed', { x: 0, y: 0 });
      tracker.handleTouch(2, 'pressed', { x: 50, y: 50 });
      tracker.handleTouch(1, 'moved', { x: 1, y: 0 });
      tracker.handleTouch(2, 'moved', { x: 50, y: 51 });
      tracker.handleTouch(2, 'cancelled', { x: 50, y: 51 });
      tracker.handleTouch(1, 'released', { x: 1, y: 0 });

      expect(tracker.getState().completed).toEqual([
        {
          type: 'polyline',
          points: [
            { x: 0, y: 0 },
            { x: 1, y: 0 },
          ],
        },
      ]);
    });
  });

  describe('clear', () => {
    it('removes everything and requests a redraw', () => {
      const { tracker, requestRedraw } = createTracker();
      tracker.handleTouch(1, 'pressed', { x: 0, y: 0 });
      tracker.handleTouch(1, 'released', { x: 0, y: 0 });
      tracker.handleTouch(2, 'pressed', { x: 3, y: 3 });
      requestRedraw.mockClear();

      expect(tracker.clear()).toBe(true);

      expect(tracker.getState().completed).toEqual([]);
      expect(tracker.getState().inProgress.size).toBe(0);
      expect(requestRedraw).toHaveBeenCalledTimes(1);
    });

    it('does nothing on an empty canvas', () => {
      const { tracker, requestRedraw } = createTracker();

      expect(tracker.clear()).toBe(false);
      expect(requestRedraw).not.toHaveBeenCalled();
    });
  });

  describe('render', () => {
    it('draws completed strokes before in-progress strokes with the tracker style', () => {
      const requestRedraw = jest.fn();
      const tracker = new StrokeTracker({
        requestRedraw,
        logicalSize: SQUARE,
        style: createStrokeStyle({ color: '#ff0000', stroke_width: 4 }),
      });
      tracker.handleTouch(3, 'pressed', { x: 30, y: 30 });
      tracker.handleTouch(1, 'pressed', { x: 10, y: 10 });
      tracker.handleTouch(1, 'released', { x: 10, y: 10 });
      const surface = createRecordingSurface();

      expect(tracker.render(surface)).toBe(2);

      expect(strokedPaths(surface.calls)).toEqual([[[10, 10]], [[30, 30]]]);
      expect(surface.strokeStyle).toBe('#ff0000');
      expect(surface.lineWidth).toBe(4);
    });
  });
});
