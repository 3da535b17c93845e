import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { startTicker } from './ticker';
import { createEditorStore } from './store';

describe('startTicker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('dispatches a tick every interval until stopped', () => {
    const store = createEditorStore();
    const onTick = vi.fn();
    store.getState().getEditorState().events.on('render:tick', onTick);

    const stop = startTicker(store, 16);
    vi.advanceTimersByTime(50);
    expect(onTick).toHaveBeenCalledTimes(3);

    stop();
    vi.advanceTimersByTime(100);
    expect(onTick).toHaveBeenCalledTimes(3);
  });

  it('redraws the layers slot after a tick', () => {
    const store = createEditorStore({ canvasWidth: 4, canvasHeight: 4 });
    const { compositor, canvasSize } = store.getState().getEditorState();
    const first = compositor.getLayersSurface(canvasSize);

    const stop = startTicker(store, 10);
    vi.advanceTimersByTime(10);
    stop();

    expect(compositor.getLayersSurface(canvasSize)).not.toBe(first);
  });

  it('can be stopped twice', () => {
    const stop = startTicker(createEditorStore(), 16);
    stop();
    expect(() => stop()).not.toThrow();
  });

  it('rejects a non-positive interval', () => {
    expect(() => startTicker(createEditorStore(), 0)).toThrow('Tick interval must be positive, got 0');
  });
});
