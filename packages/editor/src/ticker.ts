/**
 * @module ticker
 * Periodic refresh signal for the layers cache.
 */

import type { EditorStore } from './store';

/**
 * Dispatches `tick` every `intervalMs` until the returned function is called.
 * Calling the stop function more than once is harmless.
 *
 * @throws RangeError when `intervalMs` is not positive.
 */
export function startTicker(store: EditorStore, intervalMs: number): () => void {
  if (!(Number.isFinite(intervalMs) && intervalMs > 0)) {
    throw new RangeError(`Tick interval must be positive, got ${intervalMs}`);
  }
  const timer = setInterval(() => {
    store.getState().dispatch({ type: 'tick' });
  }, intervalMs);
  return () => clearInterval(timer);
}
