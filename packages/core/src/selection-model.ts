/**
 * @module selection-model
 * Index-based selection of a single layer.
 *
 * The index is not clamped on write: a stale or out-of-range index simply
 * reads back as "no selection" through {@link SelectionModel.current}. With
 * no layers the index is 0.
 */

import type { EventBus, ImageLayer } from '@layerstack/types';
import type { LayerStore } from './layer-store';

export class SelectionModel {
  private index = 0;

  constructor(private readonly events?: EventBus) {}

  /** The raw selected index. Check it against the store before use. */
  get selectedIndex(): number {
    return this.index;
  }

  /**
   * Selects `index` without checking it against any store.
   *
   * @throws RangeError when `index` is not a non-negative integer.
   */
  select(index: number): void {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Selection index must be a non-negative integer, got ${index}`);
    }
    this.set(index);
  }

  /** Selects the top-most layer of a stack of `length` layers (0 when empty). */
  selectLast(length: number): void {
    this.set(Math.max(length - 1, 0));
  }

  /** The selected layer, or null when the index does not address one. */
  current(store: LayerStore): ImageLayer | null {
    return store.at(this.index);
  }

  private set(index: number): void {
    if (index === this.index) return;
    this.index = index;
    this.events?.emit('selection:changed', { index });
  }
}
