/**
 * @module layer-store
 * Ordered collection of image layers.
 *
 * Insertion order is paint order: index 0 is drawn first (bottom of the
 * stack). Indices are always dense; removing a layer shifts every later
 * layer down by one. The store owns no rendering logic; the compositor reads
 * it through the {@link LayerSource} view and uses `generation` to tell
 * whether its cached output is stale.
 */

import type { EventBus, ImageLayer, LayerPatch, LayerSource } from '@layerstack/types';
import { LayerIndexError } from './errors';
import { applyLayerPatch } from './layer-factory';

export class LayerStore implements LayerSource {
  private items: ImageLayer[] = [];
  private names: readonly string[] = [];
  private _generation = 0;

  /**
   * @param events - Optional bus that receives `layer:*` events.
   */
  constructor(private readonly events?: EventBus) {}

  /** Layers in paint order. */
  get layers(): readonly ImageLayer[] {
    return this.items;
  }

  /** Number of layers. */
  get length(): number {
    return this.items.length;
  }

  /** Bumped on every append, removal and update. */
  get generation(): number {
    return this._generation;
  }

  /** Returns the layer at `index`, or null when there is none. */
  at(index: number): ImageLayer | null {
    return this.isValidIndex(index) ? this.items[index] : null;
  }

  /**
   * Pushes `layer` on top of the stack.
   * @returns The index of the new layer.
   */
  append(layer: ImageLayer): number {
    this.items = [...this.items, layer];
    const index = this.items.length - 1;
    this.changed();
    this.events?.emit('layer:added', { layer, index });
    return index;
  }

  /**
   * Removes the layer at `index`. Later layers move down by one.
   *
   * @throws LayerIndexError when `index` does not address a layer;
   *   the store is left untouched.
   */
  removeAt(index: number): ImageLayer {
    this.assertIndex(index);
    const layer = this.items[index];
    this.items = this.items.filter((_, i) => i !== index);
    this.changed();
    this.events?.emit('layer:removed', { layer, index });
    return layer;
  }

  /**
   * Replaces the position, scale or opacity of the layer at `index`.
   *
   * @throws LayerIndexError when `index` does not address a layer.
   * @throws RangeError when a patched value is out of range.
   */
  updateAt(index: number, patch: LayerPatch): ImageLayer {
    this.assertIndex(index);
    const updated = applyLayerPatch(this.items[index], patch);
    this.items = this.items.map((l, i) => (i === index ? updated : l));
    this.changed();
    this.events?.emit('layer:updated', { layer: updated, index });
    return updated;
  }

  /**
   * Display names in paint order. Rebuilt after every change rather than on
   * read, so the returned array is stable between changes.
   */
  namesProjection(): readonly string[] {
    return this.names;
  }

  private changed(): void {
    this._generation++;
    this.names = this.items.map((layer) => layer.name);
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  private assertIndex(index: number): void {
    if (!this.isValidIndex(index)) {
      throw new LayerIndexError(index, this.items.length);
    }
  }
}
