import { describe, it, expect, vi } from 'vitest';
import type { ImageLayer } from '@layerstack/types';
import { SelectionModel } from './selection-model';
import { LayerStore } from './layer-store';
import { EventBusImpl } from './event-bus';

function makeLayer(name: string): ImageLayer {
  return {
    id: `id-${name}`,
    name,
    position: { x: 0, y: 0 },
    size: { width: 1, height: 1 },
    scale: 1,
    opacity: 1,
    source: { bytes: new Uint8Array(0), image: null },
  };
}

function storeWith(...names: string[]): LayerStore {
  const store = new LayerStore();
  for (const name of names) store.append(makeLayer(name));
  return store;
}

describe('SelectionModel', () => {
  it('starts at index 0 with no current layer on an empty store', () => {
    const selection = new SelectionModel();

    expect(selection.selectedIndex).toBe(0);
    expect(selection.current(new LayerStore())).toBeNull();
  });

  it('select() stores out-of-range indices without failing', () => {
    const store = storeWith('a');
    const selection = new SelectionModel();

    selection.select(5);

    expect(selection.selectedIndex).toBe(5);
    expect(selection.current(store)).toBeNull();
  });

  it('select() rejects negative and fractional indices', () => {
    const selection = new SelectionModel();

    expect(() => selection.select(-1)).toThrow(RangeError);
    expect(() => selection.select(1.5)).toThrow(RangeError);
    expect(selection.selectedIndex).toBe(0);
  });

  it('current() returns the layer at the selected index', () => {
    const store = storeWith('a', 'b', 'c');
    const selection = new SelectionModel();

    selection.select(1);

    expect(selection.current(store)?.name).toBe('b');
  });

  it('selectLast() picks the top layer', () => {
    const store = storeWith('a', 'b', 'c');
    const selection = new SelectionModel();

    selection.selectLast(store.length);

    expect(selection.selectedIndex).toBe(2);
  });

  it('selectLast() on an empty stack selects 0', () => {
    const selection = new SelectionModel();
    selection.select(3);

    selection.selectLast(0);

    expect(selection.selectedIndex).toBe(0);
  });

  it('re-selects the new top after removing the selected layer', () => {
    const store = storeWith('a', 'b', 'c');
    const selection = new SelectionModel();
    selection.select(1);

    store.removeAt(selection.selectedIndex);
    selection.selectLast(store.length);

    expect(selection.selectedIndex).toBe(store.length - 1);
    expect(selection.current(store)?.name).toBe('c');
  });

  it('emits selection:changed only when the index changes', () => {
    const bus = new EventBusImpl();
    const cb = vi.fn();
    bus.on('selection:changed', cb);
    const selection = new SelectionModel(bus);

    selection.select(0);
    selection.select(2);
    selection.selectLast(3);

    expect(cb).toHaveBeenCalledOnce();
    expect(cb).toHaveBeenCalledWith({ index: 2 });
  });
});
