import { describe, expect, it, vi } from 'vitest';

import { createClothStore } from '../model/store';
import type { ClothConfig, PointerState, Vec2 } from '../model/types';

const SMALL_GRID: Partial<ClothConfig> = {
  width: 4,
  height: 3,
  spacing: 10,
  origin: { x: 0, y: 0 },
  gravity: { x: 0, y: 0 },
  iterations: 1,
  stiffness: 1
};

function idlePointer(position: Vec2 = { x: -1000, y: -1000 }): PointerState {
  return {
    position,
    selectPressed: false,
    selectHeld: false,
    selectReleased: false,
    cutHeld: false,
    overUi: false
  };
}

describe('createClothStore', () => {
  it('builds the default cloth', () => {
    const store = createClothStore();
    const { cloth, config, interaction } = store.getState();

    expect(config.width).toBe(40);
    expect(config.height).toBe(25);
    expect(cloth.particles).toHaveLength(1000);
    expect(cloth.springs).toHaveLength(5677);
    expect(cloth.particles[0].position).toEqual({ x: 300, y: 50 });
    expect(interaction).toEqual({ kind: 'idle' });
  });

  it('keeps row 0 in place and moves every other particle down after one frame', () => {
    const store = createClothStore({ ...SMALL_GRID, gravity: { x: 0, y: 100 } });
    const initial = store.getState().cloth.particles.map((p) => ({ ...p.position }));

    const result = store.update(null, idlePointer(), 0.1);

    expect(result).toEqual({ ok: true });
    const particles = store.getState().cloth.particles;
    for (let i = 0; i < particles.length; i += 1) {
      if (i < 4) {
        expect(particles[i].position).toEqual(initial[i]);
      } else {
        expect(particles[i].position.y).toBeGreaterThan(initial[i].y);
      }
    }
  });

  it('never moves pinned particles while the cloth is dragged around', () => {
    const store = createClothStore({ ...SMALL_GRID, gravity: { x: 0, y: 980 }, iterations: 5 });
    const pinned = store
      .getState()
      .cloth.particles.filter((p) => p.pinned)
      .map((p) => ({ ...p.position }));

    store.update(null, { ...idlePointer({ x: 20, y: 20 }), selectPressed: true, selectHeld: true }, 1 / 60);
    expect(store.getState().interaction).toEqual({ kind: 'dragging', particleIndex: 10 });

    for (let frame = 1; frame <= 20; frame += 1) {
      store.update(null, { ...idlePointer({ x: 20 + frame * 3, y: 20 + frame * 2 }), selectHeld: true }, 1 / 60);
      const current = store
        .getState()
        .cloth.particles.filter((p) => p.pinned)
        .map((p) => p.position);
      expect(current).toEqual(pinned);
    }
  });

  it('keeps a torn spring gone after its endpoints come back together', () => {
    const store = createClothStore({ ...SMALL_GRID, width: 2, height: 2, tearThreshold: 2 });
    const { cloth } = store.getState();
    expect(cloth.springs).toHaveLength(6);

    cloth.particles[3].position = { x: 100, y: 100 };
    cloth.particles[3].previousPosition = { x: 100, y: 100 };
    store.update(null, idlePointer(), 1 / 60);

    expect(store.getState().cloth.springs).toHaveLength(3);
    expect(store.getState().stats.tornTotal).toBe(3);

    cloth.particles[3].position = { x: 10, y: 10 };
    cloth.particles[3].previousPosition = { x: 10, y: 10 };
    for (let frame = 0; frame < 5; frame += 1) {
      store.update(null, idlePointer(), 1 / 60);
    }

    const springs = store.getState().cloth.springs;
    expect(springs).toHaveLength(3);
    expect(springs.some((spring) => spring.a === 3 || spring.b === 3)).toBe(false);
  });

  it('cuts springs near the pointer while cut is held', () => {
    const store = createClothStore({ ...SMALL_GRID, cutRadius: 6 });

    store.update(null, { ...idlePointer({ x: 15, y: 5 }), cutHeld: true }, 1 / 60);

    const { cloth, stats, cutting, cursor } = store.getState();
    expect(stats.cutTotal).toBe(39 - cloth.springs.length);
    expect(stats.cutTotal).toBeGreaterThan(0);
    expect(cutting).toBe(true);
    expect(cursor).toEqual({ x: 15, y: 5 });
  });

  it('selects and drags through update', () => {
    const store = createClothStore(SMALL_GRID);

    store.update(null, { ...idlePointer({ x: 1, y: 11 }), selectPressed: true, selectHeld: true }, 1 / 60);
    expect(store.getState().interaction).toEqual({ kind: 'dragging', particleIndex: 4 });
    expect(store.getState().cloth.particles[4].position).toEqual({ x: 1, y: 11 });

    store.update(null, { ...idlePointer({ x: 1, y: 11 }), selectReleased: true }, 1 / 60);
    expect(store.getState().interaction).toEqual({ kind: 'idle' });
  });

  it('refuses a selection over the panel', () => {
    const store = createClothStore(SMALL_GRID);
    store.update(
      null,
      { ...idlePointer({ x: 0, y: 10 }), selectPressed: true, selectHeld: true, overUi: true },
      1 / 60
    );
    expect(store.getState().interaction).toEqual({ kind: 'idle' });
  });

  it('rebuilds on a size change and drops the selection', () => {
    const store = createClothStore(SMALL_GRID);
    store.update(null, { ...idlePointer({ x: 30, y: 20 }), selectPressed: true, selectHeld: true }, 1 / 60);
    expect(store.getState().interaction).toEqual({ kind: 'dragging', particleIndex: 11 });

    store.update({ width: 2 }, { ...idlePointer({ x: 30, y: 20 }), selectHeld: true }, 1 / 60);

    const { cloth, interaction } = store.getState();
    expect(cloth.particles).toHaveLength(6);
    expect(cloth.springs).toHaveLength(13);
    expect(interaction).toEqual({ kind: 'idle' });
  });

  it('hot-applies other parameters without rebuilding', () => {
    const store = createClothStore(SMALL_GRID);
    const cloth = store.getState().cloth;

    store.setConfig({ stiffness: 0.5, iterations: 8, tearThreshold: 3, cutRadius: 20 });

    const state = store.getState();
    expect(state.cloth).toBe(cloth);
    expect(state.config.stiffness).toBe(0.5);
    expect(state.config.iterations).toBe(8);
  });

  it('rebuilds on reset with the current configuration', () => {
    const store = createClothStore(SMALL_GRID);
    store.update(null, { ...idlePointer({ x: 15, y: 5 }), cutHeld: true }, 1 / 60);
    const before = store.getState().cloth;

    store.reset();

    const { cloth, stats } = store.getState();
    expect(cloth).not.toBe(before);
    expect(cloth.springs).toHaveLength(39);
    expect(stats.cutTotal).toBe(0);
    expect(stats.tornTotal).toBe(0);
  });

  it('skips physics for an invalid timestep but still follows the pointer', () => {
    const store = createClothStore({ ...SMALL_GRID, gravity: { x: 0, y: 980 } });
    const y = store.getState().cloth.particles[8].position.y;

    const result = store.update(
      null,
      { ...idlePointer({ x: 10, y: 10 }), selectPressed: true, selectHeld: true },
      0
    );

    expect(result).toEqual({ ok: false, reason: 'Invalid timestep.' });
    expect(store.getState().cloth.particles[8].position.y).toBe(y);
    expect(store.getState().cloth.particles[5].position).toEqual({ x: 10, y: 10 });
    expect(store.getState().interaction).toEqual({ kind: 'dragging', particleIndex: 5 });
  });

  it('notifies subscribers until they unsubscribe', () => {
    const store = createClothStore(SMALL_GRID);
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.update(null, idlePointer(), 1 / 60);
    store.setConfig({ stiffness: 0.7 });
    store.reset();
    expect(listener).toHaveBeenCalledTimes(3);

    unsubscribe();
    store.update(null, idlePointer(), 1 / 60);
    expect(listener).toHaveBeenCalledTimes(3);
  });

  it('exposes a detached render snapshot', () => {
    const store = createClothStore(SMALL_GRID);
    const snapshot = store.getRenderSnapshot();

    expect(snapshot.segments).toHaveLength(39);
    expect(snapshot.segments[0]).toEqual({ a: { x: 0, y: 0 }, b: { x: 10, y: 0 } });
    expect(snapshot.particles).toHaveLength(12);
    expect(snapshot.particles[0]).toEqual({ position: { x: 0, y: 0 }, pinned: true });
    expect(snapshot.particles[4]).toEqual({ position: { x: 0, y: 10 }, pinned: false });

    snapshot.particles[4].position.x = 99;
    expect(store.getState().cloth.particles[4].position.x).toBe(0);
  });
});
