import { createCloth } from './cloth';
import { DEFAULT_CLOTH_CONFIG, normalizeConfig, topologyChanged } from './config';
import { cutSprings } from './cut';
import { IDLE, stepInteraction } from './interaction';
import { applyGravity, clampFrameTime, integrate, solveSprings } from './solver';
import type {
  Cloth,
  ClothConfig,
  ClothStore,
  ClothStoreState,
  PointerState,
  RenderSnapshot,
  Result
} from './types';

function buildCloth(config: ClothConfig): Cloth {
  return createCloth(config.width, config.height, config.spacing, config.origin);
}

export function createClothStore(initialConfig: Partial<ClothConfig> = {}): ClothStore {
  const listeners = new Set<() => void>();
  const config = normalizeConfig(initialConfig, DEFAULT_CLOTH_CONFIG);

  const state: ClothStoreState = {
    cloth: buildCloth(config),
    config,
    interaction: IDLE,
    stats: {
      frame: 0,
      tornTotal: 0,
      cutTotal: 0
    },
    cursor: null,
    cutting: false
  };

  const emit = (): void => {
    for (const listener of listeners) {
      listener();
    }
  };

  const rebuild = (): void => {
    state.cloth = buildCloth(state.config);
    state.interaction = IDLE;
    state.stats = { frame: state.stats.frame, tornTotal: 0, cutTotal: 0 };
  };

  const applyConfig = (partial: Partial<ClothConfig>): void => {
    const next = normalizeConfig(partial, state.config);
    const shouldRebuild = topologyChanged(state.config, next);
    state.config = next;
    if (shouldRebuild) {
      rebuild();
    }
  };

  return {
    getState(): ClothStoreState {
      return state;
    },

    subscribe(listener: () => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    setConfig(partial) {
      applyConfig(partial);
      emit();
    },

    reset() {
      rebuild();
      emit();
    },

    update(partial, pointer: PointerState, dtSeconds): Result {
      if (partial) {
        applyConfig(partial);
      }

      const { cloth, config: current } = state;
      const dt = clampFrameTime(dtSeconds);

      if (dt > 0) {
        applyGravity(cloth.particles, current.gravity);
        integrate(cloth.particles, dt);
        const solved = solveSprings(cloth.particles, cloth.springs, {
          iterations: current.iterations,
          stiffness: current.stiffness,
          tearThreshold: current.tearThreshold
        });
        cloth.springs = solved.springs;
        state.stats.tornTotal += solved.torn;
      }

      if (pointer.cutHeld) {
        const cut = cutSprings(cloth.particles, cloth.springs, pointer.position, current.cutRadius);
        cloth.springs = cut.springs;
        state.stats.cutTotal += cut.removed;
      }

      state.interaction = stepInteraction(state.interaction, cloth.particles, pointer);
      state.cursor = { x: pointer.position.x, y: pointer.position.y };
      state.cutting = pointer.cutHeld;
      state.stats.frame += 1;
      emit();

      if (dt === 0) {
        return { ok: false, reason: 'Invalid timestep.' };
      }
      return { ok: true };
    },

    getRenderSnapshot(): RenderSnapshot {
      const { particles, springs } = state.cloth;
      return {
        segments: springs.map((spring) => {
          const a = particles[spring.a].position;
          const b = particles[spring.b].position;
          return { a: { x: a.x, y: a.y }, b: { x: b.x, y: b.y } };
        }),
        particles: particles.map((particle) => ({
          position: { x: particle.position.x, y: particle.position.y },
          pinned: particle.pinned
        }))
      };
    }
  };
}
