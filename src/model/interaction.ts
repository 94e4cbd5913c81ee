import { DEFAULT_PICK_RADIUS, hitTestParticle } from './hitTest';
import type { InteractionState, Particle, PointerState, Vec2 } from './types';

export const IDLE: InteractionState = { kind: 'idle' };

export function beginSelection(
  state: InteractionState,
  particles: readonly Particle[],
  pointer: Vec2,
  overUi: boolean,
  radius = DEFAULT_PICK_RADIUS
): InteractionState {
  if (state.kind !== 'idle' || overUi) {
    return state;
  }
  const index = hitTestParticle(particles, pointer, radius);
  if (index === null) {
    return state;
  }
  return { kind: 'dragging', particleIndex: index };
}

export function dragSelection(
  state: InteractionState,
  particles: Particle[],
  pointer: Vec2
): InteractionState {
  if (state.kind !== 'dragging') {
    return state;
  }
  if (state.particleIndex < 0 || state.particleIndex >= particles.length) {
    return IDLE;
  }

  const particle = particles[state.particleIndex];
  particle.previousPosition.x = particle.position.x;
  particle.previousPosition.y = particle.position.y;
  particle.position.x = pointer.x;
  particle.position.y = pointer.y;
  return state;
}

export function endSelection(): InteractionState {
  return IDLE;
}

export function stepInteraction(
  state: InteractionState,
  particles: Particle[],
  pointer: PointerState
): InteractionState {
  let next = state;
  if (pointer.selectPressed) {
    next = beginSelection(next, particles, pointer.position, pointer.overUi);
  }
  if (pointer.selectHeld) {
    next = dragSelection(next, particles, pointer.position);
  }
  if (pointer.selectReleased) {
    next = endSelection();
  }
  return next;
}
