import { distancePointToSegment } from './hitTest';
import type { Particle, Spring, Vec2 } from './types';

export type CutResult = {
  springs: Spring[];
  removed: number;
};

// A spring whose segment touches the disc, boundary included, is removed.
export function cutSprings(
  particles: readonly Particle[],
  springs: readonly Spring[],
  point: Vec2,
  radius: number
): CutResult {
  const kept = springs.filter(
    (spring) =>
      distancePointToSegment(point, particles[spring.a].position, particles[spring.b].position) > radius
  );
  return { springs: kept, removed: springs.length - kept.length };
}
