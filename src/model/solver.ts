import { distance } from './hitTest';
import type { Particle, Spring, Vec2 } from './types';

export const MAX_FRAME_SECONDS = 1 / 30;

export type SolverOptions = {
  iterations: number;
  stiffness: number;
  tearThreshold: number;
};

export type SolveResult = {
  springs: Spring[];
  torn: number;
};

export function clampFrameTime(dtSeconds: number): number {
  if (!Number.isFinite(dtSeconds) || dtSeconds <= 0) {
    return 0;
  }
  return Math.min(dtSeconds, MAX_FRAME_SECONDS);
}

export function applyGravity(particles: Particle[], gravity: Vec2): void {
  for (const particle of particles) {
    particle.force.x += gravity.x;
    particle.force.y += gravity.y;
  }
}

export function integrate(particles: Particle[], dtSeconds: number): void {
  const dt2 = dtSeconds * dtSeconds;

  for (const particle of particles) {
    if (particle.pinned) {
      particle.force.x = 0;
      particle.force.y = 0;
      continue;
    }

    const { position, previousPosition, force } = particle;
    const ax = force.x / particle.mass;
    const ay = force.y / particle.mass;
    const vx = position.x - previousPosition.x;
    const vy = position.y - previousPosition.y;

    previousPosition.x = position.x;
    previousPosition.y = position.y;
    position.x += vx + ax * dt2;
    position.y += vy + ay * dt2;
    force.x = 0;
    force.y = 0;
  }
}

export function tearSprings(
  particles: readonly Particle[],
  springs: readonly Spring[],
  tearThreshold: number
): Spring[] {
  return springs.filter(
    (spring) =>
      distance(particles[spring.a].position, particles[spring.b].position) <
      spring.restLength * tearThreshold
  );
}

export function relaxSprings(particles: Particle[], springs: readonly Spring[], stiffness: number): void {
  for (const spring of springs) {
    const a = particles[spring.a];
    const b = particles[spring.b];
    const dx = b.position.x - a.position.x;
    const dy = b.position.y - a.position.y;
    const dist = Math.hypot(dx, dy);
    if (dist === 0) {
      continue;
    }

    const scale = 0.5 * ((dist - spring.restLength) / dist) * stiffness;
    const cx = dx * scale;
    const cy = dy * scale;

    if (!a.pinned) {
      a.position.x += cx;
      a.position.y += cy;
    }
    if (!b.pinned) {
      b.position.x -= cx;
      b.position.y -= cy;
    }
  }
}

export function solveSprings(
  particles: Particle[],
  springs: readonly Spring[],
  options: SolverOptions
): SolveResult {
  let live: Spring[] = [...springs];
  let torn = 0;

  for (let iteration = 0; iteration < options.iterations; iteration += 1) {
    const kept = tearSprings(particles, live, options.tearThreshold);
    torn += live.length - kept.length;
    live = kept;
    relaxSprings(particles, live, options.stiffness);
  }

  return { springs: live, torn };
}
