import type { Cloth, Particle, Spring, SpringKind, Vec2 } from './types';

export type SpringCounts = Record<SpringKind, number>;

export function createParticle(position: Vec2, pinned = false, mass = 1): Particle {
  return {
    position: { x: position.x, y: position.y },
    previousPosition: { x: position.x, y: position.y },
    force: { x: 0, y: 0 },
    mass,
    pinned
  };
}

export function createSpring(
  particleCount: number,
  a: number,
  b: number,
  restLength: number,
  kind: SpringKind
): Spring {
  if (!Number.isInteger(a) || !Number.isInteger(b) || a < 0 || b < 0) {
    throw new RangeError(`Spring endpoints must be non-negative integers, got ${a} and ${b}.`);
  }
  if (a >= particleCount || b >= particleCount) {
    throw new RangeError(`Spring endpoint out of range for ${particleCount} particles: ${a}, ${b}.`);
  }
  if (a === b) {
    throw new RangeError(`Spring endpoints must differ, got ${a} twice.`);
  }
  if (!(restLength > 0)) {
    throw new RangeError(`Spring rest length must be positive, got ${restLength}.`);
  }
  return { a, b, restLength, kind };
}

// Per cell: horizontal structural and bending, vertical structural and bending, then both shears.
export function createCloth(width: number, height: number, spacing: number, origin: Vec2): Cloth {
  const particles: Particle[] = [];
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      particles.push(
        createParticle({ x: origin.x + x * spacing, y: origin.y + y * spacing }, y === 0)
      );
    }
  }

  const count = particles.length;
  const diagonal = spacing * Math.SQRT2;
  const springs: Spring[] = [];
  const push = (a: number, b: number, restLength: number, kind: SpringKind): void => {
    springs.push(createSpring(count, a, b, restLength, kind));
  };

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const index = y * width + x;
      if (x + 1 < width) {
        push(index, index + 1, spacing, 'structural');
      }
      if (x + 2 < width) {
        push(index, index + 2, spacing * 2, 'bending');
      }
      if (y + 1 < height) {
        push(index, index + width, spacing, 'structural');
      }
      if (y + 2 < height) {
        push(index, index + 2 * width, spacing * 2, 'bending');
      }
      if (x + 1 < width && y + 1 < height) {
        push(index, index + width + 1, diagonal, 'shear');
        push(index + 1, index + width, diagonal, 'shear');
      }
    }
  }

  return {
    width,
    height,
    spacing,
    origin: { x: origin.x, y: origin.y },
    particles,
    springs
  };
}

export function countSpringsByKind(springs: readonly Spring[]): SpringCounts {
  const counts: SpringCounts = { structural: 0, bending: 0, shear: 0 };
  for (const spring of springs) {
    counts[spring.kind] += 1;
  }
  return counts;
}

export function expectedSpringCounts(width: number, height: number): SpringCounts {
  return {
    structural: (width - 1) * height + width * (height - 1),
    bending: Math.max(0, width - 2) * height + width * Math.max(0, height - 2),
    shear: 2 * (width - 1) * (height - 1)
  };
}
