import type { ClothConfig, Vec2 } from './types';

export const MIN_GRID_DIMENSION = 2;
export const MAX_GRID_DIMENSION = 128;
export const MIN_ITERATIONS = 1;
export const MAX_ITERATIONS = 64;
export const MIN_STIFFNESS = 0.01;

export const DEFAULT_CLOTH_CONFIG: ClothConfig = {
  width: 40,
  height: 25,
  spacing: 15,
  origin: { x: 300, y: 50 },
  gravity: { x: 0, y: 980 },
  stiffness: 0.9,
  tearThreshold: 4.5,
  iterations: 5,
  cutRadius: 10
};

export type SliderRange = {
  min: number;
  max: number;
  step: number;
};

// Ranges offered by the configuration panel; normalizeConfig accepts wider input.
export const PANEL_RANGES = {
  width: { min: 4, max: 64, step: 1 },
  height: { min: 4, max: 64, step: 1 },
  cutRadius: { min: 10, max: 50, step: 1 },
  gravity: { min: 0, max: 2000, step: 10 },
  stiffness: { min: 0.1, max: 1, step: 0.01 },
  tearThreshold: { min: 1.1, max: 10, step: 0.1 },
  iterations: { min: 1, max: 20, step: 1 }
} satisfies Record<string, SliderRange>;

function clampInteger(value: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.round(value)));
}

function clampPositive(value: number, fallback: number): number {
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function finiteVec(value: Vec2, fallback: Vec2): Vec2 {
  if (!Number.isFinite(value.x) || !Number.isFinite(value.y)) {
    return { x: fallback.x, y: fallback.y };
  }
  return { x: value.x, y: value.y };
}

export function normalizeConfig(
  partial: Partial<ClothConfig>,
  fallback: ClothConfig = DEFAULT_CLOTH_CONFIG
): ClothConfig {
  const next: ClothConfig = {
    ...fallback,
    origin: { ...fallback.origin },
    gravity: { ...fallback.gravity }
  };

  if (typeof partial.width === 'number') {
    next.width = clampInteger(partial.width, MIN_GRID_DIMENSION, MAX_GRID_DIMENSION, fallback.width);
  }
  if (typeof partial.height === 'number') {
    next.height = clampInteger(partial.height, MIN_GRID_DIMENSION, MAX_GRID_DIMENSION, fallback.height);
  }
  if (typeof partial.iterations === 'number') {
    next.iterations = clampInteger(partial.iterations, MIN_ITERATIONS, MAX_ITERATIONS, fallback.iterations);
  }
  if (typeof partial.spacing === 'number') {
    next.spacing = clampPositive(partial.spacing, fallback.spacing);
  }
  if (typeof partial.cutRadius === 'number') {
    next.cutRadius = clampPositive(partial.cutRadius, fallback.cutRadius);
  }
  if (typeof partial.stiffness === 'number' && Number.isFinite(partial.stiffness)) {
    next.stiffness = Math.min(1, Math.max(MIN_STIFFNESS, partial.stiffness));
  }
  if (
    typeof partial.tearThreshold === 'number' &&
    Number.isFinite(partial.tearThreshold) &&
    partial.tearThreshold > 1
  ) {
    next.tearThreshold = partial.tearThreshold;
  }
  if (partial.origin) {
    next.origin = finiteVec(partial.origin, fallback.origin);
  }
  if (partial.gravity) {
    next.gravity = finiteVec(partial.gravity, fallback.gravity);
  }

  return next;
}

export function topologyChanged(previous: ClothConfig, next: ClothConfig): boolean {
  return (
    previous.width !== next.width ||
    previous.height !== next.height ||
    previous.spacing !== next.spacing ||
    previous.origin.x !== next.origin.x ||
    previous.origin.y !== next.origin.y
  );
}
