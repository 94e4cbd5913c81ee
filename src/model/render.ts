import type { RenderSnapshot, Vec2 } from './types';

export const BACKGROUND_COLOR = '#000';
export const SPRING_COLOR = '#fff';
export const PARTICLE_COLOR = '#00f';
export const PINNED_COLOR = '#f00';

export const SPRING_WIDTH = 1;
export const PARTICLE_RADIUS = 2;
export const PINNED_RADIUS = 3;
const CUT_RING_COLOR = 'rgba(255, 255, 255, 0.35)';

export type CutOverlay = {
  cursor: Vec2 | null;
  cutting: boolean;
  cutRadius: number;
};

export function renderCloth(
  ctx: CanvasRenderingContext2D,
  width: number,
  height: number,
  snapshot: RenderSnapshot,
  overlay: CutOverlay
): void {
  ctx.clearRect(0, 0, width, height);
  ctx.fillStyle = BACKGROUND_COLOR;
  ctx.fillRect(0, 0, width, height);

  if (snapshot.segments.length > 0) {
    ctx.beginPath();
    for (const segment of snapshot.segments) {
      ctx.moveTo(segment.a.x, segment.a.y);
      ctx.lineTo(segment.b.x, segment.b.y);
    }
    ctx.strokeStyle = SPRING_COLOR;
    ctx.lineWidth = SPRING_WIDTH;
    ctx.stroke();
  }

  for (const particle of snapshot.particles) {
    ctx.beginPath();
    ctx.arc(
      particle.position.x,
      particle.position.y,
      particle.pinned ? PINNED_RADIUS : PARTICLE_RADIUS,
      0,
      Math.PI * 2
    );
    ctx.fillStyle = particle.pinned ? PINNED_COLOR : PARTICLE_COLOR;
    ctx.fill();
  }

  if (overlay.cutting && overlay.cursor) {
    ctx.save();
    ctx.beginPath();
    ctx.arc(overlay.cursor.x, overlay.cursor.y, overlay.cutRadius, 0, Math.PI * 2);
    ctx.strokeStyle = CUT_RING_COLOR;
    ctx.lineWidth = 1;
    ctx.stroke();
    ctx.restore();
  }
}
