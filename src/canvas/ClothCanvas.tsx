import { useCallback, useEffect, useRef, useState } from 'react';
import type { MouseEvent as ReactMouseEvent, PointerEvent as ReactPointerEvent } from 'react';

import type { PointerTracker } from '../model/pointer';
import { renderCloth } from '../model/render';
import type { ClothStore, Vec2 } from '../model/types';

type ClothCanvasProps = {
  store: ClothStore;
  tracker: PointerTracker;
  renderNonce: number;
};

const DEFAULT_VIEWPORT = { width: 1200, height: 800 };

function getCanvasPoint(event: ReactPointerEvent<HTMLCanvasElement>, canvas: HTMLCanvasElement): Vec2 {
  const rect = canvas.getBoundingClientRect();
  return {
    x: event.clientX - rect.left,
    y: event.clientY - rect.top
  };
}

export function ClothCanvas({ store, tracker, renderNonce }: ClothCanvasProps): JSX.Element {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const [viewport, setViewport] = useState(DEFAULT_VIEWPORT);

  const resizeCanvas = useCallback(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const rect = canvas.getBoundingClientRect();
    const cssWidth = Math.max(1, Math.round(rect.width || DEFAULT_VIEWPORT.width));
    const cssHeight = Math.max(1, Math.round(rect.height || DEFAULT_VIEWPORT.height));
    const dpr = window.devicePixelRatio || 1;

    canvas.width = Math.round(cssWidth * dpr);
    canvas.height = Math.round(cssHeight * dpr);

    const ctx = canvas.getContext('2d');
    if (!ctx) {
      return;
    }

    ctx.setTransform(dpr, 0, 0, dpr, 0, 0);

    setViewport((prev) => {
      if (prev.width === cssWidth && prev.height === cssHeight) {
        return prev;
      }
      return {
        width: cssWidth,
        height: cssHeight
      };
    });
  }, []);

  useEffect(() => {
    resizeCanvas();
    window.addEventListener('resize', resizeCanvas);
    return () => {
      window.removeEventListener('resize', resizeCanvas);
    };
  }, [resizeCanvas]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const ctx = canvas.getContext('2d');
    if (!ctx) {
      return;
    }

    const state = store.getState();
    renderCloth(ctx, viewport.width, viewport.height, store.getRenderSnapshot(), {
      cursor: state.cursor,
      cutting: state.cutting,
      cutRadius: state.config.cutRadius
    });
  }, [store, viewport.height, viewport.width, renderNonce]);

  const handlePointerDown = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      tracker.press(event.button, getCanvasPoint(event, canvas), event.buttons);
      canvas.setPointerCapture(event.pointerId);
    },
    [tracker]
  );

  const handlePointerMove = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      tracker.move(getCanvasPoint(event, canvas), event.buttons);
    },
    [tracker]
  );

  const handlePointerUp = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      tracker.release(event.button, getCanvasPoint(event, canvas), event.buttons);
      canvas.releasePointerCapture(event.pointerId);
    },
    [tracker]
  );

  const handlePointerCancel = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      tracker.cancel();
      canvas.releasePointerCapture(event.pointerId);
    },
    [tracker]
  );

  // Right button cuts; keep the browser menu out of the way.
  const handleContextMenu = useCallback((event: ReactMouseEvent<HTMLCanvasElement>) => {
    event.preventDefault();
  }, []);

  return (
    <canvas
      ref={canvasRef}
      data-testid="cloth-canvas"
      className="cloth-canvas"
      onPointerDown={handlePointerDown}
      onPointerMove={handlePointerMove}
      onPointerUp={handlePointerUp}
      onPointerCancel={handlePointerCancel}
      onContextMenu={handleContextMenu}
    />
  );
}
