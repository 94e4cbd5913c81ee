import { useEffect, useState } from 'react';

import { ClothCanvas } from './canvas/ClothCanvas';
import { createPointerTracker } from './model/pointer';
import type { PointerTracker } from './model/pointer';
import { createClothStore } from './model/store';
import type { ClothStore } from './model/types';
import { ConfigPanel } from './ui/ConfigPanel';

type AppProps = {
  store?: ClothStore;
  tracker?: PointerTracker;
  running?: boolean;
};

const FIRST_FRAME_SECONDS = 1 / 60;

function useStoreVersion(store: ClothStore): number {
  const [version, setVersion] = useState(0);

  useEffect(() => {
    return store.subscribe(() => {
      setVersion((previous) => previous + 1);
    });
  }, [store]);

  return version;
}

export default function App({ store, tracker, running = true }: AppProps): JSX.Element {
  const [ownStore] = useState<ClothStore>(() => store ?? createClothStore());
  const [ownTracker] = useState<PointerTracker>(() => tracker ?? createPointerTracker());
  const clothStore = store ?? ownStore;
  const pointerTracker = tracker ?? ownTracker;
  const version = useStoreVersion(clothStore);
  const state = clothStore.getState();

  useEffect(() => {
    if (!running) {
      return;
    }

    let frameId = 0;
    let lastTime: number | null = null;

    const step = (now: number): void => {
      const dtSeconds = lastTime === null ? FIRST_FRAME_SECONDS : (now - lastTime) / 1000;
      lastTime = now;
      clothStore.update(null, pointerTracker.snapshot(), dtSeconds);
      frameId = window.requestAnimationFrame(step);
    };

    frameId = window.requestAnimationFrame(step);

    return () => {
      window.cancelAnimationFrame(frameId);
    };
  }, [clothStore, pointerTracker, running]);

  return (
    <div className="app-shell">
      <div className="canvas-wrap">
        <ClothCanvas store={clothStore} tracker={pointerTracker} renderNonce={version} />
      </div>

      <ConfigPanel
        config={state.config}
        onChange={(partial) => clothStore.setConfig(partial)}
        onReset={() => clothStore.reset()}
        onPointerOverChange={(over) => pointerTracker.setOverUi(over)}
      />

      <div className="statusbar" data-testid="statusbar">
        <span className="hint">Left Mouse: Drag and Tear | Right Mouse: Cut</span>
        <span>
          Particles: <strong data-testid="particle-count">{state.cloth.particles.length}</strong>
        </span>
        <span>
          Springs: <strong data-testid="spring-count">{state.cloth.springs.length}</strong>
        </span>
        <span>
          Torn: <strong data-testid="torn-count">{state.stats.tornTotal}</strong>
        </span>
        <span>
          Cut: <strong data-testid="cut-count">{state.stats.cutTotal}</strong>
        </span>
        <span>
          Mode: <strong data-testid="interaction-mode">{state.interaction.kind}</strong>
        </span>
      </div>
    </div>
  );
}
