import type { PointerState, Vec2 } from './types';

export const SELECT_BUTTON = 0;
export const CUT_BUTTON = 2;

const SELECT_MASK = 1;
const CUT_MASK = 2;

// `buttons` is the DOM bitmask of buttons down after the event.
export interface PointerTracker {
  move(position: Vec2, buttons?: number): void;
  press(button: number, position: Vec2, buttons?: number): void;
  release(button: number, position: Vec2, buttons?: number): void;
  setOverUi(overUi: boolean): void;
  cancel(): void;
  snapshot(): PointerState;
}

function maskOf(button: number): number {
  if (button === SELECT_BUTTON) {
    return SELECT_MASK;
  }
  if (button === CUT_BUTTON) {
    return CUT_MASK;
  }
  return 0;
}

export function createPointerTracker(initial: Vec2 = { x: 0, y: 0 }): PointerTracker {
  const position: Vec2 = { x: initial.x, y: initial.y };
  let selectHeld = false;
  let selectPressed = false;
  let selectReleased = false;
  let cutHeld = false;
  let overUi = false;

  const moveTo = (point: Vec2): void => {
    position.x = point.x;
    position.y = point.y;
  };

  const heldMask = (): number => (selectHeld ? SELECT_MASK : 0) | (cutHeld ? CUT_MASK : 0);

  // Chorded presses arrive as pointermove, so edges come from the bitmask.
  const syncButtons = (buttons: number): void => {
    const nextSelect = (buttons & SELECT_MASK) !== 0;
    if (nextSelect && !selectHeld) {
      selectPressed = true;
    } else if (!nextSelect && selectHeld) {
      selectReleased = true;
    }
    selectHeld = nextSelect;
    cutHeld = (buttons & CUT_MASK) !== 0;
  };

  return {
    move(point, buttons) {
      moveTo(point);
      if (buttons !== undefined) {
        syncButtons(buttons);
      }
    },

    press(button, point, buttons = heldMask()) {
      moveTo(point);
      syncButtons(buttons | maskOf(button));
    },

    release(button, point, buttons = heldMask()) {
      moveTo(point);
      syncButtons(buttons & ~maskOf(button));
    },

    setOverUi(next) {
      overUi = next;
    },

    cancel() {
      if (selectHeld) {
        selectReleased = true;
      }
      selectHeld = false;
      cutHeld = false;
    },

    snapshot(): PointerState {
      const state: PointerState = {
        position: { x: position.x, y: position.y },
        selectPressed,
        // A press released within the same frame still drags once.
        selectHeld: selectHeld || (selectPressed && selectReleased),
        selectReleased,
        cutHeld,
        overUi
      };
      selectPressed = false;
      selectReleased = false;
      return state;
    }
  };
}
