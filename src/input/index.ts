import { encodeKey, encodeText, isNamedKey, sequences } from "./keymap";
import { DEFAULT_MAX_SCROLL_STEP, applyWheelScroll, wheelDeltaToRows } from "./scroll";
import type { InputHandler, InputHandlerOptions } from "./types";

/**
 * Create a terminal input handler for key and wheel events.
 */
export function createInputHandler(options: InputHandlerOptions): InputHandler {
  const maxScrollStep = options.maxScrollStep ?? DEFAULT_MAX_SCROLL_STEP;

  return {
    handleKey: (key) => {
      const bytes = encodeKey(key);
      if (!bytes) return false;
      options.sendInput(bytes);
      return true;
    },
    handleText: (text) => {
      if (text) options.sendInput(encodeText(text));
    },
    handleWheel: (delta) => {
      if (!options.scrollTarget) return 0;
      return applyWheelScroll(options.scrollTarget, delta, maxScrollStep);
    },
  };
}

export {
  DEFAULT_MAX_SCROLL_STEP,
  applyWheelScroll,
  encodeKey,
  encodeText,
  isNamedKey,
  sequences,
  wheelDeltaToRows,
};

export type { InputHandler, InputHandlerOptions, NamedKey, ScrollTarget } from "./types";
