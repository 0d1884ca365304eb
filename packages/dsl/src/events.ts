import type { ModelEvents } from "@tokenflow/model";

export type EventLogger = {
  log(message: string): void;
};

/** ModelEvents that write one line per event. */
export function logEvents(logger: EventLogger = console): ModelEvents {
  return {
    onFreeze: (schema, placeCount, transitionCount) => {
      logger.log(`[${schema}] frozen: ${placeCount} places, ${transitionCount} transitions`);
    },
    onOverlay: (schema, binding, patch) => {
      logger.log(`[${schema}] ${binding.name()} = ${patch.value}`);
    },
  };
}
