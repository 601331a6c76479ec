/**
 * Lifecycle registry test utilities
 */

import { EventEmitter } from "node:events";
import { LifecycleRegistry } from "@jawadb/sdk";

/**
 * A registry wired to an in-process event emitter instead of `process`
 */
export interface TestRegistry {
  registry: LifecycleRegistry;
  /** Emit "exit", "SIGINT" or "SIGTERM" here to drive the registry's hooks */
  events: EventEmitter;
  /** Status codes passed to the registry's exit function, in order */
  exitCodes: number[];
}

/**
 * Create a registry whose hooks listen on a private emitter and whose exit
 * function only records the status code
 */
export function createTestRegistry(): TestRegistry {
  const events = new EventEmitter();
  const exitCodes: number[] = [];
  const registry = new LifecycleRegistry({
    process: events,
    exit: (code) => {
      exitCodes.push(code);
    },
  });
  return { registry, events, exitCodes };
}
