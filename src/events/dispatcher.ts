import { EngineEventName, EventListener, EventPayload, EventResult } from './types.js';

type ListenerRegistry = { [K in EngineEventName]: Array<EventListener<K>> };

function isDefined<T>(value: T | void | undefined): value is T {
  return value !== undefined;
}

/**
 * Ordered listener registry for the engine hook points. Listeners run synchronously in registration
 * order and the values they return are collected in the same order.
 */
export class HookDispatcher {
  #listeners: ListenerRegistry = {
    startExecution: [],
    buildingAST: [],
    manipulatingAST: [],
    gatheringExtensions: [],
  };

  /**
   * Registers a listener and returns a function that removes it again.
   */
  on<K extends EngineEventName>(event: K, listener: EventListener<K>): () => void {
    const listeners: Array<EventListener<K>> = this.#listeners[event];
    listeners.push(listener);
    return () => {
      const index = listeners.indexOf(listener);
      if (index !== -1) {
        listeners.splice(index, 1);
      }
    };
  }

  dispatch<K extends EngineEventName>(event: K, payload: EventPayload<K>): Array<EventResult<K>> {
    const listeners: Array<EventListener<K>> = this.#listeners[event];
    const results: Array<EventResult<K>> = [];
    // Copy so listeners registering or removing listeners do not affect the current dispatch.
    for (const listener of [...listeners]) {
      const result = listener(payload);
      if (isDefined(result)) {
        results.push(result);
      }
    }
    return results;
  }

  listenerCount(event: EngineEventName): number {
    return this.#listeners[event].length;
  }
}
