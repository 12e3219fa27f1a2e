import { Logger } from 'pino';
import { HookDispatcher } from '../events/dispatcher.js';
import { EngineExecutionResult } from './result.js';

/**
 * Collects the extension entries of the `gatheringExtensions` listeners into the result. Listeners
 * contributing the same key overwrite earlier values; the collision is logged.
 */
export function gatherExtensions(
  dispatcher: HookDispatcher,
  result: EngineExecutionResult,
  logger: Logger,
  operationName?: string,
): void {
  const entries = dispatcher.dispatch('gatheringExtensions', { operationName, result });
  for (const entry of entries) {
    for (const [key, value] of Object.entries(entry)) {
      if (Object.hasOwn(result.extensions, key)) {
        logger.warn({ extension: key }, 'Extension key collision, the value of the later listener is used');
      }
      result.extensions[key] = value;
    }
  }
}
