import type { DocumentAST } from '../schema/document-ast.js';
import type { EngineExecutionResult } from '../execution/result.js';

export interface StartExecutionEvent {
  operationName?: string;
}

export interface BuildingASTEvent {
  /**
   * The schema string of the schema source provider, before additional fragments are appended.
   */
  userSchema: string;
}

export interface ManipulatingASTEvent {
  /**
   * Exclusively owned by the listener while it runs. Changes are made in place.
   */
  documentAST: DocumentAST;
}

export interface GatheringExtensionsEvent {
  operationName?: string;
  result: EngineExecutionResult;
}

export type ExtensionEntry = Record<string, unknown>;

/**
 * Payload and listener return value per event.
 */
export interface EngineEvents {
  startExecution: { payload: StartExecutionEvent; result: undefined };
  buildingAST: { payload: BuildingASTEvent; result: string };
  manipulatingAST: { payload: ManipulatingASTEvent; result: undefined };
  gatheringExtensions: { payload: GatheringExtensionsEvent; result: ExtensionEntry };
}

export type EngineEventName = keyof EngineEvents;

export type EventPayload<K extends EngineEventName> = EngineEvents[K]['payload'];

export type EventResult<K extends EngineEventName> = EngineEvents[K]['result'];

export type EventListener<K extends EngineEventName> = (payload: EventPayload<K>) => EventResult<K> | void;
