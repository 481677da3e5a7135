import { EventEmitter } from 'eventemitter3';
import type { EventType } from './constants.js';
import { errorMessage } from './errors.js';
import { getLogger } from './logger.js';

const log = getLogger('events');

/**
 * All typed events emitted during discovery and enrichment.
 * Keys are event names; values are the payload shape passed to listeners.
 */
export interface AppEvents {
  'discovery:started': {
    runId: string;
    eventType: EventType;
    sourceCount: number;
    maxResults: number;
  };
  'discovery:source-completed': {
    runId: string;
    source: string;
    candidatesFound: number;
    failed: boolean;
  };
  'discovery:expanded': {
    runId: string;
    expanded: number;
    failed: number;
  };
  'discovery:completed': {
    runId: string;
    eventType: EventType;
    totalFound: number;
    uniqueCount: number;
    finalCount: number;
  };
  'enrichment:completed': {
    processed: number;
    fallbacks: number;
  };
}

/**
 * Strongly-typed event emitter built on eventemitter3.
 */
export class TypedEventEmitter extends EventEmitter<{
  [K in keyof AppEvents]: (payload: AppEvents[K]) => void;
}> {}

/** Process-wide event bus. */
export const eventBus = new TypedEventEmitter();

/**
 * Runs `emit` so that a throwing listener is logged rather than
 * propagated into the pipeline that raised the event.
 */
export function emitGuarded(emit: () => unknown): void {
  try {
    emit();
  } catch (error) {
    log.error({ error: errorMessage(error) }, 'Event listener threw');
  }
}
