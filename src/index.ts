/**
 * Library entry point: discovery engine, configuration, enrichment and
 * persistence. The command-line interface lives in `cli.ts`.
 */

export * from './discovery/index.js';
export * from './config/index.js';
export * from './enrichment/index.js';

export { openDatabase } from './db/index.js';
export type { AppDatabase, DatabaseHandle } from './db/index.js';
export { migrate } from './db/migrate.js';
export { EventRepository } from './db/event-repository.js';
export type { UpsertResult } from './db/event-repository.js';

export { EVENT_TYPES, DISCOVERY_METHODS, AGGREGATOR_EXPANSION_SOURCE } from './shared/constants.js';
export type { EventType, DiscoveryMethod } from './shared/constants.js';
export {
  AppError,
  DiscoveryError,
  ConfigurationError,
  ValidationError,
  isOperationalError,
} from './shared/errors.js';
export { eventBus, TypedEventEmitter } from './shared/events.js';
export type { AppEvents } from './shared/events.js';
export { DEFAULT_DELAYS, NO_DELAYS } from './shared/timing.js';
export type { DiscoveryDelays } from './shared/timing.js';
export { getLogger } from './shared/logger.js';
