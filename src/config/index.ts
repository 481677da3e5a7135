export { loadProfile, parseProfile, validateProfile, applyYear } from './loader.js';
export type { LoadProfileOptions } from './loader.js';
export { EventTypeProfileSchema, SourceConfigSchema } from './schema.js';
export type { RawEventTypeProfile } from './schema.js';
