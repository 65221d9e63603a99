/**
 * @profilescout/schemas - zod schemas and types shared across packages
 */

export * from './enums.js';
export * from './search.js';
export * from './profile.js';
export * from './entity-job.js';
