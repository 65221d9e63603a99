export * from './batch-orchestrator.js';
export * from './entity-job.js';
export * from './query-templates.js';
export * from './types.js';
