/**
 * @profilescout/agents - Entity resolution pipeline
 *
 * - search/   : Web search with page content enhancement
 * - extract/  : Draft profile extraction from search results
 * - verify/   : Verification pass with confidence scores
 * - batch/    : Per-entity state machine and batch orchestration
 * - shared/   : Base agent and common types
 */

export * from './shared/index.js';
export * from './search/index.js';
export * from './extract/index.js';
export * from './verify/index.js';
export * from './batch/index.js';
export * from './pipeline.js';
