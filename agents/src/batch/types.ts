import type { Logger, Sleep } from '@profilescout/core';
import type { EntityJobState, Profile, SearchResult } from '@profilescout/schemas';
import type { AgentContext } from '../shared/types.js';
import type { WebSearcher } from '../search/web-search-client.js';

export interface ProfileExtractor {
  extract(
    results: readonly SearchResult[],
    entity: string,
    context?: Partial<AgentContext>,
  ): Promise<Profile>;
}

export interface ProfileVerifier {
  verify(draft: Profile, context?: Partial<AgentContext>): Promise<Profile>;
}

export interface BatchProgress {
  /** Entities finished so far, including this one. */
  processed: number;
  total: number;
  index: number;
  entity: string;
  state: EntityJobState;
  error?: string;
}

export interface BatchOrchestratorOptions {
  searcher: WebSearcher;
  extractor: ProfileExtractor;
  verifier: ProfileVerifier;
  /** Hits requested per entity (default 5). */
  maxResults?: number;
  /** Entities processed concurrently per batch (default 10). */
  batchSize?: number;
  batchPauseMs?: number;
  failurePauseMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export interface BatchRunOptions {
  onProgress?: (progress: BatchProgress) => void;
  /** Checked between batches; jobs not yet started are failed as cancelled. */
  signal?: AbortSignal;
}
