/**
 * Batch Orchestrator - Runs the search -> extract -> verify chain for many
 * entities
 *
 * Entities in a batch run concurrently; batches run one after another with a
 * pause between them. A failing entity becomes a FAILED row and never stops
 * its siblings.
 */

import {
  createLogger,
  errorMessage,
  sleep as defaultSleep,
  type Logger,
  type Sleep,
} from '@profilescout/core';
import type { EntityJob, EntityRecord } from '@profilescout/schemas';
import type { WebSearcher } from '../search/web-search-client.js';
import { DEFAULT_MAX_RESULTS } from '../search/web-search-client.js';
import { completeJob, createEntityJob, failJob, toRecord, transition } from './entity-job.js';
import type {
  BatchOrchestratorOptions,
  BatchRunOptions,
  ProfileExtractor,
  ProfileVerifier,
} from './types.js';

export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_BATCH_PAUSE_MS = 2000;
export const DEFAULT_FAILURE_PAUSE_MS = 5000;
export const CANCELLED_ERROR = 'Cancelled before processing';
export const EMPTY_ENTITY_ERROR = 'Empty entity name';

export class BatchOrchestrator {
  private readonly searcher: WebSearcher;
  private readonly extractor: ProfileExtractor;
  private readonly verifier: ProfileVerifier;
  private readonly maxResults: number;
  private readonly batchSize: number;
  private readonly batchPauseMs: number;
  private readonly failurePauseMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: BatchOrchestratorOptions) {
    this.searcher = options.searcher;
    this.extractor = options.extractor;
    this.verifier = options.verifier;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.batchPauseMs = options.batchPauseMs ?? DEFAULT_BATCH_PAUSE_MS;
    this.failurePauseMs = options.failurePauseMs ?? DEFAULT_FAILURE_PAUSE_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('batch');
  }

  /**
   * Resolve every entity with `queryTemplate`. Returns exactly one record per
   * input, in input order.
   */
  async run(
    entities: readonly string[],
    queryTemplate: string,
    options: BatchRunOptions = {},
  ): Promise<EntityRecord[]> {
    const jobs = entities.map((entity, index) => createEntityJob(index, entity, queryTemplate));
    const total = jobs.length;
    let processed = 0;

    const report = (job: EntityJob): void => {
      processed += 1;
      try {
        options.onProgress?.({
          processed,
          total,
          index: job.index,
          entity: job.entityName,
          state: job.state,
          error: job.error,
        });
      } catch (error) {
        this.logger.error(
          `Progress callback failed for row ${job.index + 1}: ${errorMessage(error)}`,
        );
      }
    };

    if (total === 1) {
      const [job] = jobs;
      if (options.signal?.aborted) {
        failJob(job, CANCELLED_ERROR);
      } else {
        await this.processJob(job);
      }
      report(job);
      return [toRecord(job)];
    }

    const batchCount = Math.ceil(total / this.batchSize);
    for (let start = 0; start < total; start += this.batchSize) {
      if (options.signal?.aborted) {
        const remaining = jobs.slice(start);
        this.logger.warn(`Run cancelled; ${remaining.length} entities not processed`);
        for (const job of remaining) {
          failJob(job, CANCELLED_ERROR);
          report(job);
        }
        break;
      }

      const batch = jobs.slice(start, start + this.batchSize);
      const batchNumber = start / this.batchSize + 1;
      this.logger.info(`Processing batch ${batchNumber}/${batchCount} (${batch.length} entities)`);

      await Promise.all(
        batch.map(async (job) => {
          await this.processJob(job);
          report(job);
        }),
      );

      if (batchNumber === batchCount) break;

      if (batch.some((job) => job.state === 'FAILED')) {
        this.logger.warn(`Batch ${batchNumber} had failures; pausing ${this.failurePauseMs} ms`);
        await this.sleep(this.failurePauseMs);
      }
      await this.sleep(this.batchPauseMs);
    }

    const failed = jobs.filter((job) => job.state === 'FAILED').length;
    this.logger.info(`Finished ${total} entities (${total - failed} done, ${failed} failed)`);
    return jobs.map(toRecord);
  }

  /** Drive one job to a terminal state. Never rejects. */
  private async processJob(job: EntityJob): Promise<void> {
    if (!job.entityName.trim()) {
      failJob(job, EMPTY_ENTITY_ERROR);
      this.logger.warn(`Skipping row ${job.index + 1}: ${EMPTY_ENTITY_ERROR}`);
      return;
    }

    const context = { jobIndex: job.index, entityName: job.entityName };
    try {
      transition(job, 'SEARCHING');
      const results = await this.searcher.search(job.query, this.maxResults);

      transition(job, 'EXTRACTING');
      const draft = await this.extractor.extract(results, job.entityName, context);

      transition(job, 'VERIFYING');
      const verified = await this.verifier.verify(draft, context);

      completeJob(job, verified);
      this.logger.debug(`Resolved "${job.entityName}"`, { index: job.index });
    } catch (error) {
      const stage = job.state;
      failJob(job, errorMessage(error) || 'Unknown error');
      this.logger.error(
        `Failed to process "${job.entityName}" (row ${job.index + 1}) while ${stage}: ${job.error}`,
      );
    }
  }
}
