import type { EntityJob, EntityJobState, EntityRecord, Profile } from '@profilescout/schemas';
import { fillQueryTemplate } from './query-templates.js';

const ALLOWED_TRANSITIONS: Record<EntityJobState, readonly EntityJobState[]> = {
  PENDING: ['SEARCHING', 'FAILED'],
  SEARCHING: ['EXTRACTING', 'FAILED'],
  EXTRACTING: ['VERIFYING', 'FAILED'],
  VERIFYING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export class JobStateError extends Error {
  constructor(
    readonly from: EntityJobState,
    readonly to: EntityJobState,
  ) {
    super(`Illegal job transition ${from} -> ${to}`);
    this.name = 'JobStateError';
  }
}

export function createEntityJob(index: number, entityName: string, queryTemplate: string): EntityJob {
  return {
    index,
    entityName,
    query: fillQueryTemplate(queryTemplate, entityName),
    state: 'PENDING',
  };
}

export function canTransition(from: EntityJobState, to: EntityJobState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function transition(job: EntityJob, to: EntityJobState): void {
  if (!canTransition(job.state, to)) throw new JobStateError(job.state, to);
  job.state = to;
}

export function completeJob(job: EntityJob, profile: Profile): void {
  transition(job, 'DONE');
  job.profile = profile;
}

export function failJob(job: EntityJob, error: string): void {
  transition(job, 'FAILED');
  job.error = error;
}

/** Output row for a finished job. */
export function toRecord(job: EntityJob): EntityRecord {
  if (job.state === 'DONE' && job.profile) {
    return { Entity: job.entityName, ...job.profile };
  }
  if (job.state === 'FAILED') {
    return { Entity: job.entityName, error: job.error ?? 'Unknown error' };
  }
  throw new Error(`Job ${job.index} ("${job.entityName}") has not finished: ${job.state}`);
}
