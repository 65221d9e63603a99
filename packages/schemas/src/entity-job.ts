import { z } from 'zod';
import { entityJobStateEnum } from './enums.js';
import { profileSchema, type Profile } from './profile.js';

export const entityJobSchema = z.object({
  /** Row position in the input; the job's identity. */
  index: z.number().int().nonnegative(),
  entityName: z.string(),
  query: z.string(),
  state: entityJobStateEnum,
  error: z.string().optional(),
  profile: profileSchema.optional(),
});

export type EntityJob = z.infer<typeof entityJobSchema>;

export type ProfileRecord = { Entity: string } & Profile;

export interface FailedRecord {
  Entity: string;
  error: string;
}

/** One output row per input entity. */
export type EntityRecord = ProfileRecord | FailedRecord;

export function isFailedRecord(record: EntityRecord): record is FailedRecord {
  return 'error' in record;
}

export const RECORD_COLUMNS = [
  'Entity',
  'email',
  'location',
  'website',
  'phone',
  'description',
  'social_media',
  'additional_info',
  'confidence_scores',
  'error',
] as const;
export type RecordColumn = (typeof RECORD_COLUMNS)[number];
