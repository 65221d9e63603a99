import { z } from 'zod';

export const entityJobStateEnum = z.enum([
  'PENDING',
  'SEARCHING',
  'EXTRACTING',
  'VERIFYING',
  'DONE',
  'FAILED',
]);
export type EntityJobState = z.infer<typeof entityJobStateEnum>;

export const profileTextFieldEnum = z.enum(['email', 'location', 'website', 'phone', 'description']);
export type ProfileTextField = z.infer<typeof profileTextFieldEnum>;

/** Fields a confidence score may be attached to. */
export const scoredFieldEnum = z.enum([
  'email',
  'location',
  'website',
  'phone',
  'description',
  'social_media',
  'additional_info',
]);
export type ScoredField = z.infer<typeof scoredFieldEnum>;
