import { buildPrompt } from '@profilescout/llm';

export const ENTITY_PLACEHOLDER = '{entity}';

/** Built-in search prompts offered by the CLI (`--template 1-4`). */
export const QUERY_TEMPLATES = [
  'Find the email address and location of {entity}',
  'Get company information for {entity}',
  'Find social media profiles of {entity}',
  'Get contact details for {entity}',
] as const;

/** Replace every `{entity}` placeholder in `template`. */
export function fillQueryTemplate(template: string, entity: string): string {
  return buildPrompt(template, { entity });
}
