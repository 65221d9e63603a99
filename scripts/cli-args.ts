/**
 * Argument handling for scripts/resolve-entities.ts.
 */
import path from 'node:path';
import { parseArgs } from 'node:util';
import { InputError, errorMessage } from '@profilescout/core';
import { ENTITY_PLACEHOLDER, QUERY_TEMPLATES } from '@profilescout/agents';

export interface ResolveCliOptions {
  input: string;
  column: string;
  queryTemplate: string;
  output: string;
  batchSize?: number;
  maxResults?: number;
}

export const USAGE = `Usage: npx tsx scripts/resolve-entities.ts --input <csv> --column <name> [options]

Options:
  -i, --input <csv>        CSV file with one entity per row
  -c, --column <name>      Column holding the entity names
  -q, --query <template>   Search query; {entity} is replaced by each name
  -t, --template <1-${QUERY_TEMPLATES.length}>   Built-in query template (default 1)
  -o, --output <csv>       Results file (default <input>-profiles.csv)
      --batch-size <n>     Entities processed concurrently
      --max-results <n>    Search results per entity

Templates:
${QUERY_TEMPLATES.map((t, i) => `  ${i + 1}. ${t}`).join('\n')}`;

function positiveInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new InputError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function resolveTemplate(query: string | undefined, template: string | undefined): string {
  if (query !== undefined && template !== undefined) {
    throw new InputError('Use either --query or --template, not both');
  }
  if (query !== undefined) {
    if (!query.includes(ENTITY_PLACEHOLDER)) {
      throw new InputError(`--query must contain the ${ENTITY_PLACEHOLDER} placeholder`);
    }
    return query;
  }
  const choice = positiveInt('template', template) ?? 1;
  const selected = QUERY_TEMPLATES[choice - 1];
  if (selected === undefined) {
    throw new InputError(`--template must be between 1 and ${QUERY_TEMPLATES.length}`);
  }
  return selected;
}

export function defaultOutputPath(input: string): string {
  const base = path.basename(input, path.extname(input));
  return path.join(path.dirname(input), `${base}-profiles.csv`);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      strict: true,
      options: {
        input: { type: 'string', short: 'i' },
        column: { type: 'string', short: 'c' },
        query: { type: 'string', short: 'q' },
        template: { type: 'string', short: 't' },
        output: { type: 'string', short: 'o' },
        'batch-size': { type: 'string' },
        'max-results': { type: 'string' },
      },
    }).values;
  } catch (error) {
    throw new InputError(errorMessage(error));
  }
}

export function parseCliArgs(argv: string[]): ResolveCliOptions {
  const values = readArgs(argv);

  const input = values.input?.trim();
  const column = values.column?.trim();
  if (!input) throw new InputError('--input is required');
  if (!column) throw new InputError('--column is required');

  return {
    input,
    column,
    queryTemplate: resolveTemplate(values.query, values.template),
    output: values.output?.trim() || defaultOutputPath(input),
    batchSize: positiveInt('batch-size', values['batch-size']),
    maxResults: positiveInt('max-results', values['max-results']),
  };
}
