/**
 * Resolve every entity in a CSV column into a profile and write the results.
 *
 * Run: npm run resolve -- --input companies.csv --column Company [--template 2]
 */
import './load-env.js';

import {
  ConfigError,
  CsvFileSink,
  InputError,
  describeError,
  formatUserMessage,
  loadConfig,
  readEntityCsvFile,
  setLogLevel,
} from '@profilescout/core';
import { createResolutionPipeline } from '@profilescout/agents';
import { isFailedRecord } from '@profilescout/schemas';
import { USAGE, parseCliArgs } from './cli-args.js';

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const entities = await readEntityCsvFile(options.input, options.column);
  if (entities.every((entity) => entity === '')) {
    throw new InputError(`Column "${options.column}" in ${options.input} has no entity names`);
  }

  const { orchestrator } = createResolutionPipeline({
    ...config,
    search: { ...config.search, maxResults: options.maxResults ?? config.search.maxResults },
    batch: { ...config.batch, batchSize: options.batchSize ?? config.batch.batchSize },
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('Cancelling after the current batch...');
    controller.abort();
  });

  console.log(`Resolving ${entities.length} entities with query "${options.queryTemplate}"`);
  const records = await orchestrator.run(entities, options.queryTemplate, {
    signal: controller.signal,
    onProgress: (p) => {
      const suffix = p.error ? ` (${p.error})` : '';
      console.log(`[${p.processed}/${p.total}] ${p.entity}: ${p.state}${suffix}`);
    },
  });

  await new CsvFileSink(options.output).write(records);

  const failed = records.filter(isFailedRecord).length;
  console.log(`Done. DONE: ${records.length - failed}, FAILED: ${failed}`);
  console.log(`Results written to ${options.output}`);
}

main().catch((err: unknown) => {
  const detail = describeError(err, { script: 'resolve-entities' });
  console.error(formatUserMessage(detail));
  if (err instanceof InputError) console.error(`\n${USAGE}`);
  else if (!(err instanceof ConfigError)) console.error(`${detail.errorType}: ${detail.message}`);
  process.exit(1);
});
