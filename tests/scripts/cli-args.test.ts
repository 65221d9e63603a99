import { describe, it, expect } from 'vitest';
import { InputError } from '@profilescout/core';
import { QUERY_TEMPLATES } from '@profilescout/agents';
import { defaultOutputPath, parseCliArgs } from '../../scripts/cli-args.js';

describe('parseCliArgs', () => {
  it('defaults to the first template and an output beside the input', () => {
    expect(parseCliArgs(['--input', 'data/companies.csv', '--column', 'Company'])).toEqual({
      input: 'data/companies.csv',
      column: 'Company',
      queryTemplate: QUERY_TEMPLATES[0],
      output: 'data/companies-profiles.csv',
      batchSize: undefined,
      maxResults: undefined,
    });
  });

  it('accepts short flags, a template number and numeric limits', () => {
    expect(
      parseCliArgs([
        '-i', 'companies.csv',
        '-c', 'Name',
        '-t', '2',
        '-o', 'out.csv',
        '--batch-size', '4',
        '--max-results', '3',
      ]),
    ).toEqual({
      input: 'companies.csv',
      column: 'Name',
      queryTemplate: 'Get company information for {entity}',
      output: 'out.csv',
      batchSize: 4,
      maxResults: 3,
    });
  });

  it('takes a custom query containing the placeholder', () => {
    const options = parseCliArgs(['-i', 'a.csv', '-c', 'Name', '-q', '{entity} headquarters address']);
    expect(options.queryTemplate).toBe('{entity} headquarters address');
  });

  it('rejects a custom query without the placeholder', () => {
    expect(() => parseCliArgs(['-i', 'a.csv', '-c', 'Name', '-q', 'headquarters'])).toThrow(
      '--query must contain the {entity} placeholder',
    );
  });

  it('rejects --query together with --template', () => {
    expect(() =>
      parseCliArgs(['-i', 'a.csv', '-c', 'Name', '-q', '{entity}', '-t', '1']),
    ).toThrow('Use either --query or --template, not both');
  });

  it('rejects template numbers out of range', () => {
    expect(() => parseCliArgs(['-i', 'a.csv', '-c', 'Name', '-t', '5'])).toThrow(
      '--template must be between 1 and 4',
    );
    expect(() => parseCliArgs(['-i', 'a.csv', '-c', 'Name', '-t', 'two'])).toThrow(
      '--template must be a positive integer, got "two"',
    );
  });

  it('requires input and column', () => {
    expect(() => parseCliArgs(['--column', 'Name'])).toThrow('--input is required');
    expect(() => parseCliArgs(['--input', 'a.csv'])).toThrow('--column is required');
  });

  it('reports unknown flags and bad limits as input errors', () => {
    expect(() => parseCliArgs(['-i', 'a.csv', '-c', 'Name', '--verbose'])).toThrow(InputError);
    expect(() => parseCliArgs(['-i', 'a.csv', '-c', 'Name', '--batch-size', '0'])).toThrow(
      '--batch-size must be a positive integer, got "0"',
    );
  });
});

describe('defaultOutputPath', () => {
  it('swaps the extension for a -profiles.csv suffix', () => {
    expect(defaultOutputPath('companies.csv')).toBe('companies-profiles.csv');
    expect(defaultOutputPath('in/list.txt')).toBe('in/list-profiles.csv');
  });
});
