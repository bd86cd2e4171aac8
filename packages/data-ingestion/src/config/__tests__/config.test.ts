/**
 * Pipeline configuration Tests
 */

import { describe, it, expect } from '@jest/globals';
import { buildSourceLayouts, buildTableContracts, loadPipelineConfig } from '..';

describe('loadPipelineConfig', () => {
  it('applies defaults', () => {
    const config = loadPipelineConfig({}, {});

    expect(config.dataDir).toBe('data');
    expect(config.outputDir).toBe('output');
    expect(config.logLevel).toBe('info');
    expect(config.files).toEqual({ customers: 'customers.csv', transactions: 'transactions.csv', sentiment: 'sentiment.json' });
    expect(config.nullRateWarning).toBe(0.3);
    expect(config.amountRange).toEqual({ min: -1000, max: 50000 });
    expect(config.dateRange).toEqual({ min: '2020-01-01', max: '2026-12-31' });
    expect(config.minRows).toEqual({ dim_customers: 190, fact_transactions: 2400, fact_sentiment: 0 });
    expect(config.baseCurrency).toBe('EUR');
    expect(config.snapshotRetention).toBe(3);
  });

  it('reads the environment and lets overrides win', () => {
    const env = { FANPULSE_DATA_DIR: '/srv/in', FANPULSE_OUTPUT_DIR: '/srv/out', FANPULSE_LOG_LEVEL: 'debug' };

    const fromEnv = loadPipelineConfig({}, env);
    expect(fromEnv.dataDir).toBe('/srv/in');
    expect(fromEnv.outputDir).toBe('/srv/out');
    expect(fromEnv.logLevel).toBe('debug');

    const overridden = loadPipelineConfig({ dataDir: 'fixtures', logLevel: 'warn' }, env);
    expect(overridden.dataDir).toBe('fixtures');
    expect(overridden.outputDir).toBe('/srv/out');
    expect(overridden.logLevel).toBe('warn');
  });

  it('fills nested defaults around partial overrides', () => {
    const config = loadPipelineConfig({ minRows: { dim_customers: 5 }, files: { sentiment: 'posts.jsonl' } }, {});

    expect(config.minRows).toEqual({ dim_customers: 5, fact_transactions: 2400, fact_sentiment: 0 });
    expect(config.files.sentiment).toBe('posts.jsonl');
    expect(config.files.customers).toBe('customers.csv');
  });

  it('rejects invalid values with every problem listed', () => {
    expect(() => loadPipelineConfig({ nullRateWarning: 2, baseCurrency: 'euro' }, {})).toThrow(
      'Invalid pipeline configuration: nullRateWarning: Number must be less than or equal to 1; baseCurrency: Invalid'
    );
  });

  it('rejects an unknown log level from the environment', () => {
    expect(() => loadPipelineConfig({}, { FANPULSE_LOG_LEVEL: 'loud' })).toThrow(/^Invalid pipeline configuration: logLevel: /);
  });

  it('returns a frozen value', () => {
    const config = loadPipelineConfig({}, {});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.minRows)).toBe(true);
    expect(Object.isFrozen(config.sportsCategories)).toBe(true);
  });
});

describe('layouts and contracts', () => {
  const config = loadPipelineConfig({ amountRange: { max: 900 } }, {});

  it('carries configured bounds into layouts', () => {
    const amount = buildSourceLayouts(config).transactions.columns.find(column => column.name === 'amount');
    expect(amount?.range).toEqual({ min: -1000, max: 900 });
  });

  it('declares keys and minimum rows per table', () => {
    const contracts = buildTableContracts(config);
    expect(contracts.dim_customers.primaryKey).toBe('customer_id');
    expect(contracts.fact_transactions.foreignKey).toEqual({ column: 'customer_id', references: 'dim_customers' });
    expect(contracts.fact_transactions.minRows).toBe(2400);
    expect(contracts.fact_sentiment.primaryKey).toBe('post_id');
  });
});
