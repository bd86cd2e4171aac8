import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger';
import { createError } from '../utils/errorUtils';

export const DEFAULT_DATE_FORMATS = ['yyyy-MM-dd', 'MM/dd/yyyy', 'dd MMM yyyy'];

// Formats carrying an X token are zone-aware, the rest are read as UTC
export const DEFAULT_TIMESTAMP_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ssX",
  "yyyy-MM-dd'T'HH:mm:ssXXX",
  "yyyy-MM-dd'T'HH:mm:ss.SSSX",
  "yyyy-MM-dd'T'HH:mm:ss.SSSXXX",
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'MM/dd/yyyy',
  'dd-MMM-yyyy',
  'yyyy-MM-dd'
];

// Keys are matched after trimming and lower-casing the raw value
export const DEFAULT_CURRENCY_MAP: Record<string, string> = {
  '€': 'EUR',
  eur: 'EUR',
  euro: 'EUR',
  euros: 'EUR',
  '$': 'USD',
  usd: 'USD',
  'us$': 'USD',
  '£': 'GBP',
  gbp: 'GBP'
};

export const DEFAULT_SPORTS_CATEGORIES = ['match_tickets', 'sports_merchandise', 'sports_bar'];

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd');

export const pipelineConfigSchema = z.object({
  dataDir: z.string().min(1).default('data'),
  outputDir: z.string().min(1).default('output'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  files: z.object({
    customers: z.string().min(1).default('customers.csv'),
    transactions: z.string().min(1).default('transactions.csv'),
    sentiment: z.string().min(1).default('sentiment.json')
  }).default({}),
  nullRateWarning: z.number().min(0).max(1).default(0.3),
  dateFormats: z.array(z.string().min(1)).min(1).default(DEFAULT_DATE_FORMATS),
  timestampFormats: z.array(z.string().min(1)).min(1).default(DEFAULT_TIMESTAMP_FORMATS),
  currencyMap: z.record(z.string(), z.string().regex(/^[A-Z]{3}$/)).default(DEFAULT_CURRENCY_MAP),
  baseCurrency: z.string().regex(/^[A-Z]{3}$/).default('EUR'),
  amountRange: z.object({
    min: z.number().default(-1000),
    max: z.number().default(50000)
  }).default({}),
  dateRange: z.object({
    min: isoDate.default('2020-01-01'),
    max: isoDate.default('2026-12-31')
  }).default({}),
  minRows: z.object({
    dim_customers: z.number().int().nonnegative().default(190),
    fact_transactions: z.number().int().nonnegative().default(2400),
    fact_sentiment: z.number().int().nonnegative().default(0)
  }).default({}),
  sportsCategories: z.array(z.string().min(1)).default(DEFAULT_SPORTS_CATEGORIES),
  matchTicketCategory: z.string().min(1).default('match_tickets'),
  snapshotRetention: z.number().int().min(1).default(3)
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the immutable run configuration.
 * Precedence: explicit overrides, then FANPULSE_* environment variables, then defaults.
 */
export function loadPipelineConfig(
  overrides: PipelineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const fromEnv: PipelineConfigInput = {};
  if (env.FANPULSE_DATA_DIR) fromEnv.dataDir = env.FANPULSE_DATA_DIR;
  if (env.FANPULSE_OUTPUT_DIR) fromEnv.outputDir = env.FANPULSE_OUTPUT_DIR;

  const parsed = pipelineConfigSchema.safeParse({
    ...fromEnv,
    logLevel: env.FANPULSE_LOG_LEVEL || undefined,
    ...overrides
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw createError(`Invalid pipeline configuration: ${details}`, parsed.error);
  }

  return deepFreeze(parsed.data);
}

export { buildSourceLayouts } from './sources';
export { buildTableContracts } from './contracts';
export type { ContractTable } from './contracts';
