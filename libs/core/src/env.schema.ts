import { z } from 'zod';
import { booleanFromEnv, csvFromEnv, numberFromEnv } from './env.utils';

const toInt = (def: number) =>
  z.preprocess((v) => numberFromEnv(v) ?? def, z.number().int());

const toFloat = (def: number) =>
  z.preprocess((v) => numberFromEnv(v) ?? def, z.number());

const toBool = (def: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    return booleanFromEnv(v);
  }, z.boolean());

const csv = (def: string[] = []) =>
  z.preprocess((v) => csvFromEnv(v) ?? def, z.array(z.string()));

/** Venue-B market codes tried per pair, each a sequential request. */
export const VENUE_B_LOOKUPS_PER_PAIR = 6;

const envObject = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
    APP_NAME: z.string().trim().default('venue-spread-monitor'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    PORT: toInt(10000).pipe(z.number().int().min(1).max(65535)),

    TELEGRAM_BOT_TOKEN: z.string().trim().optional().default(''),
    TELEGRAM_CHAT_ID: z.string().trim().optional().default(''),
    TELEGRAM_DISABLE_WEB_PAGE_PREVIEW: toBool(true),
    STARTUP_NOTIFICATION_ENABLED: toBool(true),

    PAIRS_FILE: z.string().trim().min(1).default('pairs.json'),
    DEFAULT_PAIRS: csv(['BTC/USDT', 'ETH/USDT']),

    SPREAD_THRESHOLD: toFloat(1.0).pipe(z.number().min(0).max(100)),
    POLL_INTERVAL_SECONDS: toInt(5).pipe(z.number().int().min(1).max(3600)),
    MONITOR_CONCURRENCY: toInt(10).pipe(z.number().int().min(1).max(200)),
    PAIR_TIMEOUT_MS: toInt(60_000).pipe(z.number().int().min(1000).max(600_000)),

    AUTO_DISCOVERY_ENABLED: toBool(true),
    AUTO_DISCOVERY_QUOTE: z.string().trim().toUpperCase().default('USDT'),
    AUTO_DISCOVERY_MAX_PAIRS: toInt(50).pipe(z.number().int().min(1).max(1000)),

    VENUE_A_NAME: z.string().trim().default('MEXC'),
    VENUE_B_NAME: z.string().trim().default('Quanto'),
    MEXC_CONTRACT_REST_URL: z.string().trim().url().default('https://contract.mexc.com'),
    VENUE_A_TIMEOUT_MS: toInt(10_000).pipe(z.number().int().min(500).max(120_000)),
    QUANTO_REST_URL: z.string().trim().url().default('https://api.quanto.trade'),
    VENUE_B_TIMEOUT_MS: toInt(8000).pipe(z.number().int().min(500).max(120_000)),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  if (env.TELEGRAM_BOT_TOKEN && !env.TELEGRAM_CHAT_ID) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TELEGRAM_CHAT_ID'],
      message: 'TELEGRAM_CHAT_ID is required when TELEGRAM_BOT_TOKEN is set',
    });
  }

  const timeoutBudget = env.VENUE_A_TIMEOUT_MS + VENUE_B_LOOKUPS_PER_PAIR * env.VENUE_B_TIMEOUT_MS;
  if (env.PAIR_TIMEOUT_MS < timeoutBudget) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['PAIR_TIMEOUT_MS'],
      message: `PAIR_TIMEOUT_MS must be at least VENUE_A_TIMEOUT_MS + ${VENUE_B_LOOKUPS_PER_PAIR} × VENUE_B_TIMEOUT_MS (${timeoutBudget})`,
    });
  }
});

export type Env = z.infer<typeof envSchemaWithRefinements>;
