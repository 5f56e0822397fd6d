import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { MarketHolidayService } from './services/holidays';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(v => v === 'true' || v === '1' || v === 'yes');

const optionalSecret = z
    .string()
    .optional()
    .transform(v => (v && v.trim() ? v.trim() : undefined));

export const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8787),
    DATABASE_PATH: z.string().min(1).default('movers.db'),
    AI_API_KEY: optionalSecret,
    AI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    AI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    NEWS_API_KEY: optionalSecret,
    SCHEDULER_ENABLED: booleanFlag.default('true'),
    SCHEDULE_CRON: z.string().min(1).default('30 16 * * 1-5'),
    SCHEDULE_TIMEZONE: z.string().min(1)
        .refine(tz => MarketHolidayService.isValidTimeZone(tz), 'Invalid time zone')
        .default('America/New_York'),
    TOP_N: z.coerce.number().int().min(1).max(50).default(5),
    SYMBOLS: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): Env {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(i => `${i.path.join('.')}: ${i.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}

const UniverseSchema = z.object({
    index: z.string(),
    symbols: z.array(z.string().min(1)).min(1),
});

const UNIVERSE_PATH = path.join(__dirname, '..', 'data', 'universe.json');

/**
 * Symbols tracked by the daily run: SYMBOLS when set, otherwise the bundled
 * index constituents. Always upper-cased and de-duplicated.
 */
export function loadUniverse(env: Pick<Env, 'SYMBOLS'>, file: string = UNIVERSE_PATH): string[] {
    const raw = env.SYMBOLS
        ? env.SYMBOLS.split(',')
        : UniverseSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8'))).symbols;
    const symbols = raw.map(s => s.trim().toUpperCase()).filter(Boolean);
    return [...new Set(symbols)];
}
