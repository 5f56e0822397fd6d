import { loadConfig, loadUniverse } from '../src/config';

describe('loadConfig', () => {
    it('fills in defaults', () => {
        expect(loadConfig({})).toEqual({
            PORT: 8787,
            DATABASE_PATH: 'movers.db',
            AI_API_KEY: undefined,
            AI_BASE_URL: 'https://api.openai.com/v1',
            AI_MODEL: 'gpt-4o-mini',
            AI_TIMEOUT_MS: 30000,
            UPSTREAM_TIMEOUT_MS: 10000,
            NEWS_API_KEY: undefined,
            SCHEDULER_ENABLED: true,
            SCHEDULE_CRON: '30 16 * * 1-5',
            SCHEDULE_TIMEZONE: 'America/New_York',
            TOP_N: 5,
            SYMBOLS: undefined,
        });
    });

    it('coerces numbers and flags from strings', () => {
        const env = loadConfig({ PORT: '3000', TOP_N: '10', SCHEDULER_ENABLED: 'false', AI_API_KEY: '  test-secret ' });

        expect(env.PORT).toBe(3000);
        expect(env.TOP_N).toBe(10);
        expect(env.SCHEDULER_ENABLED).toBe(false);
        expect(env.AI_API_KEY).toBe('test-secret');
    });

    it('treats a blank key as unset', () => {
        expect(loadConfig({ NEWS_API_KEY: '   ' }).NEWS_API_KEY).toBeUndefined();
    });

    it('rejects out-of-range values', () => {
        expect(() => loadConfig({ TOP_N: '0' })).toThrow(/^Invalid configuration: TOP_N: /);
        expect(() => loadConfig({ SCHEDULER_ENABLED: 'maybe' })).toThrow(/SCHEDULER_ENABLED/);
        expect(() => loadConfig({ UPSTREAM_TIMEOUT_MS: '-5' })).toThrow(/UPSTREAM_TIMEOUT_MS/);
    });

    it('rejects an unknown time zone', () => {
        expect(() => loadConfig({ SCHEDULE_TIMEZONE: 'Mars/Olympus' })).toThrow(
            'Invalid configuration: SCHEDULE_TIMEZONE: Invalid time zone'
        );
        expect(loadConfig({ SCHEDULE_TIMEZONE: 'Europe/London' }).SCHEDULE_TIMEZONE).toBe('Europe/London');
    });
});

describe('loadUniverse', () => {
    it('reads SYMBOLS when set', () => {
        expect(loadUniverse({ SYMBOLS: ' aapl, MSFT,,aapl ' })).toEqual(['AAPL', 'MSFT']);
    });

    it('falls back to the bundled index constituents', () => {
        const symbols = loadUniverse({ SYMBOLS: undefined });

        expect(symbols).toHaveLength(49);
        expect(symbols).toContain('AAPL');
        expect(symbols).toContain('BRK-B');
    });
});
