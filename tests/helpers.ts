import { AIService } from '../src/services/ai';
import { DBService, openDatabase } from '../src/services/db';
import { ArticleDraft, NewsItem, StockRecord } from '../src/types';

type FetchInput = Parameters<typeof fetch>[0];
export type FetchInit = Parameters<typeof fetch>[1];

export function urlOf(input: FetchInput): string {
    if (typeof input === 'string') return input;
    if (input instanceof URL) return input.href;
    return input.url;
}

export function fakeFetch(handler: (url: string, init?: FetchInit) => Response | Promise<Response>): typeof fetch {
    return async (input, init) => handler(urlOf(input), init);
}

/** A response that never arrives; rejects only when the request is aborted. */
export function hangUntilAborted(init?: FetchInit): Promise<Response> {
    return new Promise((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

export function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

export function createTestDb(): DBService {
    return new DBService(openDatabase(':memory:'));
}

export function makeStock(symbol: string, pct: number, overrides: Partial<StockRecord> = {}): StockRecord {
    return {
        symbol,
        name: `${symbol} Inc.`,
        date: '2026-03-02',
        price: 100,
        price_change: pct,
        price_change_pct: pct,
        volume: 1_000_000,
        previous_close: 100 - pct,
        ...overrides,
    };
}

export function makeNews(symbol: string, headline: string, overrides: Partial<NewsItem> = {}): NewsItem {
    return {
        symbol,
        date: '2026-03-02',
        headline,
        url: `https://example.com/${symbol.toLowerCase()}`,
        source: 'Example Wire',
        summary: null,
        published_at: '2026-03-02T15:00:00.000Z',
        ...overrides,
    };
}

export function makeDraft(stock: StockRecord, movementType: 'winner' | 'loser', title: string = `${stock.symbol} ${movementType}`): ArticleDraft {
    return {
        stock_symbol: stock.symbol,
        date: stock.date,
        title,
        content: `Body for ${stock.symbol}`,
        movement_type: movementType,
        slug: `${stock.symbol}-${movementType}-${stock.date}`,
        generation: 'templated',
    };
}

export function unconfiguredAI(): AIService {
    return new AIService({
        AI_API_KEY: undefined,
        AI_BASE_URL: 'https://ai.example.test/v1',
        AI_MODEL: 'test-model',
        AI_TIMEOUT_MS: 1000,
    });
}

export function configuredAI(fetchFn: typeof fetch): AIService {
    return new AIService({
        AI_API_KEY: 'test-secret',
        AI_BASE_URL: 'https://ai.example.test/v1/',
        AI_MODEL: 'test-model',
        AI_TIMEOUT_MS: 1000,
    }, fetchFn);
}

/** A promise plus the function that settles it, for holding a run mid-stage. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
}
