import { z } from 'zod';
import { StockRecord } from '../types';

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';
const DAY_SECONDS = 24 * 60 * 60;
const DEFAULT_TIMEOUT_MS = 10_000;

const ChartResponseSchema = z.object({
    chart: z.object({
        result: z.array(z.object({
            meta: z.object({
                symbol: z.string().optional(),
                longName: z.string().optional(),
                shortName: z.string().optional(),
                chartPreviousClose: z.number().nullish(),
            }),
            timestamp: z.array(z.number()).optional(),
            indicators: z.object({
                quote: z.array(z.object({
                    close: z.array(z.number().nullable()).optional(),
                    volume: z.array(z.number().nullable()).optional(),
                })),
            }),
        })).nullable(),
    }),
});

type ChartResult = NonNullable<z.infer<typeof ChartResponseSchema>['chart']['result']>[number];

const round2 = (n: number) => Math.round(n * 100) / 100;

const toDateString = (unixSeconds: number) => new Date(unixSeconds * 1000).toISOString().split('T')[0];

export class MarketDataService {
    private fetchFn: typeof fetch;
    private timeoutMs: number;

    constructor(fetchFn: typeof fetch = fetch, timeoutMs: number = DEFAULT_TIMEOUT_MS) {
        this.fetchFn = fetchFn;
        this.timeoutMs = timeoutMs;
    }

    /**
     * Fetch the closing quote of each symbol, one request at a time.
     * Symbols that fail are logged and left out, so the result may be shorter
     * than the input.
     * @param date - trading date (YYYY-MM-DD); the latest close when omitted
     */
    async fetchQuotes(symbols: string[], date?: string): Promise<StockRecord[]> {
        console.log(`[MarketData] Fetching quotes for ${symbols.length} symbols${date ? ` on ${date}` : ''}...`);

        const items: StockRecord[] = [];

        for (const symbol of symbols) {
            try {
                const record = await this.fetchQuote(symbol, date);
                if (record) items.push(record);
            } catch (error) {
                console.error(`[MarketData] Error fetching quote for ${symbol}:`, error);
            }
        }

        console.log(`[MarketData] Fetched ${items.length}/${symbols.length} quotes.`);
        return items;
    }

    async fetchQuote(symbol: string, date?: string): Promise<StockRecord | null> {
        const response = await this.fetchFn(this.chartUrl(symbol, date), {
            headers: { 'User-Agent': USER_AGENT },
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            const body = await response.text();
            console.error(`[MarketData] Chart API error for ${symbol}: ${response.status} - ${body.substring(0, 200)}`);
            return null;
        }

        const parsed = ChartResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            console.warn(`[MarketData] Unexpected chart payload for ${symbol}`);
            return null;
        }

        const result = parsed.data.chart.result?.[0];
        if (!result) {
            console.warn(`[MarketData] No chart data for ${symbol}`);
            return null;
        }

        return this.toStockRecord(symbol, result, date);
    }

    private chartUrl(symbol: string, date?: string): string {
        const base = `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`;
        if (!date) return `${base}?range=5d&interval=1d`;

        // Ten days back covers long weekends plus a holiday
        const target = Math.floor(Date.parse(`${date}T00:00:00Z`) / 1000);
        const period1 = target - 10 * DAY_SECONDS;
        const period2 = target + DAY_SECONDS;
        return `${base}?period1=${period1}&period2=${period2}&interval=1d`;
    }

    /**
     * Take the last bar with a close (not after `date` when given) as the quote
     * and the close before it as the prior close.
     */
    private toStockRecord(symbol: string, result: ChartResult, date?: string): StockRecord | null {
        const timestamps = result.timestamp ?? [];
        const quote = result.indicators.quote[0];
        const closes = quote?.close ?? [];
        const volumes = quote?.volume ?? [];

        let lastIdx = timestamps.length - 1;
        while (lastIdx >= 0 && (closes[lastIdx] == null || (date && toDateString(timestamps[lastIdx]) > date))) {
            lastIdx--;
        }
        if (lastIdx < 0) {
            console.warn(`[MarketData] No usable bars for ${symbol}`);
            return null;
        }

        let prevIdx = lastIdx - 1;
        while (prevIdx >= 0 && closes[prevIdx] == null) prevIdx--;

        const closePrice = closes[lastIdx];
        const prevClose = prevIdx >= 0 ? closes[prevIdx] : result.meta.chartPreviousClose;
        if (closePrice == null || prevClose == null || prevClose === 0) {
            console.warn(`[MarketData] Insufficient data for ${symbol}`);
            return null;
        }

        const change = closePrice - prevClose;

        return {
            symbol,
            name: result.meta.longName || result.meta.shortName || symbol,
            date: toDateString(timestamps[lastIdx]),
            price: round2(closePrice),
            price_change: round2(change),
            price_change_pct: round2((change / prevClose) * 100),
            volume: volumes[lastIdx] ?? 0,
            previous_close: round2(prevClose),
        };
    }
}
