import { z } from 'zod';
import { DateWindow, Headline } from '../types';
import { NewsProvider } from './news';

const NEWS_API_URL = 'https://newsapi.org/v2/everything';

const NewsApiResponseSchema = z.object({
    status: z.string(),
    articles: z.array(z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        description: z.string().nullish(),
        publishedAt: z.string().nullish(),
        source: z.object({ name: z.string().nullish() }).nullish(),
    })).default([]),
});

/** NewsAPI.org search, used as the secondary provider when a key is configured. */
export class NewsApiService implements NewsProvider {
    readonly name = 'NewsAPI';
    private apiKey: string;
    private fetchFn: typeof fetch;
    private timeoutMs: number;

    constructor(apiKey: string, fetchFn: typeof fetch = fetch, timeoutMs: number = 10_000) {
        this.apiKey = apiKey;
        this.fetchFn = fetchFn;
        this.timeoutMs = timeoutMs;
    }

    async fetchHeadlines(symbol: string, company: string, window: DateWindow): Promise<Headline[]> {
        const params = new URLSearchParams({
            q: company && company !== symbol ? `"${company}" OR ${symbol}` : symbol,
            from: window.from,
            to: window.to,
            language: 'en',
            sortBy: 'relevancy',
            pageSize: '5',
        });

        const response = await this.fetchFn(`${NEWS_API_URL}?${params.toString()}`, {
            headers: { 'X-Api-Key': this.apiKey },
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            const body = await response.text();
            throw new Error(`NewsAPI error: ${response.status} - ${body.substring(0, 200)}`);
        }

        const data = NewsApiResponseSchema.parse(await response.json());
        if (data.status !== 'ok') {
            throw new Error(`NewsAPI returned status "${data.status}"`);
        }

        return data.articles.map(a => ({
            headline: a.title?.trim() ?? '',
            url: a.url || null,
            source: a.source?.name || 'Unknown',
            summary: a.description || null,
            published_at: a.publishedAt || null,
        }));
    }
}
