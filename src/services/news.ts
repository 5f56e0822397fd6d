import { DateWindow, Headline, NewsItem } from '../types';

export interface NewsProvider {
    readonly name: string;
    fetchHeadlines(symbol: string, company: string, window: DateWindow): Promise<Headline[]>;
}

export interface NewsQuery {
    symbol: string;
    company?: string;
    /** Trading date the news is filed under (YYYY-MM-DD). */
    date: string;
    window?: DateWindow;
}

const MAX_ITEMS_PER_SYMBOL = 10;

export function dedupeKey(item: Pick<Headline, 'headline' | 'source'>): string {
    const norm = (s: string | null) => (s ?? '').trim().replace(/\s+/g, ' ').toLowerCase();
    return `${norm(item.headline)}|${norm(item.source)}`;
}

/** First occurrence wins; items without a headline are dropped. */
export function dedupeHeadlines<T extends Headline>(items: readonly T[]): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];
    for (const item of items) {
        if (!item.headline.trim()) continue;
        const key = dedupeKey(item);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(item);
    }
    return unique;
}

/** The two days up to and including `date`. */
export function defaultWindow(date: string): DateWindow {
    const d = new Date(`${date}T00:00:00Z`);
    d.setUTCDate(d.getUTCDate() - 2);
    return { from: d.toISOString().split('T')[0], to: date };
}

/**
 * Queries each provider in order and merges their headlines. A failing
 * provider is skipped, so the result is an empty list at worst.
 */
export class NewsService {
    private providers: NewsProvider[];

    constructor(providers: NewsProvider[]) {
        this.providers = providers;
    }

    async fetchNews(query: NewsQuery): Promise<NewsItem[]> {
        const { symbol, date } = query;
        const company = query.company || symbol;
        const window = query.window ?? defaultWindow(date);

        const all: Headline[] = [];
        for (const provider of this.providers) {
            try {
                const items = await provider.fetchHeadlines(symbol, company, window);
                console.log(`[News] ${provider.name}: ${items.length} items for ${symbol}`);
                all.push(...items);
            } catch (error) {
                console.error(`[News] ${provider.name} failed for ${symbol}:`, error);
            }
        }

        return dedupeHeadlines(all)
            .slice(0, MAX_ITEMS_PER_SYMBOL)
            .map(h => ({ ...h, symbol, date }));
    }
}
