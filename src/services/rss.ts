import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { DateWindow, Headline } from '../types';
import { NewsProvider } from './news';

const YAHOO_HEADLINE_FEED = 'https://feeds.finance.yahoo.com/rss/2.0/headline';

const RssItemSchema = z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    description: z.string().optional(),
    pubDate: z.string().optional(),
    source: z.union([z.string(), z.object({ '#text': z.string().optional() })]).optional(),
});

const RssFeedSchema = z.object({
    rss: z.object({
        channel: z.object({
            item: z.union([z.array(RssItemSchema), RssItemSchema]).optional(),
        }),
    }),
});

type RssItem = z.infer<typeof RssItemSchema>;

/**
 * Per-symbol headline feed from Yahoo Finance. Needs no key, so it is the
 * primary provider.
 */
export class RSSService implements NewsProvider {
    readonly name = 'Yahoo Finance RSS';
    private parser: XMLParser;
    private fetchFn: typeof fetch;
    private timeoutMs: number;

    constructor(fetchFn: typeof fetch = fetch, timeoutMs: number = 10_000) {
        this.fetchFn = fetchFn;
        this.timeoutMs = timeoutMs;
        // Keep tag values as strings: a headline like "3M" must not become a number
        this.parser = new XMLParser({
            ignoreAttributes: false,
            attributeNamePrefix: '@_',
            parseTagValue: false,
        });
    }

    /**
     * Normalize an RSS date (RFC 2822 or ISO 8601) to an ISO UTC string,
     * or null when it cannot be parsed.
     */
    private normalizeToUTC(dateStr: string): string | null {
        const date = new Date(dateStr);
        if (isNaN(date.getTime())) {
            console.warn(`[News] Invalid RSS date: "${dateStr}"`);
            return null;
        }
        return date.toISOString();
    }

    async fetchHeadlines(symbol: string, _company: string, window: DateWindow): Promise<Headline[]> {
        const url = `${YAHOO_HEADLINE_FEED}?s=${encodeURIComponent(symbol)}&region=US&lang=en-US`;
        const response = await this.fetchFn(url, {
            headers: {
                'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36'
            },
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            throw new Error(`Failed to fetch RSS: ${response.status} ${response.statusText}`);
        }

        const feed = RssFeedSchema.parse(this.parser.parse(await response.text()));
        const items = feed.rss.channel.item ?? [];
        const itemArray = Array.isArray(items) ? items : [items];

        const headlines: Headline[] = [];
        for (const item of itemArray) {
            const headline = this.toHeadline(item);
            if (!headline) continue;

            // Undated items are kept; dated ones must fall inside the window
            const day = headline.published_at?.split('T')[0];
            if (day && (day < window.from || day > window.to)) continue;

            headlines.push(headline);
        }

        return headlines;
    }

    private toHeadline(item: RssItem): Headline | null {
        const title = item.title?.trim();
        if (!title) return null;

        let source = 'Yahoo Finance';
        if (typeof item.source === 'string' && item.source.trim()) {
            source = item.source.trim();
        } else if (typeof item.source === 'object' && item.source['#text']) {
            source = item.source['#text'].trim();
        }

        return {
            headline: title,
            url: item.link?.trim() || null,
            source,
            summary: item.description?.trim() || null,
            published_at: item.pubDate ? this.normalizeToUTC(item.pubDate) : null,
        };
    }
}
