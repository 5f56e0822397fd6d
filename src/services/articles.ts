import { ConfigurationError } from '../errors';
import { ArticleDraft, MovementType, NewsItem, StockRecord } from '../types';
import { AIService } from './ai';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export type ArticleResult =
    | { kind: 'generated'; draft: ArticleDraft }
    | { kind: 'templated'; draft: ArticleDraft; reason: string };

export interface ArticleGeneratorOptions {
    /** News items embedded in the prompt and the template. */
    maxNewsItems?: number;
    maxSummaryLength?: number;
}

/**
 * URL slug such as `WhyDidGMEGoUp15PercentToday-Jan082026`. A stock ranked
 * against its direction (a riser listed among the losers when the universe
 * is smaller than twice the cutoff) gets a `-winner`/`-loser` suffix so the
 * two articles never share a slug.
 */
export function generateArticleSlug(symbol: string, pricePct: number, date: string, movementType: MovementType): string {
    const up = pricePct > 0;
    const direction = up ? 'GoUp' : 'GoDown';
    const absChange = Math.trunc(Math.abs(pricePct));
    const [y, m, d] = date.split('-');
    const dateStr = `${MONTHS[Number(m) - 1]}${d}${y}`;

    let slug = `WhyDid${symbol}${direction}${absChange}PercentToday-${dateStr}`;
    if (up !== (movementType === 'winner')) slug += `-${movementType}`;

    return slug.replace(/[^a-zA-Z0-9-]/g, '');
}

/**
 * Split a model reply into headline and body. Expects `HEADLINE: ...` then
 * `ARTICLE: ...`; otherwise the first line is the headline.
 */
export function parseArticleResponse(text: string): { title: string; content: string } {
    const parts = text.split('ARTICLE:');
    let title: string;
    let content: string;

    if (parts.length >= 2) {
        title = parts[0].replace('HEADLINE:', '');
        content = parts.slice(1).join('ARTICLE:');
    } else {
        const trimmed = text.trim();
        const newline = trimmed.indexOf('\n');
        title = newline === -1 ? trimmed : trimmed.slice(0, newline);
        content = newline === -1 ? '' : trimmed.slice(newline + 1);
    }

    return {
        title: title.replace(/^#+\s*/, '').replace(/\*\*/g, '').trim(),
        content: content.trim(),
    };
}

const signed = (n: number) => `${n > 0 ? '+' : ''}${n.toFixed(2)}`;

export class ArticleGenerator {
    private ai: AIService;
    private maxNewsItems: number;
    private maxSummaryLength: number;

    constructor(ai: AIService, options: ArticleGeneratorOptions = {}) {
        this.ai = ai;
        this.maxNewsItems = options.maxNewsItems ?? 5;
        this.maxSummaryLength = options.maxSummaryLength ?? 150;

        if (!Number.isInteger(this.maxNewsItems) || this.maxNewsItems < 0) {
            throw new ConfigurationError(`maxNewsItems must be a non-negative integer, got ${this.maxNewsItems}`);
        }
        if (!Number.isInteger(this.maxSummaryLength) || this.maxSummaryLength < 1) {
            throw new ConfigurationError(`maxSummaryLength must be a positive integer, got ${this.maxSummaryLength}`);
        }
    }

    /**
     * Write the article for one mover. Falls back to the template whenever the
     * AI path does not produce a usable headline and body; never rejects for
     * upstream failures.
     */
    async generate(stock: StockRecord, movementType: MovementType, news: NewsItem[]): Promise<ArticleResult> {
        const slug = generateArticleSlug(stock.symbol, stock.price_change_pct, stock.date, movementType);
        const base = { stock_symbol: stock.symbol, date: stock.date, movement_type: movementType, slug };

        let reason: string;
        if (!this.ai.isConfigured()) {
            reason = 'AI API key not configured';
        } else {
            try {
                const text = await this.ai.chat(this.buildPrompt(stock, news));
                const { title, content } = parseArticleResponse(text);
                if (title && content) {
                    console.log(`[AI] Generated article for ${stock.symbol} with ${this.ai.modelName}`);
                    return { kind: 'generated', draft: { ...base, title, content, generation: 'generated' } };
                }
                reason = 'AI response had no headline or body';
            } catch (error) {
                reason = error instanceof Error ? error.message : String(error);
            }
        }

        console.warn(`[AI] Using template article for ${stock.symbol}: ${reason}`);
        const { title, content } = this.buildTemplate(stock, movementType, news);
        return { kind: 'templated', draft: { ...base, title, content, generation: 'templated' }, reason };
    }

    formatNewsSummary(news: NewsItem[]): string {
        if (news.length === 0 || this.maxNewsItems === 0) return 'No recent news available.';

        const lines: string[] = [];
        news.slice(0, this.maxNewsItems).forEach((n, i) => {
            lines.push(`${i + 1}. ${n.headline} (${n.source || 'Unknown'})`);
            if (n.summary) {
                const summary = n.summary.length > this.maxSummaryLength
                    ? `${n.summary.slice(0, this.maxSummaryLength)}...`
                    : n.summary;
                lines.push(`   ${summary}`);
            }
        });
        return lines.join('\n');
    }

    buildPrompt(stock: StockRecord, news: NewsItem[]): string {
        const pct = stock.price_change_pct;
        const absChange = Math.abs(pct).toFixed(2);
        const move = pct === 0 ? 'held steady' : `moved ${pct > 0 ? 'up' : 'down'} by ${absChange}%`;

        return `You are a financial journalist. Write an engaging article (300-450 words) explaining why ${stock.name} (${stock.symbol}) stock ${move} in the trading session of ${stock.date}.

CURRENT STOCK DATA:
- Symbol: ${stock.symbol}
- Company: ${stock.name}
- Price Change: ${signed(stock.price_change_pct)}%
- Closing Price: $${stock.price.toFixed(2)}
- Previous Close: $${stock.previous_close.toFixed(2)}
- Trading Volume: ${stock.volume.toLocaleString('en-US')}

RECENT NEWS ARTICLES:
${this.formatNewsSummary(news)}

Explain:
1. WHY the stock moved (cite the specific news above when it is relevant)
2. KEY FACTORS driving the movement
3. CONTEXT that helps investors understand the bigger picture

Rules:
- Use only the figures given above, do not invent numbers
- If no news explains the move, say so plainly instead of speculating
- Professional yet accessible, like a Bloomberg or MarketWatch piece

Format your response as:
HEADLINE: [Compelling headline]

ARTICLE:
[The article body]`;
    }

    /**
     * Deterministic fallback article. Wording follows the sign of the move;
     * `movementType` only decides which list the closing paragraph names.
     */
    buildTemplate(stock: StockRecord, movementType: MovementType, news: NewsItem[]): { title: string; content: string } {
        const pct = stock.price_change_pct;
        const absChange = Math.abs(pct).toFixed(2);
        const close = `$${stock.price.toFixed(2)}`;
        const previous = `$${stock.previous_close.toFixed(2)}`;
        const lead = news[0]?.headline;

        let action: string;
        let session: string;
        let flow: string;
        let mood: string;
        if (pct > 0) {
            action = `${pct > 5 ? 'soars' : 'rises'} ${absChange}%`;
            session = `with shares gaining ${absChange}% to close at ${close} from a previous close of ${previous}`;
            flow = 'strong buying interest';
            mood = 'Investors appear to be responding positively to recent developments.';
        } else if (pct < 0) {
            action = `${pct < -5 ? 'plunges' : 'falls'} ${absChange}%`;
            session = `with shares losing ${absChange}% to close at ${close} from a previous close of ${previous}`;
            flow = 'heavy selling pressure';
            mood = "Market concerns have weighed on the stock's performance.";
        } else {
            action = 'holds steady';
            session = `with shares closing unchanged at ${close}`;
            flow = 'balanced buying and selling';
            mood = 'Investors appear to be waiting for a clearer catalyst.';
        }

        const paragraphs = [
            `${stock.name} (${stock.symbol}) ${pct === 0 ? 'finished flat' : `moved ${signed(pct)}%`} on ${stock.date}${lead ? ` amid "${lead}"` : ''}, ${session}.`,
            `The stock traded ${stock.volume.toLocaleString('en-US')} shares during the session, indicating ${flow} from investors.`,
            `Recent News Context:\n${this.formatNewsSummary(news)}`,
            `This move places ${stock.symbol} among the ${movementType === 'winner' ? 'strongest' : 'weakest'} performers in the index for the day. ${mood}`,
            `Traders and investors should watch upcoming earnings reports, industry trends and broader market conditions that may continue to influence ${stock.name}'s shares in the coming sessions.`,
        ];

        return { title: `${stock.name} (${stock.symbol}) ${action} in Today's Trading`, content: paragraphs.join('\n\n') };
    }
}
