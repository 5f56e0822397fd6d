import { PipelineError, RunInProgressError } from '../errors';
import { ArticleDraft, MovementType, NewsItem, RunSummary, RunTrigger, StockRecord } from '../types';
import { ArticleGenerator } from './articles';
import { DBService } from './db';
import { MarketDataService } from './market';
import { NewsService } from './news';
import { latestTradingDay, rankMovers } from './ranker';

export type PipelineStage = 'IDLE' | 'FETCH_PRICES' | 'RANK' | 'FETCH_NEWS' | 'GENERATE_ARTICLES' | 'PERSIST' | 'DONE';

export interface PipelineDeps {
    db: Pick<DBService, 'startRun' | 'completeRun' | 'failRun' | 'savePipelineResult'>;
    market: Pick<MarketDataService, 'fetchQuotes'>;
    news: Pick<NewsService, 'fetchNews'>;
    articles: Pick<ArticleGenerator, 'generate'>;
    symbols: string[];
}

export interface RunOptions {
    topN: number;
    trigger: RunTrigger;
    /** Trading date (YYYY-MM-DD); the latest close when omitted. */
    date?: string;
}

interface LockHolder {
    owner: string;
    acquiredAt: string;
}

/** Process-wide guard so scheduled and manual runs never interleave writes. */
export class RunLock {
    private holder: LockHolder | null = null;

    tryAcquire(owner: string): boolean {
        if (this.holder) return false;
        this.holder = { owner, acquiredAt: new Date().toISOString() };
        return true;
    }

    release(): void {
        this.holder = null;
    }

    current(): LockHolder | null {
        return this.holder;
    }
}

export class DailyPipeline {
    private deps: PipelineDeps;
    private lock: RunLock;
    private currentStage: PipelineStage = 'IDLE';

    constructor(deps: PipelineDeps, lock: RunLock = new RunLock()) {
        this.deps = deps;
        this.lock = lock;
    }

    get stage(): PipelineStage {
        return this.currentStage;
    }

    isRunning(): boolean {
        return this.lock.current() !== null;
    }

    /**
     * Fetch prices, rank, gather news, write articles and persist them.
     * Rejects with RunInProgressError when another run holds the lock.
     */
    async run(options: RunOptions): Promise<RunSummary> {
        if (!this.lock.tryAcquire(options.trigger)) {
            const holder = this.lock.current();
            throw new RunInProgressError(holder?.owner ?? 'unknown', holder?.acquiredAt ?? 'unknown');
        }

        try {
            return await this.execute(options);
        } finally {
            this.lock.release();
        }
    }

    private async execute({ topN, trigger, date }: RunOptions): Promise<RunSummary> {
        const { db } = this.deps;
        this.currentStage = 'IDLE';
        const runId = await db.startRun(trigger, topN);
        console.log(`[Pipeline] Run #${runId} started (${trigger}, top ${topN}${date ? `, ${date}` : ''})`);

        try {
            this.currentStage = 'FETCH_PRICES';
            const quotes = await this.deps.market.fetchQuotes(this.deps.symbols, date);
            if (quotes.length === 0) {
                throw new PipelineError('FETCH_PRICES', 'No price data fetched');
            }

            this.currentStage = 'RANK';
            const day = latestTradingDay(quotes);
            const tradingDate = day.date ?? '';
            if (day.records.length < quotes.length) {
                console.warn(`[Pipeline] Dropped ${quotes.length - day.records.length} stale quotes not dated ${tradingDate}`);
            }
            const movers = rankMovers(day.records, topN);
            const assignments: { stock: StockRecord; movementType: MovementType }[] = [
                ...movers.winners.map(stock => ({ stock, movementType: 'winner' as const })),
                ...movers.losers.map(stock => ({ stock, movementType: 'loser' as const })),
            ];
            console.log(`[Pipeline] ${tradingDate}: winners ${movers.winners.map(s => s.symbol).join(', ')}; losers ${movers.losers.map(s => s.symbol).join(', ')}`);

            this.currentStage = 'FETCH_NEWS';
            const newsBySymbol = new Map<string, NewsItem[]>();
            for (const { stock } of assignments) {
                if (newsBySymbol.has(stock.symbol)) continue;
                const items = await this.deps.news.fetchNews({ symbol: stock.symbol, company: stock.name, date: tradingDate });
                newsBySymbol.set(stock.symbol, items);
            }

            this.currentStage = 'GENERATE_ARTICLES';
            const articles: ArticleDraft[] = [];
            let templated = 0;
            for (const { stock, movementType } of assignments) {
                const result = await this.deps.articles.generate(stock, movementType, newsBySymbol.get(stock.symbol) ?? []);
                if (result.kind === 'templated') templated++;
                articles.push(result.draft);
            }

            this.currentStage = 'PERSIST';
            const counts = await db.savePipelineResult({
                stocks: day.records,
                news: [...newsBySymbol.values()].flat(),
                articles,
            });
            await db.completeRun(runId, { ...counts, date: tradingDate, templated });

            this.currentStage = 'DONE';
            console.log(`[Pipeline] Run #${runId} completed: ${counts.stocks} stocks, ${counts.articles} articles (${templated} templated)`);

            return {
                run_id: runId,
                date: tradingDate,
                stocks: counts.stocks,
                winners: movers.winners.map(s => s.symbol),
                losers: movers.losers.map(s => s.symbol),
                news: counts.news,
                articles: counts.articles,
                templated,
            };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Pipeline] Run #${runId} failed during ${this.currentStage}:`, error);
            try {
                await db.failRun(runId, message);
            } catch (recordError) {
                console.error(`[Pipeline] Could not record failure of run #${runId}:`, recordError);
            }
            if (error instanceof PipelineError) throw error;
            throw new PipelineError(this.currentStage, message, { cause: error });
        }
    }
}
