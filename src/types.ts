export type MovementType = 'winner' | 'loser';

export type ArticleGeneration = 'generated' | 'templated';

export interface StockRecord {
    id?: number;
    symbol: string;
    name: string;
    date: string;
    price: number;
    price_change: number;
    price_change_pct: number;
    volume: number;
    previous_close: number;
    created_at?: string;
}

export interface MoverSet {
    date: string | null;
    winners: StockRecord[];
    losers: StockRecord[];
}

/** A headline as returned by a news provider, before it is tied to a run date. */
export interface Headline {
    headline: string;
    url: string | null;
    source: string | null;
    summary: string | null;
    published_at: string | null;
}

export interface NewsItem extends Headline {
    id?: number;
    symbol: string;
    date: string;
    created_at?: string;
}

export interface ArticleDraft {
    stock_symbol: string;
    date: string;
    title: string;
    content: string;
    movement_type: MovementType;
    slug: string;
    generation: ArticleGeneration;
}

export interface Article extends ArticleDraft {
    id: number;
    created_at: string;
}

export interface ArticleWithStock extends Article {
    stock_name: string | null;
    stock_price: number | null;
    stock_change_pct: number | null;
}

export type RunTrigger = 'schedule' | 'manual';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface PipelineRun {
    id: number;
    trigger: RunTrigger;
    status: RunStatus;
    top_n: number;
    date: string | null;
    stocks_count: number;
    news_count: number;
    articles_count: number;
    templated_count: number;
    error: string | null;
    started_at: string;
    finished_at: string | null;
}

export interface RunSummary {
    run_id: number;
    date: string;
    stocks: number;
    winners: string[];
    losers: string[];
    news: number;
    articles: number;
    templated: number;
}

/** Inclusive YYYY-MM-DD range. */
export interface DateWindow {
    from: string;
    to: string;
}
