import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { dedupeKey } from './news';
import {
    Article,
    ArticleDraft,
    ArticleWithStock,
    NewsItem,
    PipelineRun,
    RunTrigger,
    StockRecord,
} from '../types';

const SCHEMA_PATH = path.join(__dirname, '..', '..', 'schema.sql');

export function openDatabase(file: string, schemaPath: string = SCHEMA_PATH): Database.Database {
    const db = new Database(file);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(fs.readFileSync(schemaPath, 'utf8'));
    return db;
}

export interface PipelineResult {
    stocks: StockRecord[];
    news: NewsItem[];
    articles: ArticleDraft[];
}

export interface PersistCounts {
    stocks: number;
    news: number;
    articles: number;
}

export interface RunCounts extends PersistCounts {
    date: string;
    templated: number;
}

const ARTICLE_WITH_STOCK = `
    SELECT a.*, s.name AS stock_name, s.price AS stock_price, s.price_change_pct AS stock_change_pct
    FROM articles a
    LEFT JOIN stocks s ON s.symbol = a.stock_symbol AND s.date = a.date
`;

export class DBService {
    private db: Database.Database;

    constructor(db: Database.Database) {
        this.db = db;
    }

    // --- Pipeline writes ---

    /**
     * Write one run's output in a single transaction. Stocks and articles are
     * upserted on their natural keys, news rows already stored are ignored.
     */
    async savePipelineResult(result: PipelineResult): Promise<PersistCounts> {
        const upsertStock = this.db.prepare(
            `INSERT INTO stocks (symbol, name, date, price, price_change, price_change_pct, volume, previous_close)
             VALUES (@symbol, @name, @date, @price, @price_change, @price_change_pct, @volume, @previous_close)
             ON CONFLICT (symbol, date) DO UPDATE SET
                name = excluded.name,
                price = excluded.price,
                price_change = excluded.price_change,
                price_change_pct = excluded.price_change_pct,
                volume = excluded.volume,
                previous_close = excluded.previous_close`
        );
        const insertNews = this.db.prepare(
            `INSERT OR IGNORE INTO stock_news (symbol, date, headline, url, source, summary, published_at, dedupe_key)
             VALUES (@symbol, @date, @headline, @url, @source, @summary, @published_at, @dedupe_key)`
        );
        const upsertArticle = this.db.prepare(
            `INSERT INTO articles (stock_symbol, date, title, content, movement_type, slug, generation)
             VALUES (@stock_symbol, @date, @title, @content, @movement_type, @slug, @generation)
             ON CONFLICT (stock_symbol, date, movement_type) DO UPDATE SET
                title = excluded.title,
                content = excluded.content,
                slug = excluded.slug,
                generation = excluded.generation`
        );

        const write = this.db.transaction((r: PipelineResult): PersistCounts => {
            let news = 0;
            for (const s of r.stocks) {
                upsertStock.run({
                    symbol: s.symbol,
                    name: s.name,
                    date: s.date,
                    price: s.price,
                    price_change: s.price_change,
                    price_change_pct: s.price_change_pct,
                    volume: s.volume,
                    previous_close: s.previous_close,
                });
            }
            for (const n of r.news) {
                const info = insertNews.run({
                    symbol: n.symbol,
                    date: n.date,
                    headline: n.headline,
                    url: n.url,
                    source: n.source,
                    summary: n.summary,
                    published_at: n.published_at,
                    dedupe_key: dedupeKey(n),
                });
                news += info.changes;
            }
            for (const a of r.articles) {
                upsertArticle.run({ ...a });
            }
            return { stocks: r.stocks.length, news, articles: r.articles.length };
        });

        const counts = write(result);
        console.log(`[DB] Saved ${counts.stocks} stocks, ${counts.news} new news items, ${counts.articles} articles.`);
        return counts;
    }

    // --- Run records ---

    async startRun(trigger: RunTrigger, topN: number): Promise<number> {
        const info = this.db.prepare(
            `INSERT INTO pipeline_runs (trigger, status, top_n) VALUES (?, 'running', ?)`
        ).run(trigger, topN);
        return Number(info.lastInsertRowid);
    }

    async completeRun(id: number, counts: RunCounts): Promise<void> {
        this.db.prepare(
            `UPDATE pipeline_runs
             SET status = 'completed', date = ?, stocks_count = ?, news_count = ?, articles_count = ?,
                 templated_count = ?, finished_at = datetime('now')
             WHERE id = ?`
        ).run(counts.date, counts.stocks, counts.news, counts.articles, counts.templated, id);
    }

    async failRun(id: number, error: string): Promise<void> {
        this.db.prepare(
            `UPDATE pipeline_runs SET status = 'failed', error = ?, finished_at = datetime('now') WHERE id = ?`
        ).run(error, id);
    }

    async getLatestRun(): Promise<PipelineRun | null> {
        const row = this.db.prepare<[], PipelineRun>(
            'SELECT * FROM pipeline_runs ORDER BY id DESC LIMIT 1'
        ).get();
        return row ?? null;
    }

    // --- Stocks ---

    async getLatestStockDate(): Promise<string | null> {
        const row = this.db.prepare<[], { max_date: string | null }>(
            'SELECT MAX(date) AS max_date FROM stocks'
        ).get();
        return row?.max_date ?? null;
    }

    async getStocksByDate(date: string): Promise<StockRecord[]> {
        return this.db.prepare<[string], StockRecord>(
            'SELECT * FROM stocks WHERE date = ? ORDER BY price_change_pct DESC, id'
        ).all(date);
    }

    /** Latest record for the symbol, or the one on `date` when given. */
    async getStock(symbol: string, date?: string): Promise<StockRecord | null> {
        const row = date
            ? this.db.prepare<[string, string], StockRecord>(
                'SELECT * FROM stocks WHERE symbol = ? AND date = ?'
            ).get(symbol, date)
            : this.db.prepare<[string], StockRecord>(
                'SELECT * FROM stocks WHERE symbol = ? ORDER BY date DESC LIMIT 1'
            ).get(symbol);
        return row ?? null;
    }

    // --- Articles ---

    async getLatestArticleDate(): Promise<string | null> {
        const row = this.db.prepare<[], { max_date: string | null }>(
            'SELECT MAX(date) AS max_date FROM articles'
        ).get();
        return row?.max_date ?? null;
    }

    /** Winners by descending change, then losers by ascending change. */
    async getArticlesByDate(date: string): Promise<ArticleWithStock[]> {
        return this.db.prepare<[string], ArticleWithStock>(
            `${ARTICLE_WITH_STOCK}
             WHERE a.date = ?
             ORDER BY CASE a.movement_type WHEN 'winner' THEN 0 ELSE 1 END,
                      CASE a.movement_type WHEN 'winner' THEN -s.price_change_pct ELSE s.price_change_pct END,
                      a.id`
        ).all(date);
    }

    async getArticleById(id: number): Promise<ArticleWithStock | null> {
        const row = this.db.prepare<[number], ArticleWithStock>(
            `${ARTICLE_WITH_STOCK} WHERE a.id = ?`
        ).get(id);
        return row ?? null;
    }

    async getArticleBySlug(slug: string): Promise<ArticleWithStock | null> {
        const row = this.db.prepare<[string], ArticleWithStock>(
            `${ARTICLE_WITH_STOCK} WHERE a.slug = ?`
        ).get(slug);
        return row ?? null;
    }

    async getArticlesBySymbol(symbol: string, limit: number = 10): Promise<Article[]> {
        return this.db.prepare<[string, number], Article>(
            'SELECT * FROM articles WHERE stock_symbol = ? ORDER BY date DESC, id DESC LIMIT ?'
        ).all(symbol, limit);
    }

    // --- News ---

    async getNewsBySymbol(symbol: string, limit: number = 10): Promise<NewsItem[]> {
        const rows = this.db.prepare<[string, number], NewsItem & { dedupe_key?: string }>(
            'SELECT * FROM stock_news WHERE symbol = ? ORDER BY date DESC, id DESC LIMIT ?'
        ).all(symbol, limit);
        return rows.map(({ dedupe_key: _key, ...item }) => item);
    }

    close(): void {
        this.db.close();
    }
}
