import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { RunInProgressError } from './errors';
import { DBService } from './services/db';
import { DailyPipeline } from './services/pipeline';
import { rankMovers } from './services/ranker';

export interface AppDeps {
    db: DBService;
    pipeline: DailyPipeline;
    defaultTopN: number;
}

const DateParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/).refine(
    d => !isNaN(Date.parse(`${d}T00:00:00Z`)) && new Date(`${d}T00:00:00Z`).toISOString().startsWith(d),
    'Invalid calendar date'
);
const TopNParam = z.coerce.number().int().min(1).max(50);
const LimitParam = z.coerce.number().int().min(1).max(100);
const IdParam = z.coerce.number().int().positive();

type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** Validate an optional query value; absent values pass through as undefined. */
function parseOptional<T>(schema: z.ZodType<T>, raw: string | undefined, label: string): ParseResult<T | undefined> {
    if (raw === undefined || raw === '') return { ok: true, value: undefined };
    const parsed = schema.safeParse(raw);
    if (!parsed.success) return { ok: false, error: `Invalid ${label}: "${raw}"` };
    return { ok: true, value: parsed.data };
}

export function createApp({ db, pipeline, defaultTopN }: AppDeps) {
    const app = new Hono();

    // CORS: allow all origins
    app.use('/*', cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Content-Type'],
        maxAge: 86400,
    }));

    app.onError((err, c) => {
        console.error(`[API] ${c.req.method} ${c.req.path} failed:`, err);
        return c.json({ error: err.message }, 500);
    });

    app.get('/', (c) => c.text('Daily Movers API'));

    app.get('/health', (c) => c.json({ status: 'healthy' }));

    // --- Stocks ---

    app.get('/api/stocks/daily', async (c) => {
        const date = parseOptional(DateParam, c.req.query('date'), 'date (use YYYY-MM-DD)');
        if (!date.ok) return c.json({ error: date.error }, 400);
        const topN = parseOptional(TopNParam, c.req.query('top_n'), 'top_n');
        if (!topN.ok) return c.json({ error: topN.error }, 400);

        const targetDate = date.value ?? await db.getLatestStockDate();
        if (!targetDate) return c.json({ date: null, winners: [], losers: [] });

        const stocks = await db.getStocksByDate(targetDate);
        const movers = rankMovers(stocks, topN.value ?? defaultTopN);
        return c.json({ date: targetDate, winners: movers.winners, losers: movers.losers });
    });

    app.get('/api/stocks/history', async (c) => {
        const date = parseOptional(DateParam, c.req.query('date'), 'date (use YYYY-MM-DD)');
        if (!date.ok) return c.json({ error: date.error }, 400);

        const targetDate = date.value ?? await db.getLatestStockDate();
        if (!targetDate) return c.json([]);
        return c.json(await db.getStocksByDate(targetDate));
    });

    // Manual trigger
    app.post('/api/stocks/fetch-movers', async (c) => {
        const topN = parseOptional(TopNParam, c.req.query('top_n'), 'top_n');
        if (!topN.ok) return c.json({ error: topN.error }, 400);
        const date = parseOptional(DateParam, c.req.query('date'), 'date (use YYYY-MM-DD)');
        if (!date.ok) return c.json({ error: date.error }, 400);

        try {
            const summary = await pipeline.run({ topN: topN.value ?? defaultTopN, trigger: 'manual', date: date.value });
            return c.json({
                success: true,
                message: `Fetched ${summary.winners.length} winners and ${summary.losers.length} losers`,
                ...summary,
            });
        } catch (error) {
            if (error instanceof RunInProgressError) {
                return c.json({ error: 'Pipeline run already in progress', owner: error.owner, since: error.since }, 409);
            }
            throw error;
        }
    });

    app.get('/api/stocks/:symbol', async (c) => {
        const symbol = c.req.param('symbol').toUpperCase();
        const date = parseOptional(DateParam, c.req.query('date'), 'date (use YYYY-MM-DD)');
        if (!date.ok) return c.json({ error: date.error }, 400);

        const stock = await db.getStock(symbol, date.value);
        if (!stock) return c.json({ error: `Stock ${symbol} not found` }, 404);
        return c.json(stock);
    });

    // --- Articles ---

    app.get('/api/articles/daily', async (c) => {
        const date = parseOptional(DateParam, c.req.query('date'), 'date (use YYYY-MM-DD)');
        if (!date.ok) return c.json({ error: date.error }, 400);

        const targetDate = date.value ?? await db.getLatestArticleDate();
        if (!targetDate) return c.json([]);
        return c.json(await db.getArticlesByDate(targetDate));
    });

    app.get('/api/articles/slug/:slug', async (c) => {
        const article = await db.getArticleBySlug(c.req.param('slug'));
        if (!article) return c.json({ error: 'Article not found' }, 404);
        return c.json(article);
    });

    app.get('/api/articles/stock/:symbol', async (c) => {
        const limit = parseOptional(LimitParam, c.req.query('limit'), 'limit');
        if (!limit.ok) return c.json({ error: limit.error }, 400);
        return c.json(await db.getArticlesBySymbol(c.req.param('symbol').toUpperCase(), limit.value ?? 10));
    });

    app.get('/api/articles/stock/:symbol/news', async (c) => {
        return c.json(await db.getNewsBySymbol(c.req.param('symbol').toUpperCase(), 10));
    });

    app.get('/api/articles/:id', async (c) => {
        const id = IdParam.safeParse(c.req.param('id'));
        if (!id.success) return c.json({ error: `Invalid article id: "${c.req.param('id')}"` }, 400);

        const article = await db.getArticleById(id.data);
        if (!article) return c.json({ error: 'Article not found' }, 404);
        return c.json(article);
    });

    // --- Runs ---

    app.get('/api/runs/latest', async (c) => {
        const run = await db.getLatestRun();
        if (!run) return c.json({ error: 'No pipeline runs yet' }, 404);
        return c.json({ ...run, in_progress: pipeline.isRunning(), stage: pipeline.stage });
    });

    return app;
}
