import { serve } from '@hono/node-server';
import { loadConfig, loadUniverse } from './config';
import { createApp } from './index';
import { AIService } from './services/ai';
import { ArticleGenerator } from './services/articles';
import { DBService, openDatabase } from './services/db';
import { MarketDataService } from './services/market';
import { NewsProvider, NewsService } from './services/news';
import { NewsApiService } from './services/newsapi';
import { DailyPipeline } from './services/pipeline';
import { RSSService } from './services/rss';
import { startScheduler } from './services/scheduler';

const env = loadConfig();
const symbols = loadUniverse(env);

const db = new DBService(openDatabase(env.DATABASE_PATH));

const providers: NewsProvider[] = [new RSSService(fetch, env.UPSTREAM_TIMEOUT_MS)];
if (env.NEWS_API_KEY) {
    providers.push(new NewsApiService(env.NEWS_API_KEY, fetch, env.UPSTREAM_TIMEOUT_MS));
} else {
    console.warn('NEWS_API_KEY not set, NewsAPI provider disabled');
}

const ai = new AIService(env);
if (!ai.isConfigured()) {
    console.warn('AI_API_KEY not set, articles will use the template');
}

const pipeline = new DailyPipeline({
    db,
    market: new MarketDataService(fetch, env.UPSTREAM_TIMEOUT_MS),
    news: new NewsService(providers),
    articles: new ArticleGenerator(ai),
    symbols,
});

const app = createApp({ db, pipeline, defaultTopN: env.TOP_N });

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    console.log(`Daily Movers API listening on http://localhost:${info.port} (${symbols.length} symbols tracked)`);
});

const task = env.SCHEDULER_ENABLED
    ? startScheduler(pipeline, { cron: env.SCHEDULE_CRON, timezone: env.SCHEDULE_TIMEZONE, topN: env.TOP_N })
    : null;

function shutdown(signal: string) {
    console.log(`${signal} received, shutting down...`);
    task?.stop();
    server.close(() => {
        db.close();
        process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
