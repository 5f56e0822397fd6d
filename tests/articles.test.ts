import { ConfigurationError } from '../src/errors';
import { ArticleGenerator, generateArticleSlug, parseArticleResponse } from '../src/services/articles';
import { configuredAI, fakeFetch, FetchInit, jsonResponse, makeNews, makeStock, unconfiguredAI } from './helpers';

const chatReply = (content: string) => jsonResponse({ choices: [{ message: { role: 'assistant', content } }] });

describe('generateArticleSlug', () => {
    it('describes direction, whole percent and date', () => {
        expect(generateArticleSlug('GME', 15.3, '2026-01-08', 'winner')).toBe('WhyDidGMEGoUp15PercentToday-Jan082026');
        expect(generateArticleSlug('TSLA', -8.1, '2026-03-02', 'loser')).toBe('WhyDidTSLAGoDown8PercentToday-Mar022026');
    });

    it('strips characters that are not URL-safe', () => {
        expect(generateArticleSlug('BRK.B', 2.5, '2026-12-31', 'winner')).toBe('WhyDidBRKBGoUp2PercentToday-Dec312026');
    });

    it('suffixes the movement type when it contradicts the direction', () => {
        expect(generateArticleSlug('MSFT', 1.2, '2026-03-02', 'loser')).toBe('WhyDidMSFTGoUp1PercentToday-Mar022026-loser');
        expect(generateArticleSlug('MSFT', 0, '2026-03-02', 'winner')).toBe('WhyDidMSFTGoDown0PercentToday-Mar022026-winner');
    });
});

describe('parseArticleResponse', () => {
    it('reads the headline and article sections', () => {
        const text = 'HEADLINE: **Acme Soars on Earnings**\n\nARTICLE:\nAcme shares rose sharply.\n\nMore detail.';

        expect(parseArticleResponse(text)).toEqual({
            title: 'Acme Soars on Earnings',
            content: 'Acme shares rose sharply.\n\nMore detail.',
        });
    });

    it('falls back to the first line as the headline', () => {
        expect(parseArticleResponse('# Acme Slides\nShares fell on weak guidance.')).toEqual({
            title: 'Acme Slides',
            content: 'Shares fell on weak guidance.',
        });
    });
});

describe('ArticleGenerator', () => {
    const stock = makeStock('ACME', 6.5, { name: 'Acme Corp', price: 106.5, previous_close: 100, volume: 2500000 });
    const news = [
        makeNews('ACME', 'Acme beats estimates', { summary: 'Quarterly revenue topped forecasts.' }),
        makeNews('ACME', 'Acme raises guidance', { source: null }),
    ];

    it('uses the template when no AI key is configured', async () => {
        const generator = new ArticleGenerator(unconfiguredAI());

        const result = await generator.generate(stock, 'winner', news);

        expect(result.kind).toBe('templated');
        expect(result.draft).toMatchObject({
            stock_symbol: 'ACME',
            date: '2026-03-02',
            movement_type: 'winner',
            slug: 'WhyDidACMEGoUp6PercentToday-Mar022026',
            generation: 'templated',
            title: "Acme Corp (ACME) soars 6.50% in Today's Trading",
        });
        expect(result.draft.content.startsWith(
            'Acme Corp (ACME) moved +6.50% on 2026-03-02 amid "Acme beats estimates", with shares gaining 6.50% to close at $106.50 from a previous close of $100.00.'
        )).toBe(true);
        if (result.kind === 'templated') {
            expect(result.reason).toBe('AI API key not configured');
        }
    });

    it('still writes a full article when the AI call fails', async () => {
        const generator = new ArticleGenerator(configuredAI(fakeFetch(() => {
            throw new TypeError('fetch failed');
        })));

        const result = await generator.generate(stock, 'winner', []);

        expect(result.kind).toBe('templated');
        expect(result.draft.title).not.toBe('');
        expect(result.draft.content).toContain('No recent news available.');
    });

    it('falls back on a non-2xx response', async () => {
        const generator = new ArticleGenerator(configuredAI(fakeFetch(() => jsonResponse({ error: 'bad key' }, 401))));

        const result = await generator.generate(stock, 'winner', news);

        expect(result.kind).toBe('templated');
        if (result.kind === 'templated') {
            expect(result.reason).toBe('AI API error: 401 - {"error":"bad key"}');
        }
    });

    it('falls back when the reply has no body', async () => {
        const generator = new ArticleGenerator(configuredAI(fakeFetch(() => chatReply('HEADLINE: Only a headline'))));

        const result = await generator.generate(stock, 'winner', news);

        expect(result.kind).toBe('templated');
    });

    it('returns the generated article when the AI replies', async () => {
        let requestUrl = '';
        let requestInit: FetchInit;
        const generator = new ArticleGenerator(configuredAI(fakeFetch((url, init) => {
            requestUrl = url;
            requestInit = init;
            return chatReply('HEADLINE: Acme Jumps After Earnings Beat\nARTICLE: Acme Corp shares climbed 6.5%.');
        })));

        const result = await generator.generate(stock, 'winner', news);

        expect(result).toEqual({
            kind: 'generated',
            draft: {
                stock_symbol: 'ACME',
                date: '2026-03-02',
                movement_type: 'winner',
                slug: 'WhyDidACMEGoUp6PercentToday-Mar022026',
                generation: 'generated',
                title: 'Acme Jumps After Earnings Beat',
                content: 'Acme Corp shares climbed 6.5%.',
            },
        });
        expect(requestUrl).toBe('https://ai.example.test/v1/chat/completions');
        expect(new Headers(requestInit?.headers).get('Authorization')).toBe('Bearer test-secret');
        const body: unknown = JSON.parse(String(requestInit?.body));
        expect(body).toMatchObject({ model: 'test-model', max_tokens: 1500 });
    });

    it('embeds the quote and news in the prompt', () => {
        const prompt = new ArticleGenerator(unconfiguredAI()).buildPrompt(stock, news);

        expect(prompt).toContain('explaining why Acme Corp (ACME) stock moved up by 6.50%');
        expect(prompt).toContain('- Price Change: +6.50%');
        expect(prompt).toContain('- Trading Volume: 2,500,000');
        expect(prompt).toContain('1. Acme beats estimates (Example Wire)\n   Quarterly revenue topped forecasts.');
        expect(prompt).toContain('2. Acme raises guidance (Unknown)');
    });

    it('truncates long summaries and limits the news count', () => {
        const generator = new ArticleGenerator(unconfiguredAI(), { maxNewsItems: 1, maxSummaryLength: 10 });

        expect(generator.formatNewsSummary(news)).toBe('1. Acme beats estimates (Example Wire)\n   Quarterly ...');
    });

    it.each([
        [6, 'soars'],
        [0.4, 'rises'],
        [-0.4, 'falls'],
        [-7, 'plunges'],
    ])('titles a %d%% move with "%s"', (pct, verb) => {
        const { title } = new ArticleGenerator(unconfiguredAI()).buildTemplate(makeStock('ACME', pct, { name: 'Acme Corp' }), 'winner', []);

        expect(title).toBe(`Acme Corp (ACME) ${verb} ${Math.abs(pct).toFixed(2)}% in Today's Trading`);
    });

    it('describes a riser listed among the losers as rising', () => {
        const riser = makeStock('MSFT', 1.2, { name: 'Microsoft' });

        const { title, content } = new ArticleGenerator(unconfiguredAI()).buildTemplate(riser, 'loser', []);

        expect(title).toBe("Microsoft (MSFT) rises 1.20% in Today's Trading");
        expect(content).toContain('with shares gaining 1.20% to close at $100.00');
        expect(content).toContain('This move places MSFT among the weakest performers in the index for the day. Investors appear to be responding positively');
        expect(content).not.toContain('losing');
    });

    it('gives an unchanged close its own wording', () => {
        const flat = makeStock('FLAT', 0, { name: 'Flat Co' });
        const generator = new ArticleGenerator(unconfiguredAI());

        const { title, content } = generator.buildTemplate(flat, 'winner', []);

        expect(title).toBe("Flat Co (FLAT) holds steady in Today's Trading");
        expect(content.split('\n\n')[0]).toBe('Flat Co (FLAT) finished flat on 2026-03-02, with shares closing unchanged at $100.00.');
        expect(generator.buildPrompt(flat, [])).toContain('Flat Co (FLAT) stock held steady in the trading session of 2026-03-02');
    });

    it('rejects invalid options at construction', () => {
        expect(() => new ArticleGenerator(unconfiguredAI(), { maxNewsItems: -1 })).toThrow(ConfigurationError);
    });
});
