import { z } from 'zod';
import { Env } from '../config';

const ChatCompletionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullish() }),
    })).min(1),
});

export type AIConfig = Pick<Env, 'AI_API_KEY' | 'AI_BASE_URL' | 'AI_MODEL' | 'AI_TIMEOUT_MS'>;

/**
 * Client for an OpenAI-compatible chat completions endpoint.
 */
export class AIService {
    private apiKey: string;
    private baseUrl: string;
    private model: string;
    private timeoutMs: number;
    private fetchFn: typeof fetch;

    constructor(config: AIConfig, fetchFn: typeof fetch = fetch) {
        this.apiKey = config.AI_API_KEY || '';
        this.baseUrl = config.AI_BASE_URL.replace(/\/+$/, '');
        this.model = config.AI_MODEL;
        this.timeoutMs = config.AI_TIMEOUT_MS;
        this.fetchFn = fetchFn;
    }

    isConfigured(): boolean {
        return this.apiKey !== '';
    }

    get modelName(): string {
        return this.model;
    }

    /**
     * Send a single-turn prompt and return the reply text.
     * Throws on a missing key, a non-2xx status, a timeout or a malformed body.
     */
    async chat(prompt: string, maxTokens: number = 1500): Promise<string> {
        if (!this.apiKey) {
            throw new Error('AI API key not configured');
        }

        const response = await this.fetchFn(`${this.baseUrl}/chat/completions`, {
            method: 'POST',
            headers: {
                'Authorization': `Bearer ${this.apiKey}`,
                'Content-Type': 'application/json'
            },
            body: JSON.stringify({
                model: this.model,
                max_tokens: maxTokens,
                messages: [{ role: 'user', content: prompt }]
            }),
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            const errorBody = await response.text();
            throw new Error(`AI API error: ${response.status} - ${errorBody.substring(0, 300)}`);
        }

        const data = ChatCompletionSchema.parse(await response.json());
        return data.choices[0].message.content ?? '';
    }
}
