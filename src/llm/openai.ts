import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getApiKey } from '../utils/config.js';
import { ConfigError, ExtractionError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const OPENAI_BASE = 'https://api.openai.com/v1';

/**
 * Chat-completions response (subset of relevant fields).
 */
const chatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable().optional(),
                }),
                finish_reason: z.string().nullable().optional(),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number().default(0),
            completion_tokens: z.number().default(0),
            total_tokens: z.number().default(0),
        })
        .optional(),
});

interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

/**
 * OpenAI chat-completions provider.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';
    readonly model: string;
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(options: LlmProviderOptions) {
        this.model = options.model;
        this.apiKey = options.apiKey ?? getApiKey('OPENAI_API_KEY');
        this.baseUrl = (options.baseUrl ?? OPENAI_BASE).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? 120000;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async isAvailable(): Promise<boolean> {
        return Boolean(this.apiKey);
    }

    /**
     * One chat-completions call. Throws on transport errors, an empty
     * completion, or invalid JSON in json mode; retrying is up to the caller.
     */
    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        if (!this.apiKey) {
            throw new ConfigError('OpenAI API key is required (set OPENAI_API_KEY)');
        }

        const model = this.model;
        const messages: ChatMessage[] = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const body: Record<string, unknown> = {
            model,
            messages,
            temperature: params.temperature ?? 0.1,
        };
        if (params.jsonMode) body['response_format'] = { type: 'json_object' };

        getLogger().debug({ model, promptChars: prompt.length }, 'OpenAI chat completion');

        const response = await this.httpClient.post<unknown>(`${this.baseUrl}/chat/completions`, body, {
            source: 'openai',
            timeout: this.timeoutMs,
            headers: { Authorization: `Bearer ${this.apiKey}` },
        });

        const completion = chatCompletionSchema.safeParse(response.data);
        if (!completion.success) {
            throw new ExtractionError('Unexpected chat-completions response shape', {
                issues: completion.error.issues.map((issue) => issue.message),
            });
        }

        const text = completion.data.choices[0]?.message.content ?? '';
        if (!text) {
            throw new ExtractionError('Empty completion from OpenAI', { model });
        }

        const result: LlmCompletionResult = {
            text,
            usage: {
                promptTokens: completion.data.usage?.prompt_tokens ?? 0,
                completionTokens: completion.data.usage?.completion_tokens ?? 0,
                totalTokens: completion.data.usage?.total_tokens ?? 0,
            },
            model: completion.data.model ?? model,
            provider: this.name,
        };

        if (params.jsonMode) {
            try {
                result.parsed = JSON.parse(text);
            } catch (error) {
                throw new ExtractionError('Completion is not valid JSON', {
                    model,
                    cause: errorMessage(error),
                });
            }
        }

        return result;
    }
}
