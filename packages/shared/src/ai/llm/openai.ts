import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { z } from 'zod';
import type { LLMProvider, LLMOptions, LLMResponse } from './interfaces.js';
import { CircuitBreaker } from '../../utils/circuit-breaker.js';
import { errorMessage } from '../../types/errors.js';

export interface OpenAIProviderOptions {
    apiKey: string;
    model: string;
    /** Injected client, used by tests */
    client?: OpenAI;
    breaker?: CircuitBreaker;
}

export class OpenAIProvider implements LLMProvider {
    public readonly name = 'openai';
    private readonly client: OpenAI;
    private readonly breaker: CircuitBreaker;
    private readonly model: string;

    constructor(options: OpenAIProviderOptions) {
        this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
        this.model = options.model;
        this.breaker = options.breaker ?? new CircuitBreaker('openai', {
            failureThreshold: 5,
            cooldownMs: 60000
        });
    }

    async generate(prompt: string, options: LLMOptions = {}): Promise<LLMResponse> {
        return this.breaker.execute(async () => {
            const completion = await this.client.chat.completions.create({
                model: options.model ?? this.model,
                messages: this.buildMessages(prompt, options),
                temperature: options.temperature,
                max_tokens: options.maxTokens,
            }, { signal: options.signal });

            return {
                content: completion.choices[0]?.message?.content ?? '',
                usage: {
                    promptTokens: completion.usage?.prompt_tokens ?? 0,
                    completionTokens: completion.usage?.completion_tokens ?? 0,
                    totalTokens: completion.usage?.total_tokens ?? 0,
                },
                model: completion.model,
            };
        });
    }

    async generateJSON<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: LLMOptions = {}): Promise<T> {
        return this.breaker.execute(async () => {
            const completion = await this.client.chat.completions.create({
                model: options.model ?? this.model,
                messages: this.buildMessages(`${prompt}\n\nRespond with a single valid JSON object.`, options),
                temperature: options.temperature ?? 0,
                max_tokens: options.maxTokens,
                response_format: { type: 'json_object' },
            }, { signal: options.signal });

            const content = completion.choices[0]?.message?.content;
            if (!content) {
                throw new Error('Failed to get JSON response');
            }

            let parsed: unknown;
            try {
                parsed = JSON.parse(content);
            } catch (error) {
                throw new Error(`Failed to parse JSON response: ${errorMessage(error)}`);
            }
            return schema.parse(parsed);
        });
    }

    private buildMessages(prompt: string, options: LLMOptions): ChatCompletionMessageParam[] {
        const messages: ChatCompletionMessageParam[] = [];
        if (options.systemPrompt) {
            messages.push({ role: 'system', content: options.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });
        return messages;
    }
}
