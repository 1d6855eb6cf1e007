import type { z } from 'zod';

export interface LLMProvider {
    name: string;
    generate(prompt: string, options?: LLMOptions): Promise<LLMResponse>;
    generateJSON<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LLMOptions): Promise<T>;
}

export interface LLMOptions {
    temperature?: number;
    maxTokens?: number;
    systemPrompt?: string;
    model?: string;
    /** Aborts the underlying HTTP request */
    signal?: AbortSignal;
}

export interface LLMResponse {
    content: string;
    usage: { promptTokens: number; completionTokens: number; totalTokens: number };
    model: string;
}
