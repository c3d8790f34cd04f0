import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GenerateContentParameters } from '@google/genai';
import { ChatModelClient, GEMINI_CLIENT, ModelChunk } from './gemini.client';
import { CompletionError, CompletionStreamError, errorMessage } from '../../utils/errors';
import { RetryAttempt, RetryConfig, backoffDelay, sleep, withRetry } from '../../utils/retry';

export interface CompletionMessage {
    role: 'user' | 'assistant';
    content: string;
}

export interface CompletionOptions {
    systemInstruction?: string;
    temperature?: number;
    maxOutputTokens?: number;
    signal?: AbortSignal;
}

export interface ModelInfo {
    model: string;
    maxOutputTokens: number;
    temperature: number;
    provider: 'Gemini';
}

function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    // Older SDK releases only embed the HTTP error body in the message.
    const match = /"code":\s*(\d{3})/.exec(errorMessage(error));
    return match ? Number(match[1]) : undefined;
}

/** Maps anything the SDK throws onto the completion failure codes. */
export function classifyError(error: unknown): CompletionError {
    if (error instanceof CompletionError) {
        return error;
    }
    const status = statusOf(error);
    const message = errorMessage(error);
    const options = { cause: error, status };

    if (status === 401 || status === 403 || (status === 400 && /api[ _-]?key/i.test(message))) {
        return new CompletionError('AuthError', message, options);
    }
    if (status === 429) {
        return new CompletionError('RateLimited', message, options);
    }
    if (status !== undefined && status >= 500) {
        return new CompletionError('UpstreamError', message, options);
    }
    if (status !== undefined && status >= 400) {
        return new CompletionError('RequestRejected', message, options);
    }
    if (error instanceof SyntaxError) {
        return new CompletionError('InvalidResponse', message, options);
    }
    // No HTTP status: DNS, reset connections, fetch failures.
    return new CompletionError('UpstreamError', message, options);
}

function isRetryable(error: unknown): boolean {
    return classifyError(error).retryable;
}

function readText(chunk: ModelChunk): string {
    try {
        return chunk.text ?? '';
    } catch (error) {
        throw new CompletionError('InvalidResponse', `Unreadable model output: ${errorMessage(error)}`, { cause: error });
    }
}

@Injectable()
export class GeminiService {
    private readonly logger = new Logger(GeminiService.name);
    private readonly CHAT_MODEL: string;
    private readonly maxOutputTokens: number;
    private readonly temperature: number;
    private readonly retry: RetryConfig;

    constructor(
        private readonly configService: ConfigService,
        @Inject(GEMINI_CLIENT) private readonly client: ChatModelClient,
    ) {
        this.CHAT_MODEL = configService.get<string>('GEMINI_CHAT_MODEL', 'gemini-2.5-flash-lite');
        this.maxOutputTokens = configService.get<number>('GEMINI_MAX_OUTPUT_TOKENS', 4096);
        this.temperature = configService.get<number>('GEMINI_TEMPERATURE', 0.7);
        this.retry = {
            maxAttempts: configService.get<number>('GEMINI_MAX_RETRIES', 3) + 1,
            initialDelayMs: configService.get<number>('GEMINI_RETRY_DELAY_MS', 1000),
            maxDelayMs: 30000,
            multiplier: 2,
        };
        this.logger.log(`Using chat model ${this.CHAT_MODEL}`);
    }

    /** Full reply in one piece. Retries rate limits and 5xx with backoff. */
    async complete(messages: CompletionMessage[], options: CompletionOptions = {}): Promise<string> {
        const request = this.buildRequest(messages, options);

        return withRetry(async () => {
            let response: ModelChunk;
            try {
                response = await this.client.generateContent(request);
            } catch (error) {
                throw classifyError(error);
            }
            const text = readText(response).trim();
            if (!text) {
                throw new CompletionError('InvalidResponse', 'Model returned an empty reply');
            }
            return text;
        }, this.retry, {
            shouldRetry: isRetryable,
            onFailedAttempt: (info) => this.logAttempt('complete', info),
            signal: options.signal,
        });
    }

    /**
     * Reply as a lazy, single-use sequence of text fragments. Nothing is sent
     * until the first pull. Transient failures are retried only while no
     * fragment has been yielded; after that they surface as
     * {@link CompletionStreamError} carrying the text emitted so far.
     * Stopping iteration (or aborting `options.signal`) aborts the request.
     */
    async *completeStreaming(messages: CompletionMessage[], options: CompletionOptions = {}): AsyncGenerator<string, void, undefined> {
        const controller = new AbortController();
        const forwardAbort = () => controller.abort();
        options.signal?.addEventListener('abort', forwardAbort, { once: true });
        if (options.signal?.aborted) {
            controller.abort();
        }

        let emitted = '';
        try {
            const request = this.buildRequest(messages, { ...options, signal: controller.signal });

            for (let attempt = 1; ; attempt++) {
                try {
                    const stream = await this.client.generateContentStream(request);
                    for await (const chunk of stream) {
                        if (controller.signal.aborted) {
                            return;
                        }
                        const text = readText(chunk);
                        if (text) {
                            emitted += text;
                            yield text;
                        }
                    }
                    break;
                } catch (error) {
                    if (controller.signal.aborted) {
                        return;
                    }
                    const failure = classifyError(error);
                    if (emitted) {
                        this.logger.warn(`Stream failed after ${emitted.length} characters: ${failure.code} ${failure.message}`);
                        throw new CompletionStreamError(failure, emitted);
                    }
                    const giveUp = !failure.retryable || attempt >= this.retry.maxAttempts;
                    const nextDelayMs = giveUp ? undefined : backoffDelay(this.retry, attempt);
                    this.logAttempt('completeStreaming', { attempt, error: failure, nextDelayMs });
                    if (nextDelayMs === undefined) {
                        throw failure;
                    }
                    await sleep(nextDelayMs, controller.signal);
                    if (controller.signal.aborted) {
                        return;
                    }
                }
            }

            if (!emitted.trim()) {
                throw new CompletionError('InvalidResponse', 'Model stream ended without any text');
            }
        } finally {
            options.signal?.removeEventListener('abort', forwardAbort);
            controller.abort();
        }
    }

    getModelInfo(): ModelInfo {
        return {
            model: this.CHAT_MODEL,
            maxOutputTokens: this.maxOutputTokens,
            temperature: this.temperature,
            provider: 'Gemini',
        };
    }

    /** Cheap round trip to check the key and model. */
    async testConnection(): Promise<boolean> {
        try {
            await this.client.generateContent(
                this.buildRequest([{ role: 'user', content: 'Hello' }], { maxOutputTokens: 5 }),
            );
            return true;
        } catch (error) {
            const failure = classifyError(error);
            this.logger.error(`Connection test failed: ${failure.code} ${failure.message}`);
            return false;
        }
    }

    private buildRequest(messages: CompletionMessage[], options: CompletionOptions): GenerateContentParameters {
        if (messages.length === 0) {
            throw new CompletionError('RequestRejected', 'Cannot complete an empty conversation');
        }
        return {
            model: this.CHAT_MODEL,
            // Gemini names the assistant role 'model'.
            contents: messages.map(m => ({
                role: m.role === 'assistant' ? 'model' : 'user',
                parts: [{ text: m.content }],
            })),
            config: {
                temperature: options.temperature ?? this.temperature,
                maxOutputTokens: options.maxOutputTokens ?? this.maxOutputTokens,
                ...(options.systemInstruction ? { systemInstruction: options.systemInstruction } : {}),
                ...(options.signal ? { abortSignal: options.signal } : {}),
            },
        };
    }

    private logAttempt(operation: string, { attempt, error, nextDelayMs }: RetryAttempt) {
        const failure = classifyError(error);
        if (nextDelayMs === undefined) {
            this.logger.error(`${operation} failed on attempt ${attempt}: ${failure.code} ${failure.message}`);
        } else {
            this.logger.warn(`${operation} attempt ${attempt} failed with ${failure.code}; retrying in ${nextDelayMs}ms`);
        }
    }
}
