import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { logger, type ILogger } from '../config/logger';
import { RetryUtil, type IRetryUtil } from '../utils/retry.util';
import { EmptyCompletionError } from '../utils/errors';
import { BaseChatHandle } from './chat-handles';
import type { BackendDescriptor, ChatMessage, SamplingParameters } from '../types/llm';

export interface ChatCompletionRequest {
    model: string;
    messages: ChatMessage[];
    temperature: number;
    max_tokens: number;
    top_p?: number;
    presence_penalty?: number;
    frequency_penalty?: number;
}

export interface ChatCompletionResult {
    choices: Array<{ message: { content: string | null } }>;
    usage?: { total_tokens: number };
}

// Narrow view of the SDK client for better testability
export interface IChatCompletionsClient {
    chat: {
        completions: {
            create(params: ChatCompletionRequest): Promise<ChatCompletionResult>;
        };
    };
}

export interface OpenAIClientOptions {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
}

export interface OpenAIChatOptions {
    model: string;
    sampling: Partial<SamplingParameters>;
    backend: BackendDescriptor;
    keyFormatValid: boolean;
    maxAttempts: number;
}

function toSdkMessage(message: ChatMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        default:
            return { role: 'user', content: message.content };
    }
}

/**
 * Builds an SDK client against any OpenAI-compatible endpoint (Groq, a
 * local Ollama server) and adapts it to IChatCompletionsClient. SDK-level
 * retries are disabled; RetryUtil owns retry policy.
 */
export function createChatCompletionsClient(options: OpenAIClientOptions): IChatCompletionsClient {
    const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0
    });

    return {
        chat: {
            completions: {
                create: async (params) => {
                    const response = await client.chat.completions.create({
                        model: params.model,
                        messages: params.messages.map(toSdkMessage),
                        temperature: params.temperature,
                        max_tokens: params.max_tokens,
                        top_p: params.top_p,
                        presence_penalty: params.presence_penalty,
                        frequency_penalty: params.frequency_penalty,
                        stream: false
                    });
                    return {
                        choices: response.choices.map(choice => ({
                            message: { content: choice.message.content }
                        })),
                        usage: response.usage ? { total_tokens: response.usage.total_tokens } : undefined
                    };
                }
            }
        }
    };
}

/**
 * OpenAI-compatible chat handle with Dependency Injection
 *
 * The "real client" variant of ChatHandle. Sends the conversation history
 * followed by the input as the user turn, retrying transient failures.
 */
export class OpenAIChatHandle extends BaseChatHandle {
    readonly backend: BackendDescriptor;
    readonly keyFormatValid: boolean;

    constructor(
        private client: IChatCompletionsClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private options: OpenAIChatOptions
    ) {
        super();
        this.backend = options.backend;
        this.keyFormatValid = options.keyFormatValid;
    }

    /**
     * Factory method for production use
     */
    static create(clientOptions: OpenAIClientOptions, options: OpenAIChatOptions): OpenAIChatHandle {
        return new OpenAIChatHandle(
            createChatCompletionsClient(clientOptions),
            RetryUtil,
            logger,
            options
        );
    }

    get model(): string {
        return this.options.model;
    }

    async invoke(input: string, history: ChatMessage[] = []): Promise<string> {
        const { model, sampling, maxAttempts } = this.options;
        const messages: ChatMessage[] = [...history, { role: 'user', content: input }];

        return await this.retryUtil.executeWithRetry(
            async () => {
                this.logger.debug({
                    messagesCount: messages.length,
                    model,
                    backend: this.backend.label
                }, 'Generating chat completion');

                const response = await this.client.chat.completions.create({
                    model,
                    messages,
                    temperature: sampling.temperature ?? 0.7,
                    max_tokens: sampling.maxTokens ?? 1024,
                    top_p: sampling.topP,
                    presence_penalty: sampling.presencePenalty,
                    frequency_penalty: sampling.frequencyPenalty
                });

                const content = response.choices[0]?.message?.content;
                if (!content || !content.trim()) {
                    throw new EmptyCompletionError();
                }

                this.logger.debug({
                    model,
                    tokensUsed: response.usage?.total_tokens ?? 0,
                    contentLength: content.length
                }, 'Chat completion generated');

                return content.trim();
            },
            {
                maxAttempts,
                baseDelay: 500,
                maxDelay: 4000,
                operationName: `chat completion (${this.backend.label})`
            }
        );
    }
}
