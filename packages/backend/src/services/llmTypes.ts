export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  embeddingModel: string;
  embeddingApiKey?: string;
  embeddingBaseURL?: string;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  generateEmbedding(text: string): Promise<number[]>;
}

/**
 * Streaming chat model. Each yielded string is one increment of the answer;
 * breaking out of the iteration or aborting `signal` ends the request.
 */
export interface LanguageModel {
  chatCompletion(prompt: string, options?: CompletionOptions): AsyncGenerator<string>;
  generate(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface LLMServiceLike extends LanguageModel, EmbeddingProvider {
  isConfigured?(): boolean;
  estimateTokens?(text: string): number;
}

type ChatRequestMessage = { role: "system"; content: string } | { role: "user"; content: string };

export interface ChatCompletionStreamRequest {
  model: string;
  temperature: number;
  max_tokens: number;
  stream: true;
  messages: ChatRequestMessage[];
}

export interface ChatCompletionStreamChunk {
  choices: Array<{
    delta?: {
      content?: string | null;
    };
  }>;
}

export interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
  }>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/** The slice of an OpenAI-compatible SDK client this service talks to. */
export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionStreamRequest,
        options?: RequestOptions
      ): Promise<AsyncIterable<ChatCompletionStreamChunk>>;
    };
  };
  embeddings: {
    create(body: { model: string; input: string }, options?: RequestOptions): Promise<EmbeddingResponse>;
  };
}
