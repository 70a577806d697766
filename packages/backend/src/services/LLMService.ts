import OpenAI from "openai";
import { appConfig } from "../config.js";
import { estimateTokens } from "../pipeline/Chunker.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  CompletionOptions,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  RequestOptions
} from "./llmTypes.js";

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

function toCompatibleClient(openai: OpenAI): OpenAICompatibleClient {
  return {
    chat: {
      completions: {
        create: (body, options) => openai.chat.completions.create(body, options)
      }
    },
    embeddings: {
      create: (body, options) => openai.embeddings.create(body, options)
    }
  };
}

function requestOptions(options: CompletionOptions): RequestOptions | undefined {
  return options.signal ? { signal: options.signal } : undefined;
}

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly embeddingClient: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      embeddingClient?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://api.openai.com/v1",
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens ?? 1000,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 60_000
    };

    this.client =
      deps?.client ??
      toCompatibleClient(
        new OpenAI({
          apiKey: this.config.apiKey,
          baseURL: this.config.baseURL
        })
      );

    // Use a separate client for embeddings if configured
    if (deps?.embeddingClient) {
      this.embeddingClient = deps.embeddingClient;
    } else if (config.embeddingApiKey && config.embeddingBaseURL) {
      this.embeddingClient = toCompatibleClient(
        new OpenAI({
          apiKey: config.embeddingApiKey,
          baseURL: config.embeddingBaseURL
        })
      );
    } else {
      this.embeddingClient = this.client;
    }

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    const config: LLMConfig = {
      apiKey: appConfig.OPENAI_API_KEY,
      baseURL: appConfig.OPENAI_BASE_URL,
      chatModel: appConfig.OPENAI_CHAT_MODEL,
      embeddingModel: appConfig.OPENAI_EMBEDDING_MODEL,
      temperature: appConfig.LLM_TEMPERATURE,
      maxTokens: appConfig.LLM_MAX_OUTPUT_TOKENS,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS
    };

    if (appConfig.EMBEDDING_API_KEY) {
      config.embeddingApiKey = appConfig.EMBEDDING_API_KEY;
    }
    if (appConfig.EMBEDDING_BASE_URL) {
      config.embeddingBaseURL = appConfig.EMBEDDING_BASE_URL;
    }

    return new LLMService(config);
  }

  isConfigured(): boolean {
    return this.config.apiKey.trim().length > 0;
  }

  /**
   * Streams the answer delta by delta. The limiter does not retry here: the
   * caller owns the retry schedule for chat.
   */
  async *chatCompletion(prompt: string, options: CompletionOptions = {}): AsyncGenerator<string> {
    const stream = await this.rateLimiter.run(
      () =>
        this.client.chat.completions.create(
          {
            model: this.config.chatModel,
            temperature: this.config.temperature,
            max_tokens: this.config.maxTokens,
            stream: true,
            messages: [{ role: "user", content: prompt }]
          },
          requestOptions(options)
        ),
      options.signal ? { maxRetries: 0, signal: options.signal } : { maxRetries: 0 }
    );

    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) {
        yield delta;
      }
    }
  }

  async generate(prompt: string, options: CompletionOptions = {}): Promise<string> {
    let text = "";
    for await (const delta of this.chatCompletion(prompt, options)) {
      text += delta;
    }
    return text;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const response = await this.rateLimiter.run(() =>
      this.embeddingClient.embeddings.create({
        model: this.config.embeddingModel,
        input: text
      })
    );

    return response.data[0]?.embedding ?? [];
  }

  estimateTokens(text: string): number {
    return estimateTokens(text);
  }
}
