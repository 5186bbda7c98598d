import OpenAI from 'openai';
import pLimit from 'p-limit';
import { OpenAIConfig } from '../config/openai.js';
import { StageLogger } from '../utils/logger.js';
import { retryWithBackoff, type Sleep } from '../utils/retry.js';

/**
 * Anything that can turn a prompt into completion text
 */
export interface ChatCompleter {
  complete(prompt: string, maxTokens: number): Promise<string>;
}

/**
 * The slice of the OpenAI SDK this client calls
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export interface OpenAIChatClientOptions {
  /** Defaults to the shared client from OpenAIConfig */
  client?: ChatCompletionsApi;
  model?: string;
  retries?: number;
  retryBackoff?: number;
  sleep?: Sleep;
}

/**
 * API, timeout and connection failures from the SDK back off exponentially
 */
export function isTransientOpenAIError(error: unknown): boolean {
  return error instanceof OpenAI.APIError;
}

/**
 * OpenAI Chat Client
 *
 * Single-user-message chat completions with bounded retries.
 * Requests are serialized: at most one call is in flight per client.
 */
export class OpenAIChatClient implements ChatCompleter {
  private client: ChatCompletionsApi;
  private model: string;
  private logger: StageLogger;
  private limiter = pLimit(1);
  private retries: number;
  private retryBackoff: number;
  private sleep?: Sleep;

  constructor(options: OpenAIChatClientOptions = {}) {
    this.client = options.client ?? OpenAIConfig.getClient();
    this.model = options.model ?? OpenAIConfig.getModel();
    this.retries = options.retries ?? 3;
    this.retryBackoff = options.retryBackoff ?? 2.0;
    this.sleep = options.sleep;
    this.logger = new StageLogger(`OpenAI:${this.model}`);
  }

  async complete(prompt: string, maxTokens: number): Promise<string> {
    return this.limiter(() =>
      retryWithBackoff(
        async () => {
          const response = await this.client.chat.completions.create({
            model: this.model,
            messages: [{ role: 'user', content: prompt }],
            max_tokens: maxTokens,
          });

          const content = response.choices[0]?.message.content;
          if (content == null) {
            this.logger.warn('Completion returned no content', { id: response.id });
            return '';
          }
          return content;
        },
        {
          attempts: this.retries,
          backoff: this.retryBackoff,
          isTransient: isTransientOpenAIError,
          logger: this.logger,
          sleep: this.sleep,
          label: 'OpenAI call',
        }
      )
    );
  }
}
