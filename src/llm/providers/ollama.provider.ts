import { Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  LlmProvider,
  CompletionResult,
  DEFAULT_MAX_TOKENS,
  buildMessages,
  completionFailure,
  completionSuccess,
} from '../interfaces/llm-provider.interface';
import {
  errorMessage,
  fetchWithTimeout,
} from '../../common/http/fetch-with-timeout';

export interface OllamaProviderConfig {
  baseUrl: string;
  model: string;
  availabilityTimeoutMs?: number;
  requestTimeoutMs?: number;
}

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const ChatResponseSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
});

/**
 * Local Ollama server. Available only when the server answers `/api/tags`
 * and lists a model whose name starts with the configured one.
 */
export class OllamaProvider implements LlmProvider {
  readonly name = 'Ollama';
  private readonly logger = new Logger(OllamaProvider.name);
  private readonly availabilityTimeoutMs: number;
  private readonly requestTimeoutMs: number;

  constructor(private readonly config: OllamaProviderConfig) {
    this.availabilityTimeoutMs = config.availabilityTimeoutMs ?? 5_000;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 60_000;
  }

  get model(): string {
    return this.config.model;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const { status, body } = await fetchWithTimeout(
        `${this.config.baseUrl}/api/tags`,
        { method: 'GET' },
        this.availabilityTimeoutMs,
      );
      if (status !== 200) return false;

      const parsed = TagsResponseSchema.safeParse(JSON.parse(body));
      if (!parsed.success) return false;
      return parsed.data.models.some((m) => m.name.startsWith(this.model));
    } catch (error: unknown) {
      this.logger.debug(`Ollama availability check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async generate(
    prompt: string,
    systemPrompt?: string,
    maxTokens: number = DEFAULT_MAX_TOKENS,
  ): Promise<CompletionResult> {
    const payload = {
      model: this.model,
      messages: buildMessages(prompt, systemPrompt),
      stream: false,
      options: {
        num_predict: maxTokens,
        temperature: 0.1,
      },
    };

    try {
      const { status, body } = await fetchWithTimeout(
        `${this.config.baseUrl}/api/chat`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
        },
        this.requestTimeoutMs,
      );

      if (status !== 200) {
        return completionFailure(this, `HTTP ${status}: ${body}`);
      }

      const parsed = ChatResponseSchema.parse(JSON.parse(body));
      return completionSuccess(this, parsed.message?.content ?? '');
    } catch (error: unknown) {
      return completionFailure(this, errorMessage(error));
    }
  }
}
