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

export interface HostedProviderConfig {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

const ChatCompletionsResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1, 'Response contained no choices'),
});

/**
 * Base for hosted APIs speaking the `/chat/completions` dialect with bearer
 * auth. Subclasses only pin the name, base URL and default model.
 */
export abstract class ChatCompletionsProvider implements LlmProvider {
  abstract readonly name: string;
  protected abstract readonly baseUrl: string;
  protected abstract readonly defaultModel: string;

  constructor(protected readonly config: HostedProviderConfig) {}

  get model(): string {
    return this.config.model || this.defaultModel;
  }

  isAvailable(): Promise<boolean> {
    return Promise.resolve(Boolean(this.config.apiKey));
  }

  async generate(
    prompt: string,
    systemPrompt?: string,
    maxTokens: number = DEFAULT_MAX_TOKENS,
  ): Promise<CompletionResult> {
    if (!this.config.apiKey) {
      return completionFailure(this, `${this.name} API key not found`);
    }

    const payload = {
      model: this.model,
      messages: buildMessages(prompt, systemPrompt),
      max_tokens: maxTokens,
      temperature: 0.1,
    };

    try {
      const { status, body } = await fetchWithTimeout(
        `${this.baseUrl}/chat/completions`,
        {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(payload),
        },
        this.config.timeoutMs ?? 30_000,
      );

      if (status !== 200) {
        return completionFailure(this, `HTTP ${status}: ${body}`);
      }

      const parsed = ChatCompletionsResponseSchema.safeParse(JSON.parse(body));
      if (!parsed.success) {
        return completionFailure(
          this,
          `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        );
      }
      return completionSuccess(this, parsed.data.choices[0].message.content ?? '');
    } catch (error: unknown) {
      return completionFailure(this, errorMessage(error));
    }
  }
}
