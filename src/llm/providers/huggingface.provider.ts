import { z } from 'zod';
import {
  LlmProvider,
  CompletionResult,
  DEFAULT_MAX_TOKENS,
  completionFailure,
  completionSuccess,
} from '../interfaces/llm-provider.interface';
import type { HostedProviderConfig } from './chat-completions.provider';
import {
  errorMessage,
  fetchWithTimeout,
} from '../../common/http/fetch-with-timeout';

// The inference API rejects larger generation budgets on the free tier.
const MAX_NEW_TOKENS = 500;

const GeneratedTextSchema = z.array(
  z.object({ generated_text: z.string().optional() }),
);

/**
 * Hugging Face Inference API. Text-generation models take a single `inputs`
 * string, so the system prompt is folded into it.
 */
export class HuggingFaceProvider implements LlmProvider {
  readonly name = 'Hugging Face';
  private readonly baseUrl = 'https://api-inference.huggingface.co/models';

  constructor(private readonly config: HostedProviderConfig) {}

  get model(): string {
    return this.config.model || 'microsoft/DialoGPT-medium';
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
      inputs: systemPrompt ? `${systemPrompt}\n\n${prompt}` : prompt,
      parameters: {
        max_new_tokens: Math.min(maxTokens, MAX_NEW_TOKENS),
        temperature: 0.1,
        return_full_text: false,
      },
    };

    try {
      const { status, body } = await fetchWithTimeout(
        `${this.baseUrl}/${this.model}`,
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

      const json: unknown = JSON.parse(body);
      const generated = GeneratedTextSchema.safeParse(json);
      if (generated.success && generated.data.length > 0) {
        return completionSuccess(this, generated.data[0].generated_text ?? '');
      }
      return completionSuccess(this, JSON.stringify(json));
    } catch (error: unknown) {
      return completionFailure(this, errorMessage(error));
    }
  }
}
