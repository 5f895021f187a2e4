import { Logger } from '@nestjs/common';
import type { Counter } from 'prom-client';
import {
  LlmProvider,
  CompletionResult,
  CompletionFailure,
  DEFAULT_MAX_TOKENS,
  completionFailure,
} from './interfaces/llm-provider.interface';
import { errorMessage } from '../common/http/fetch-with-timeout';

const NO_PROVIDER = { name: 'none', model: 'none' };

/**
 * Ordered set of providers that were reachable at startup. The list never
 * changes after `create` resolves; completions fail over through it in order.
 */
export class LlmRegistry {
  private readonly logger = new Logger(LlmRegistry.name);

  private constructor(
    private readonly providers: readonly LlmProvider[],
    private readonly completionsCounter?: Counter<string>,
  ) {}

  /** Checks candidates one at a time, in preference order, keeping the available ones. */
  static async create(
    candidates: readonly LlmProvider[],
    completionsCounter?: Counter<string>,
  ): Promise<LlmRegistry> {
    const logger = new Logger(LlmRegistry.name);
    const available: LlmProvider[] = [];

    for (const candidate of candidates) {
      let ok = false;
      try {
        ok = await candidate.isAvailable();
      } catch (error: unknown) {
        logger.warn(
          `Availability check for ${candidate.name} threw: ${errorMessage(error)}`,
        );
      }
      if (ok) {
        available.push(candidate);
        logger.log(`${candidate.name} provider available (${candidate.model})`);
      }
    }

    if (available.length === 0) {
      logger.warn(
        'No LLM providers available. Start Ollama or set GROQ_API_KEY, TOGETHER_API_KEY or HUGGINGFACE_API_KEY.',
      );
    }

    return new LlmRegistry(available, completionsCounter);
  }

  hasProviders(): boolean {
    return this.providers.length > 0;
  }

  listAvailableProviders(): string[] {
    return this.providers.map((p) => p.name);
  }

  async generateCompletion(
    prompt: string,
    systemPrompt?: string,
    maxTokens: number = DEFAULT_MAX_TOKENS,
  ): Promise<CompletionResult> {
    if (this.providers.length === 0) {
      return completionFailure(NO_PROVIDER, 'No LLM providers available');
    }

    const failures: CompletionFailure[] = [];

    for (const provider of this.providers) {
      this.logger.log(`Trying ${provider.name}...`);
      const result = await provider.generate(prompt, systemPrompt, maxTokens);

      if (result.succeeded) {
        this.completionsCounter?.inc({
          provider: provider.name,
          status: 'success',
        });
        this.logger.log(`Completion succeeded with ${provider.name}`);
        return result;
      }

      this.completionsCounter?.inc({
        provider: provider.name,
        status: 'failure',
      });
      this.logger.warn(`${provider.name} failed: ${result.error}`);
      failures.push(result);
    }

    const detail = failures.map((f) => `${f.provider}: ${f.error}`).join('; ');
    return completionFailure(
      NO_PROVIDER,
      `All LLM providers failed: ${detail}`,
    );
  }
}
