import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { getToken } from '@willsoto/nestjs-prometheus';
import type { Counter } from 'prom-client';
import {
  LLM_COMPLETIONS_TOTAL,
  llmMetricsProviders,
} from '../common/metrics.providers';
import type { Env } from '../config/env.validation';
import { LLM_REGISTRY } from './interfaces/llm-provider.interface';
import { LlmRegistry } from './llm-registry';
import { OllamaProvider } from './providers/ollama.provider';
import { GroqProvider } from './providers/groq.provider';
import { TogetherAiProvider } from './providers/together.provider';
import { HuggingFaceProvider } from './providers/huggingface.provider';

@Module({
  imports: [ConfigModule],
  providers: [
    ...llmMetricsProviders,
    {
      provide: LLM_REGISTRY,
      useFactory: (
        configService: ConfigService<Env, true>,
        completionsCounter: Counter<string>,
      ) => {
        // Preference order: free local inference first, then hosted tiers by latency.
        const candidates = [
          new OllamaProvider({
            baseUrl: configService.get('OLLAMA_BASE_URL', { infer: true }),
            model: configService.get('OLLAMA_MODEL', { infer: true }),
          }),
          new GroqProvider({
            apiKey: configService.get('GROQ_API_KEY', { infer: true }),
            model: configService.get('GROQ_MODEL', { infer: true }),
          }),
          new TogetherAiProvider({
            apiKey: configService.get('TOGETHER_API_KEY', { infer: true }),
            model: configService.get('TOGETHER_MODEL', { infer: true }),
          }),
          new HuggingFaceProvider({
            apiKey: configService.get('HUGGINGFACE_API_KEY', { infer: true }),
            model: configService.get('HUGGINGFACE_MODEL', { infer: true }),
          }),
        ];
        return LlmRegistry.create(candidates, completionsCounter);
      },
      inject: [ConfigService, getToken(LLM_COMPLETIONS_TOTAL)],
    },
  ],
  exports: [LLM_REGISTRY],
})
export class LlmModule {}
