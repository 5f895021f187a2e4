import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import {
  PROSPECTS_GENERATED_TOTAL,
  PROSPECT_GENERATION_DURATION,
} from '../common/metrics.providers';
import { LLM_REGISTRY } from '../llm/interfaces/llm-provider.interface';
import { LlmRegistry } from '../llm/llm-registry';
import type { CompanyRecord } from './company-record';
import { getFallbackCompanies } from './fallback-catalog';
import {
  NoProvidersConfiguredError,
  RateLimitedError,
  isRateLimitMessage,
} from './prospect.errors';
import { recoverCompanies } from './response-recovery';

export type ProspectSource = 'llm' | 'fallback';

export interface GeneratedProspects {
  source: ProspectSource;
  companies: CompanyRecord[];
}

export const SYSTEM_PROMPT =
  'You are a business research assistant. Return only valid JSON.';

export function buildProspectPrompt(icp: string, count: number): string {
  return `Find ${count} real, existing companies that match: "${icp}"

Requirements:
- Use only real companies that actually exist
- Provide working website URLs
- Use realistic contact information
- Focus on companies in the specified industry/region

Return ONLY valid JSON in this exact format:

{
    "companies": [
        {
            "name": "Company Name",
            "website": "https://company.com",
            "country": "US",
            "industry": "Technology",
            "contact_name": "Full Name",
            "contact_title": "CEO",
            "contact_email": "name@company.com",
            "description": "Brief description of what the company does"
        }
    ]
}

CRITICAL: Return ONLY the JSON object above. No explanations, no markdown, no additional text.`;
}

@Injectable()
export class ProspectGeneratorService {
  private readonly logger = new Logger(ProspectGeneratorService.name);

  constructor(
    @Inject(LLM_REGISTRY) private readonly registry: LlmRegistry,
    @InjectMetric(PROSPECTS_GENERATED_TOTAL)
    private readonly generatedCounter: Counter<string>,
    @InjectMetric(PROSPECT_GENERATION_DURATION)
    private readonly durationHistogram: Histogram<string>,
  ) {}

  listProviders(): string[] {
    return this.registry.listAvailableProviders();
  }

  /**
   * Generates up to `count` companies for an ICP. Falls back to the static
   * catalog when every provider fails or the answer cannot be recovered.
   *
   * @throws NoProvidersConfiguredError when no provider passed its startup availability check
   * @throws RateLimitedError when the provider errors mention rate limiting
   */
  async generate(icp: string, count = 10): Promise<GeneratedProspects> {
    if (!this.registry.hasProviders()) {
      throw new NoProvidersConfiguredError();
    }

    const stopTimer = this.durationHistogram.startTimer();
    try {
      const response = await this.registry.generateCompletion(
        buildProspectPrompt(icp, count),
        SYSTEM_PROMPT,
        2000,
      );

      if (!response.succeeded) {
        if (isRateLimitMessage(response.error)) {
          this.logger.warn(`Rate limit hit: ${response.error}`);
          this.generatedCounter.inc({ source: 'rate_limited' });
          throw new RateLimitedError(response.error);
        }
        this.logger.error(`LLM generation failed: ${response.error}`);
        return this.generateFallback(icp, count);
      }

      this.logger.log(
        `Raw response from ${response.provider}: ${response.text.slice(0, 200)}`,
      );

      const companies = recoverCompanies(response.text);
      if (companies.length === 0) {
        this.logger.warn(
          `Could not recover companies from ${response.provider} response, using fallback`,
        );
        return this.generateFallback(icp, count);
      }

      this.logger.log(`Recovered ${companies.length} companies`);
      this.generatedCounter.inc({ source: 'llm' });
      return { source: 'llm', companies };
    } finally {
      stopTimer();
    }
  }

  /** Catalog-only path; needs no provider. */
  generateFallback(icp: string, count = 10): GeneratedProspects {
    const companies = getFallbackCompanies(icp, count);
    this.logger.log(`Using ${companies.length} fallback companies`);
    this.generatedCounter.inc({ source: 'fallback' });
    return { source: 'fallback', companies };
  }
}
