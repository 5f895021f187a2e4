import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const LLM_COMPLETIONS_TOTAL = 'llm_completions_total';
export const PROSPECTS_GENERATED_TOTAL = 'prospects_generated_total';
export const PROSPECT_GENERATION_DURATION =
  'prospect_generation_duration_seconds';
export const EMAILS_SENT_TOTAL = 'emails_sent_total';

export const llmMetricsProviders = [
  makeCounterProvider({
    name: LLM_COMPLETIONS_TOTAL,
    help: 'Completion attempts per LLM provider',
    labelNames: ['provider', 'status'],
  }),
];

export const prospectMetricsProviders = [
  makeCounterProvider({
    name: PROSPECTS_GENERATED_TOTAL,
    help: 'Prospect generation requests by result source',
    labelNames: ['source'],
  }),
  makeHistogramProvider({
    name: PROSPECT_GENERATION_DURATION,
    help: 'Duration of prospect generation in seconds',
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  }),
];

export const campaignMetricsProviders = [
  makeCounterProvider({
    name: EMAILS_SENT_TOTAL,
    help: 'Outreach emails dispatched',
    labelNames: ['status'],
  }),
];
