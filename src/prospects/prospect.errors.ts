export class NoProvidersConfiguredError extends Error {
  constructor() {
    super(
      'No LLM providers available. Set up at least one provider (Ollama, Groq, Together AI or Hugging Face).',
    );
    this.name = 'NoProvidersConfiguredError';
  }
}

/** The providers reported throttling; retrying later may succeed. */
export class RateLimitedError extends Error {
  constructor(readonly detail: string) {
    super('Rate limit exceeded. Please wait a moment and try again.');
    this.name = 'RateLimitedError';
  }
}

/** Substring check on provider error text; any mention of "rate" counts. */
export function isRateLimitMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes('rate') || lower.includes('429');
}

export class ProspectsFileNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`No prospects exported yet (${path})`);
    this.name = 'ProspectsFileNotFoundError';
  }
}

export class InvalidProspectsFileError extends Error {
  constructor(readonly missingHeaders: readonly string[]) {
    super(`Missing required headers: ${missingHeaders.join(', ')}`);
    this.name = 'InvalidProspectsFileError';
  }
}
