export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

interface CompletionBase {
  text: string;
  model: string;
  provider: string;
}

export interface CompletionSuccess extends CompletionBase {
  succeeded: true;
}

export interface CompletionFailure extends CompletionBase {
  succeeded: false;
  error: string;
}

/** Outcome of a single provider call. `error` exists only on failure. */
export type CompletionResult = CompletionSuccess | CompletionFailure;

export interface LlmProvider {
  readonly name: string;
  readonly model: string;

  /** Local providers ping the service; hosted ones only check for a credential. */
  isAvailable(): Promise<boolean>;

  /** One attempt, never throws: transport and HTTP errors come back as failures. */
  generate(
    prompt: string,
    systemPrompt?: string,
    maxTokens?: number,
  ): Promise<CompletionResult>;
}

export const DEFAULT_MAX_TOKENS = 2000;

export const LLM_REGISTRY = 'LLM_REGISTRY';

export function buildMessages(
  prompt: string,
  systemPrompt?: string,
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  messages.push({ role: 'user', content: prompt });
  return messages;
}

export function completionSuccess(
  provider: LlmProvider,
  text: string,
): CompletionSuccess {
  return {
    text,
    model: provider.model,
    provider: provider.name,
    succeeded: true,
  };
}

export function completionFailure(
  provider: Pick<LlmProvider, 'name' | 'model'>,
  error: string,
): CompletionFailure {
  return {
    text: '',
    model: provider.model,
    provider: provider.name,
    succeeded: false,
    error,
  };
}
