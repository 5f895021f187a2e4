import { ChatCompletionsProvider } from './chat-completions.provider';

export class TogetherAiProvider extends ChatCompletionsProvider {
  readonly name = 'Together AI';
  protected readonly baseUrl = 'https://api.together.xyz/v1';
  protected readonly defaultModel = 'meta-llama/Llama-2-7b-chat-hf';
}
