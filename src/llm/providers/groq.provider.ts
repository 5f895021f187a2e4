import { ChatCompletionsProvider } from './chat-completions.provider';

export class GroqProvider extends ChatCompletionsProvider {
  readonly name = 'Groq';
  protected readonly baseUrl = 'https://api.groq.com/openai/v1';
  protected readonly defaultModel = 'llama-3.3-70b-versatile';
}
