// OpenAI chat completions behind GenerativeTextProvider. One attempt per call:
// retries are disabled so a failure reaches the caller's fallback immediately.
import OpenAI from 'openai';
import type { GenerateOptions, GenerativeTextProvider } from '@/services/llm/generative-provider';

export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;

const DEFAULT_SYSTEM = 'You are a helpful travel assistant.';

export interface OpenAiProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export class OpenAiTextProvider implements GenerativeTextProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const res = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages: [
          { role: 'system', content: options.system ?? DEFAULT_SYSTEM },
          { role: 'user', content: prompt },
        ],
        temperature: 0.7,
        max_tokens: 2048,
      },
      {
        timeout: options.timeoutMs ?? this.options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS,
        signal: options.signal,
      },
    );
    return res.choices[0]?.message?.content ?? '';
  }
}
