import { isRecord, LlmConfig } from '../config.js';
import { DependencyUnavailableError, toCapabilityError } from '../errors.js';

export interface CompletionOptions {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

/** External text-generation capability. */
export interface TextCompletion {
  readonly model: string;
  complete(prompt: string, opts?: CompletionOptions): Promise<string>;
}

function completionText(json: unknown): string | null {
  if (!isRecord(json) || !Array.isArray(json.choices)) return null;
  const [first] = json.choices;
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  return typeof content === 'string' ? content : null;
}

/**
 * Chat-completions client for OpenAI-compatible APIs (DeepSeek by default).
 */
export class OpenAICompatibleCompletion implements TextCompletion {
  readonly model: string;

  constructor(
    private readonly apiKey: string,
    private readonly config: Omit<LlmConfig, 'apiKey'>
  ) {
    this.model = config.model;
  }

  async complete(prompt: string, opts: CompletionOptions = {}): Promise<string> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    let json: unknown;
    try {
      const res = await fetch(`${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: opts.temperature ?? this.config.temperature,
          max_tokens: opts.maxTokens ?? this.config.maxTokens
        }),
        signal
      });
      if (!res.ok) {
        const body = await res.text();
        throw new DependencyUnavailableError(`completion API error (${res.status}): ${body.slice(0, 200)}`);
      }
      json = await res.json();
    } catch (error) {
      throw toCapabilityError(`completion model ${this.model}`, error);
    }

    const text = completionText(json);
    if (text === null) {
      throw new DependencyUnavailableError(`completion model ${this.model} returned no message content`);
    }
    return text.trim();
  }
}

/** Null when no API key is configured; callers then use template answers. */
export function createCompletion(config: LlmConfig): TextCompletion | null {
  if (!config.apiKey) return null;
  const { apiKey, ...rest } = config;
  return new OpenAICompatibleCompletion(apiKey, rest);
}
