import { afterEach, describe, expect, it, vi } from 'vitest';
import { createCompletion, OpenAICompatibleCompletion } from '../src/llm/completion.js';
import { loadConfig } from '../src/config.js';
import { CapabilityTimeoutError, DependencyUnavailableError } from '../src/errors.js';

const LLM = {
  baseUrl: 'https://llm.test/v1/',
  model: 'test-chat',
  temperature: 0.7,
  maxTokens: 500,
  timeoutMs: 5000
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAICompatibleCompletion', () => {
  it('posts a chat completion and trims the reply', async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response(JSON.stringify({ choices: [{ message: { content: '  The answer.  ' } }] }), { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);

    const reply = await new OpenAICompatibleCompletion('test-secret', LLM).complete('Question?', { temperature: 0 });

    expect(reply).toBe('The answer.');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-chat',
      messages: [{ role: 'user', content: 'Question?' }],
      temperature: 0,
      max_tokens: 500
    });
  });

  it('reports HTTP errors as an unavailable dependency', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota exceeded', { status: 429 })));
    const call = new OpenAICompatibleCompletion('test-secret', LLM).complete('hi');
    await expect(call).rejects.toBeInstanceOf(DependencyUnavailableError);
    await expect(call).rejects.toThrow('completion API error (429): quota exceeded');
  });

  it('rejects replies without message content', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 })));
    await expect(new OpenAICompatibleCompletion('test-secret', LLM).complete('hi')).rejects.toThrow(
      'completion model test-chat returned no message content'
    );
  });

  it('maps network failures and timeouts', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    await expect(new OpenAICompatibleCompletion('test-secret', LLM).complete('hi')).rejects.toThrow(
      'completion model test-chat unavailable: fetch failed'
    );

    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      })
    );
    await expect(new OpenAICompatibleCompletion('test-secret', LLM).complete('hi')).rejects.toBeInstanceOf(
      CapabilityTimeoutError
    );
  });
});

describe('createCompletion', () => {
  it('is disabled without an API key', () => {
    expect(createCompletion(loadConfig({}).llm)).toBeNull();
  });

  it('uses the configured model', () => {
    const completion = createCompletion(loadConfig({ DEEPSEEK_API_KEY: 'test-secret', KB_LLM_MODEL: 'other-model' }).llm);
    expect(completion?.model).toBe('other-model');
  });
});
