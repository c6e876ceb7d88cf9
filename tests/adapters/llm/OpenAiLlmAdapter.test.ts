import { APIError } from 'openai';
import { OpenAiLlmAdapter, toChatMessage } from '../../../src/adapters/llm/OpenAiLlmAdapter';
import { ModelUnavailableError } from '../../../src/shared/errors';

const mockCreate = jest.fn();
const mockGetOpenAI = jest.fn();

jest.mock('../../../src/openai', () => ({
  getOpenAI: (...args: unknown[]) => {
    mockGetOpenAI(...args);
    return { chat: { completions: { create: mockCreate } } };
  },
}));

async function* chunks(...parts: Array<string | null>) {
  for (const part of parts) {
    yield { choices: part === null ? [] : [{ delta: { content: part } }] };
  }
}

describe('OpenAiLlmAdapter', () => {
  afterEach(() => {
    jest.clearAllMocks();
  });

  test('streams a completion and joins the deltas', async () => {
    mockCreate.mockResolvedValue(chunks('Hel', null, 'lo'));
    const adapter = new OpenAiLlmAdapter({ apiKey: 'test-secret', model: 'test-model' });

    const text = await adapter.generate([
      { role: 'system', text: 'be brief' },
      { role: 'user', text: 'hi' },
      { role: 'model', text: 'hello' },
    ]);

    expect(text).toBe('Hello');
    expect(mockGetOpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret', model: 'test-model' });
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ],
      temperature: 0.7,
      top_p: 0.95,
      max_tokens: 8192,
      stream: true,
    });
  });

  test('per-call options override configured defaults', async () => {
    mockCreate.mockResolvedValue(chunks('ok'));
    const adapter = new OpenAiLlmAdapter({
      apiKey: 'test-secret',
      model: 'test-model',
      defaults: { temperature: 0.2, maxOutputTokens: 100 },
    });

    await adapter.generate([{ role: 'user', text: 'hi' }], { temperature: 1 });

    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({ temperature: 1, top_p: 0.95, max_tokens: 100 })
    );
  });

  test('API errors become ModelUnavailableError', async () => {
    mockCreate.mockRejectedValue(new APIError(503, undefined, 'Service Unavailable', undefined));
    const adapter = new OpenAiLlmAdapter({ apiKey: 'test-secret', model: 'test-model' });

    const failure = adapter.generate([{ role: 'user', text: 'hi' }]);
    await expect(failure).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(failure).rejects.toThrow(/^Model request failed: /);
  });

  test('other errors pass through untouched', async () => {
    const boom = new TypeError('bad input');
    mockCreate.mockRejectedValue(boom);
    const adapter = new OpenAiLlmAdapter({ apiKey: 'test-secret', model: 'test-model' });
    await expect(adapter.generate([{ role: 'user', text: 'hi' }])).rejects.toBe(boom);
  });

  test('toChatMessage maps the model role to assistant', () => {
    expect(toChatMessage({ role: 'model', text: 'x' })).toEqual({ role: 'assistant', content: 'x' });
  });
});
