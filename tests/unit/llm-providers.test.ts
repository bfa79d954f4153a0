import { AnthropicProvider } from '../../src/llm/providers/anthropic-provider';
import { GeminiProvider } from '../../src/llm/providers/gemini-provider';
import { OpenAIProvider } from '../../src/llm/providers/openai-provider';
import { buildProviders, parseProviderName, parseRoutingStrategy } from '../../src/llm/provider-factory';
import { LLMCompletionRequest, LLMProviderConfig } from '../../src/llm/types';

const mockOpenAICreate = jest.fn();
const mockAnthropicCreate = jest.fn();
const mockGenerateContent = jest.fn();
const mockGetGenerativeModel = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: (...args: unknown[]) => mockOpenAICreate(...args) } },
  })),
}));

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    messages: { create: (...args: unknown[]) => mockAnthropicCreate(...args) },
  })),
}));

jest.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: jest.fn().mockImplementation(() => ({
    getGenerativeModel: (...args: unknown[]) => mockGetGenerativeModel(...args),
  })),
}));

const config: LLMProviderConfig = {
  apiKey: 'test-key',
  model: 'test-model',
  timeoutMs: 5000,
};

const request: LLMCompletionRequest = {
  messages: [
    { role: 'system', content: 'Answer in JSON' },
    { role: 'user', content: 'Need shoes' },
  ],
  temperature: 0,
  maxTokens: 128,
  jsonMode: true,
};

beforeEach(() => {
  jest.clearAllMocks();
  mockGetGenerativeModel.mockReturnValue({ generateContent: mockGenerateContent });
});

describe('OpenAIProvider', () => {
  it('should request JSON output and map usage', async () => {
    mockOpenAICreate.mockResolvedValue({
      model: 'gpt-test',
      choices: [{ message: { content: '{"ok":true}' } }],
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    });

    const response = await new OpenAIProvider(config).complete(request);

    expect(mockOpenAICreate).toHaveBeenCalledWith({
      model: 'test-model',
      messages: request.messages,
      temperature: 0,
      max_tokens: 128,
      response_format: { type: 'json_object' },
    });
    expect(response).toMatchObject({
      content: '{"ok":true}',
      model: 'gpt-test',
      provider: 'openai',
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    });
  });

  it('should reject an empty answer', async () => {
    mockOpenAICreate.mockResolvedValue({ choices: [{ message: { content: '' } }] });

    await expect(new OpenAIProvider(config).complete(request)).rejects.toThrow('OpenAI returned empty response content');
  });
});

describe('AnthropicProvider', () => {
  it('should move system text aside and prefill the JSON brace', async () => {
    mockAnthropicCreate.mockResolvedValue({
      model: 'claude-test',
      content: [{ type: 'text', text: '"ok":true}' }],
      usage: { input_tokens: 20, output_tokens: 4 },
    });

    const response = await new AnthropicProvider(config).complete(request);

    expect(mockAnthropicCreate).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 128,
      temperature: 0,
      system: 'Answer in JSON',
      messages: [
        { role: 'user', content: 'Need shoes' },
        { role: 'assistant', content: '{' },
      ],
    });
    expect(response.content).toBe('{"ok":true}');
    expect(response.usage.totalTokens).toBe(24);
  });
});

describe('GeminiProvider', () => {
  it('should pass the system instruction, JSON mime type and timeout', async () => {
    mockGenerateContent.mockResolvedValue({
      response: {
        text: () => '{"ok":true}',
        usageMetadata: { promptTokenCount: 7, candidatesTokenCount: 2, totalTokenCount: 9 },
      },
    });

    const response = await new GeminiProvider(config).complete(request);

    expect(mockGetGenerativeModel).toHaveBeenCalledWith(
      {
        model: 'test-model',
        systemInstruction: 'Answer in JSON',
        generationConfig: { temperature: 0, maxOutputTokens: 128, responseMimeType: 'application/json' },
      },
      { timeout: 5000 },
    );
    expect(mockGenerateContent).toHaveBeenCalledWith({
      contents: [{ role: 'user', parts: [{ text: 'Need shoes' }] }],
    });
    expect(response).toMatchObject({ content: '{"ok":true}', provider: 'gemini', usage: { totalTokens: 9 } });
  });
});

describe('provider factory', () => {
  const empty = { ...config, apiKey: '' };

  it('should only build providers that have a key', () => {
    const providers = buildProviders({ openai: empty, anthropic: config, gemini: empty });

    expect([...providers.keys()]).toEqual(['anthropic']);
  });

  it('should refuse to start without any key', () => {
    expect(() => buildProviders({ openai: empty, anthropic: empty, gemini: empty })).toThrow(
      /^No LLM providers configured/,
    );
  });

  it('should parse provider and strategy settings', () => {
    expect(parseProviderName('', 'LLM_SECONDARY_PROVIDER')).toBeUndefined();
    expect(parseProviderName('anthropic', 'LLM_SECONDARY_PROVIDER')).toBe('anthropic');
    expect(() => parseProviderName('mistral', 'LLM_SECONDARY_PROVIDER')).toThrow(
      'LLM_SECONDARY_PROVIDER="mistral" is not a supported provider (openai, anthropic, gemini)',
    );
    expect(parseRoutingStrategy('ab_test')).toBe('ab_test');
    expect(() => parseRoutingStrategy('random')).toThrow('LLM_ROUTING_STRATEGY="random"');
  });
});
