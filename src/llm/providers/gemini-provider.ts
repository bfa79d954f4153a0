import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';

/**
 * Google Gemini provider adapter.
 *
 * - System messages become `systemInstruction`.
 * - Role mapping: 'assistant' → 'model'.
 * - JSON mode via `responseMimeType: 'application/json'`.
 * - The client timeout is passed per request through `RequestOptions`.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;
  private timeoutMs: number;

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const systemInstruction = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const contents: Content[] = request.messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    const model = this.genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: systemInstruction || undefined,
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
        },
      },
      { timeout: this.timeoutMs },
    );

    const result = await model.generateContent({ contents });
    const response = result.response;
    const content = response.text();

    if (!content) {
      throw new Error('Gemini returned empty response');
    }

    const usageMetadata = response.usageMetadata;

    return {
      content,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usageMetadata?.promptTokenCount ?? 0,
        completionTokens: usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: usageMetadata?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }
}
