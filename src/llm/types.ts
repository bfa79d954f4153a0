// ─── Provider Names ───────────────────────────────────────────────
export const LLM_PROVIDER_NAMES = ['openai', 'anthropic', 'gemini'] as const;
export type LLMProviderName = (typeof LLM_PROVIDER_NAMES)[number];

// ─── Routing Strategy ─────────────────────────────────────────────
export const ROUTING_STRATEGIES = ['config', 'stage', 'ab_test'] as const;
export type RoutingStrategy = (typeof ROUTING_STRATEGIES)[number];

/** Pipeline step an LLM call belongs to */
export type InferenceStage = 'classify' | 'rank';

// ─── Messages ─────────────────────────────────────────────────────
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
  /** Hint providers to produce JSON output */
  jsonMode: boolean;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  /** Raw text from the model (must be JSON-parseable when jsonMode was true) */
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  /** Which provider served the request */
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  /** Wall-clock latency in milliseconds */
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations must map our generic message format to provider-specific APIs.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

// ─── Model Router Configuration ───────────────────────────────────
export interface ModelRouterConfig {
  primaryProvider: LLMProviderName;
  secondaryProvider?: LLMProviderName;
  tertiaryProvider?: LLMProviderName;
  strategy: RoutingStrategy;
  /** Percentage of traffic for primary in A/B test (0–100) */
  abTestSplit: number;
  /** Stage → provider overrides for stage-based routing */
  stageRouting?: Partial<Record<InferenceStage, LLMProviderName>>;
}

// ─── Routing Context ──────────────────────────────────────────────
export interface ModelRoutingContext {
  messageId: string;
  stage: InferenceStage;
  requestId?: string;
}
