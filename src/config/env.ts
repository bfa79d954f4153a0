import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalNumber(key: string): number | undefined {
  const val = process.env[key];
  if (!val) return undefined;
  const parsed = Number(val);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export const env = {
  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-20241022'),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-2.5-flash-lite'),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 30000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'gemini'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
    tertiaryProvider: optional('LLM_TERTIARY_PROVIDER', ''),
    routingStrategy: optional('LLM_ROUTING_STRATEGY', 'config'),
    abTestSplit: optionalInt('LLM_AB_TEST_SPLIT', 80),
    classifyProvider: optional('LLM_CLASSIFY_PROVIDER', ''),
    rankProvider: optional('LLM_RANK_PROVIDER', ''),
  },

  // ───── Inference ─────
  inference: {
    maxRetries: optionalInt('INFERENCE_MAX_RETRIES', 2),
    retryBaseDelayMs: optionalInt('INFERENCE_RETRY_BASE_DELAY_MS', 1000),
    classifyMaxTokens: optionalInt('INFERENCE_CLASSIFY_MAX_TOKENS', 512),
    rankMaxTokens: optionalInt('INFERENCE_RANK_MAX_TOKENS', 1024),
    temperature: optionalFloat('INFERENCE_TEMPERATURE', 0),
  },

  // ───── Pipeline ─────
  pipeline: {
    dataDir: optional('DATA_DIR', 'data'),
    outputPath: optional('RECOMMENDATIONS_OUTPUT', 'recommendations.csv'),
    // Free-tier Gemini allows ~15 requests/minute; two calls per message
    interMessageDelayMs: optionalInt('INTER_MESSAGE_DELAY_MS', 8000),
    rulesPath: optional('RULES_CONFIG_PATH', path.join(projectRoot, 'config', 'rules.yaml')),
  },

  // ───── Business rule overrides (take precedence over rules.yaml) ─────
  rules: {
    minRating: optionalNumber('MIN_RATING'),
    minStock: optionalNumber('MIN_STOCK'),
    maxCandidates: optionalNumber('MAX_CANDIDATES'),
    maxRecommendations: optionalNumber('MAX_RECOMMENDATIONS'),
  },
} as const;
