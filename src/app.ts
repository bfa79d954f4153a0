import { env } from './config/env';
import { BusinessRules, loadBusinessRules } from './config/rules-config';
import { logger } from './observability/logger';
import { CsvCatalogDataSource } from './catalog/csv-data-source';
import { HistoricalOutcome, Message, Product } from './catalog/types';
import { buildProviders, parseProviderName, parseRoutingStrategy } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { LLMProvider, LLMProviderName, ModelRouterConfig } from './llm/types';
import { PromptManager } from './inference/prompt-manager';
import { LLMInferenceService } from './inference/llm-inference-service';
import { InferenceService } from './inference/types';
import { IntentClassifier } from './recommendations/intent-classifier';
import { ProductSelector } from './recommendations/product-selector';
import { RecommendationPipeline } from './recommendations/recommendation-pipeline';

export interface CatalogSnapshot {
  dataSource: CsvCatalogDataSource;
  products: Product[];
  messages: Message[];
  outcomes: Map<string, HistoricalOutcome>;
}

export interface RecommenderContext {
  pipeline: RecommendationPipeline;
  rules: BusinessRules;
}

export interface RecommenderOptions {
  rules?: BusinessRules;
  /** Replaces the LLM-backed service (tests, offline runs) */
  inference?: InferenceService;
  interMessageDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export async function loadCatalog(dataDir: string = env.pipeline.dataDir): Promise<CatalogSnapshot> {
  const dataSource = new CsvCatalogDataSource(dataDir);
  const products = await dataSource.loadProducts();
  const messages = await dataSource.loadMessages();
  const outcomes = await dataSource.loadHistoricalOutcomes();

  if (dataSource.warnings.length > 0) {
    logger.warn({ dataDir, warnings: dataSource.warnings.length }, 'Some rows were skipped while loading data');
  }

  return { dataSource, products, messages, outcomes };
}

export function buildRouterConfig(): ModelRouterConfig {
  const classify = parseProviderName(env.llm.classifyProvider, 'LLM_CLASSIFY_PROVIDER');
  const rank = parseProviderName(env.llm.rankProvider, 'LLM_RANK_PROVIDER');
  const primaryProvider = parseProviderName(env.llm.primaryProvider, 'LLM_PRIMARY_PROVIDER');
  if (!primaryProvider) {
    throw new Error('LLM_PRIMARY_PROVIDER must name a provider');
  }

  return {
    primaryProvider,
    secondaryProvider: parseProviderName(env.llm.secondaryProvider, 'LLM_SECONDARY_PROVIDER'),
    tertiaryProvider: parseProviderName(env.llm.tertiaryProvider, 'LLM_TERTIARY_PROVIDER'),
    strategy: parseRoutingStrategy(env.llm.routingStrategy),
    abTestSplit: env.llm.abTestSplit,
    stageRouting: {
      ...(classify ? { classify } : {}),
      ...(rank ? { rank } : {}),
    },
  };
}

export function buildInferenceService(
  rules: BusinessRules,
  providers: Map<LLMProviderName, LLMProvider> = buildProviders(env),
): LLMInferenceService {
  const routerConfig = buildRouterConfig();
  const router = new ModelRouter(routerConfig, providers);

  logger.info({
    primary: routerConfig.primaryProvider,
    secondary: routerConfig.secondaryProvider,
    strategy: routerConfig.strategy,
    providerCount: providers.size,
  }, 'Inference stack initialized');

  return new LLMInferenceService(router, new PromptManager(), {
    maxRetries: env.inference.maxRetries,
    retryBaseDelayMs: env.inference.retryBaseDelayMs,
    classifyMaxTokens: env.inference.classifyMaxTokens,
    rankMaxTokens: env.inference.rankMaxTokens,
    temperature: env.inference.temperature,
    maxRecommendations: rules.maxRecommendations,
  });
}

/**
 * Wire classifier, selector and pipeline over a product snapshot.
 */
export function buildRecommender(products: readonly Product[], options: RecommenderOptions = {}): RecommenderContext {
  const rules = options.rules ?? loadBusinessRules();
  const inference = options.inference ?? buildInferenceService(rules);

  const classifier = new IntentClassifier(inference);
  const selector = new ProductSelector(inference, {
    maxCandidates: rules.maxCandidates,
    maxRecommendations: rules.maxRecommendations,
  });
  const pipeline = new RecommendationPipeline(products, classifier, selector, {
    rules,
    interMessageDelayMs: options.interMessageDelayMs ?? env.pipeline.interMessageDelayMs,
    sleep: options.sleep,
  });

  return { pipeline, rules };
}
