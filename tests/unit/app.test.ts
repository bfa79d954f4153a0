import * as path from 'path';
import { buildInferenceService, buildRecommender, buildRouterConfig, loadCatalog } from '../../src/app';
import { DEFAULT_RULES } from '../../src/config/rules-config';
import { FakeProvider, providerMap } from '../helpers/fake-provider';
import { makeProduct, noIntentJudgement, stubInference, TEST_RULES } from '../helpers/fixtures';

jest.mock('../../src/config/env', () => ({
  env: {
    llm: {
      primaryProvider: 'gemini',
      secondaryProvider: 'openai',
      tertiaryProvider: '',
      routingStrategy: 'stage',
      abTestSplit: 80,
      classifyProvider: '',
      rankProvider: 'openai',
    },
    inference: { maxRetries: 0, retryBaseDelayMs: 1, classifyMaxTokens: 100, rankMaxTokens: 200, temperature: 0.3 },
    pipeline: {
      dataDir: 'data',
      outputPath: 'recommendations.csv',
      interMessageDelayMs: 0,
      rulesPath: '/nonexistent/rules.yaml',
    },
    rules: {},
  },
}));

describe('application wiring', () => {
  it('should build the router configuration from the environment', () => {
    expect(buildRouterConfig()).toEqual({
      primaryProvider: 'gemini',
      secondaryProvider: 'openai',
      tertiaryProvider: undefined,
      strategy: 'stage',
      abTestSplit: 80,
      stageRouting: { rank: 'openai' },
    });
  });

  it('should send ranking calls to the provider pinned for that stage', async () => {
    const gemini = new FakeProvider('gemini');
    const openai = new FakeProvider('openai').respondWith('{"recommendations":[]}');
    const service = buildInferenceService(TEST_RULES, providerMap(gemini, openai));

    await expect(service.rank('Need shoes', [], { messageId: 'M1' })).resolves.toEqual([]);

    expect(openai.complete).toHaveBeenCalledTimes(1);
    expect(gemini.complete).not.toHaveBeenCalled();
    expect(openai.complete.mock.calls[0][0]).toMatchObject({ maxTokens: 200, temperature: 0.3 });
  });

  it('should fall back to default rules when no rules file exists', async () => {
    const inference = stubInference();
    inference.classify.mockResolvedValue(noIntentJudgement());

    const { pipeline, rules } = buildRecommender([makeProduct({ id: 'P1' })], { inference });

    expect(rules).toEqual(DEFAULT_RULES);
    await expect(pipeline.recommendText('hello')).resolves.toMatchObject({ kind: 'no_intent' });
  });

  it('should load the sample catalog', async () => {
    const catalog = await loadCatalog(path.resolve(__dirname, '..', '..', 'data'));

    expect(catalog.products).toHaveLength(14);
    expect(catalog.messages).toHaveLength(8);
    expect(catalog.outcomes.get('M001')).toEqual({
      messageId: 'M001',
      clickedProductIds: ['P001', 'P004'],
      purchasedProductId: 'P001',
    });
    expect(catalog.dataSource.warnings).toEqual([]);
  });
});
