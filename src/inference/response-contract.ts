import Ajv, { SchemaObject } from 'ajv';
import { InferenceStage } from '../llm/types';
import { InferenceError } from './errors';
import { ClassificationJudgement, RankedProductJudgement, Sentiment } from './types';

/**
 * JSON Schema for the classification call.
 * The model is instructed to return JSON matching this schema.
 */
export const CLASSIFICATION_RESPONSE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    purchase_intent: {
      type: 'boolean',
      description: 'True only if the user is looking to buy or is considering buying a product.',
    },
    categories: {
      type: 'array',
      items: { type: 'string' },
      description: 'Up to 3 categories from the provided list, most relevant first. Empty when purchase_intent is false.',
    },
    sentiment: {
      type: 'string',
      enum: ['positive', 'neutral', 'negative'],
    },
    about_prior_purchase: {
      type: 'boolean',
      description: 'True when the message is about a product the user already bought.',
    },
    reasoning: { type: 'string' },
  },
  required: ['purchase_intent', 'categories', 'sentiment', 'about_prior_purchase', 'reasoning'],
};

/**
 * JSON Schema for the ranking call.
 */
export const RANKING_RESPONSE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    recommendations: {
      type: 'array',
      maxItems: 3,
      items: {
        type: 'object',
        properties: {
          product_id: { type: 'string' },
          confidence: { type: 'number', minimum: 0, maximum: 1 },
          reasoning: { type: 'string' },
        },
        required: ['product_id', 'confidence'],
      },
    },
    reasoning: {
      type: 'string',
      description: 'One sentence explaining why these products, in this order.',
    },
  },
  required: ['recommendations'],
};

interface RawClassification {
  purchase_intent: boolean;
  categories: string[];
  sentiment: Sentiment;
  about_prior_purchase: boolean;
  reasoning: string;
}

interface RawRanking {
  recommendations: Array<{ product_id: string; confidence: number; reasoning?: string }>;
  reasoning?: string;
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateClassification = ajv.compile<RawClassification>(CLASSIFICATION_RESPONSE_SCHEMA);
const validateRanking = ajv.compile<RawRanking>(RANKING_RESPONSE_SCHEMA);

/**
 * Parse model text as JSON. Handles both clean JSON and markdown-wrapped JSON.
 */
export function parseJsonResponse(raw: string, stage: InferenceStage): unknown {
  let jsonStr = raw.trim();

  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '');
  }

  try {
    return JSON.parse(jsonStr);
  } catch (err) {
    throw new InferenceError('malformed', stage, `Response is not valid JSON: ${jsonStr.slice(0, 120)}`, err);
  }
}

export function parseClassificationResponse(raw: string): ClassificationJudgement {
  const parsed = parseJsonResponse(raw, 'classify');
  if (!validateClassification(parsed)) {
    throw new InferenceError('malformed', 'classify', `Classification response failed validation: ${ajv.errorsText(validateClassification.errors)}`);
  }

  return {
    hasPurchaseIntent: parsed.purchase_intent,
    categories: parsed.categories,
    sentiment: parsed.sentiment,
    refersToPriorPurchase: parsed.about_prior_purchase,
    reasoning: parsed.reasoning,
  };
}

export function parseRankingResponse(raw: string): RankedProductJudgement[] {
  const parsed = parseJsonResponse(raw, 'rank');
  if (!validateRanking(parsed)) {
    throw new InferenceError('malformed', 'rank', `Ranking response failed validation: ${ajv.errorsText(validateRanking.errors)}`);
  }

  const overall = parsed.reasoning ?? '';
  return parsed.recommendations.map((r) => ({
    productId: r.product_id,
    confidence: r.confidence,
    reasoning: r.reasoning || overall,
  }));
}
