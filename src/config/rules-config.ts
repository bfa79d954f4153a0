import * as fs from 'fs';
import yaml from 'js-yaml';
import Ajv, { SchemaObject } from 'ajv';
import { env } from './env';
import { logger } from '../observability/logger';

/**
 * Business rules applied by the candidate filter and selector.
 * Loaded from `config/rules.yaml`; environment variables win over the file.
 */
export interface BusinessRules {
  /** Products rated below this are never candidates */
  minRating: number;
  /** Stock needed to count as available (preorder-eligible products bypass it) */
  minStock: number;
  /** Upper bound on candidates sent to the ranker in one prompt */
  maxCandidates: number;
  /** Recommendations kept per message (never more than 3) */
  maxRecommendations: number;
}

export type RuleOverrides = { [K in keyof BusinessRules]?: number };

export const DEFAULT_RULES: BusinessRules = {
  minRating: 3.5,
  minStock: 1,
  maxCandidates: 40,
  maxRecommendations: 3,
};

const RULES_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    minRating: { type: 'number', minimum: 0, maximum: 5 },
    minStock: { type: 'integer', minimum: 1 },
    maxCandidates: { type: 'integer', minimum: 1 },
    maxRecommendations: { type: 'integer', minimum: 1, maximum: 3 },
  },
  required: ['minRating', 'minStock', 'maxCandidates', 'maxRecommendations'],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateRules = ajv.compile<BusinessRules>(RULES_SCHEMA);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadBusinessRules(
  filePath: string = env.pipeline.rulesPath,
  overrides: RuleOverrides = env.rules,
): BusinessRules {
  let fromFile: Record<string, unknown> = {};

  if (!fs.existsSync(filePath)) {
    logger.warn({ filePath }, 'Rules file not found; using built-in defaults');
  } else {
    const loaded: unknown = yaml.load(fs.readFileSync(filePath, 'utf-8'));
    if (loaded !== null && loaded !== undefined) {
      if (!isRecord(loaded)) {
        throw new Error(`Rules file ${filePath} must contain a mapping`);
      }
      fromFile = loaded;
    }
  }

  const merged: Record<string, unknown> = { ...DEFAULT_RULES, ...fromFile };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  if (!validateRules(merged)) {
    const errors = validateRules.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid business rules: ${errors}`);
  }

  const rules: BusinessRules = {
    minRating: merged.minRating,
    minStock: merged.minStock,
    maxCandidates: merged.maxCandidates,
    maxRecommendations: merged.maxRecommendations,
  };
  logger.info({ ...rules, filePath }, 'Business rules loaded');
  return rules;
}
