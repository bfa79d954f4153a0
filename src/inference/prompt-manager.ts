import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/inference/ or src/inference/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

export type PromptName = 'classification' | 'ranking';

const PROMPT_NAMES: PromptName[] = ['classification', 'ranking'];

const BUILT_IN_PROMPTS: Record<PromptName, string> = {
  classification: [
    'Classify the user message for an online store.',
    'Decide whether the user has purchase intent (complaints and questions do not count),',
    'the message sentiment, whether it is about a prior purchase,',
    'and, only with purchase intent, up to 3 categories from this list, most relevant first:',
    '{{categories}}',
  ].join('\n'),
  ranking: [
    'Select up to {{maxRecommendations}} products from the candidate list that best match the user message,',
    'ranked by relevance, each with a confidence between 0 and 1.',
    'Only use product ids from the candidate list.',
  ].join('\n'),
};

/**
 * Loads prompt templates from `prompts/<name>.md`, falling back to a short
 * built-in template when a file is missing. `{{var}}` placeholders are filled by `render`.
 */
export class PromptManager {
  private templates = new Map<PromptName, string>();

  constructor(private readonly promptsDir: string = PROMPTS_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.templates.clear();
    for (const name of PROMPT_NAMES) {
      const filepath = path.join(this.promptsDir, `${name}.md`);
      if (!fs.existsSync(filepath)) {
        logger.warn({ filepath }, 'Prompt file not found; using built-in template');
        this.templates.set(name, BUILT_IN_PROMPTS[name]);
        continue;
      }
      this.templates.set(name, fs.readFileSync(filepath, 'utf-8').trim());
    }
  }

  render(name: PromptName, vars: Record<string, string | number> = {}): string {
    const template = this.templates.get(name) ?? BUILT_IN_PROMPTS[name];
    return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
      key in vars ? String(vars[key]) : match,
    );
  }
}
