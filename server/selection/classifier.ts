import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import { DOCUMENT_CATEGORIES, type CategorySource, type DocumentCategory } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { rateLimitedGenerateText } from '../services/genai';
import { parseJsonPayload } from '../utils/jsonExtract';
import { classifyByRules } from './categoryRules';

export interface ClassificationInput {
  title: string;
  filename: string;
  url: string;
}

export interface CategoryClassifier {
  readonly name: string;
  classify: (input: ClassificationInput) => Promise<DocumentCategory>;
}

export class RuleBasedClassifier implements CategoryClassifier {
  readonly name = 'rules';

  async classify(input: ClassificationInput): Promise<DocumentCategory> {
    return classifyByRules(input.title, input.filename);
  }
}

const OracleReplySchema = z.object({
  category: z.enum(DOCUMENT_CATEGORIES),
});

export type TextGenerator = (prompt: string) => Promise<string>;

export const buildOraclePrompt = (input: ClassificationInput): string =>
  [
    'Classify a Japanese government PDF link. Use title, filename and url only.',
    'If the title indicates substantive material such as "資料", "説明資料", "事務局資料" or "○○省/府/庁説明資料", prefer "material".',
    'If the title clearly says "参考資料", answer "reference".',
    `Answer with JSON {"category": <one of ${DOCUMENT_CATEGORIES.join(', ')}>}.`,
    JSON.stringify(input),
  ].join('\n');

/**
 * Closed-set classification through a language model. Anything outside the
 * category set is an error, never a silent `other`.
 */
export class OracleClassifier implements CategoryClassifier {
  readonly name = 'oracle';

  constructor(private readonly generate: TextGenerator) {}

  async classify(input: ClassificationInput): Promise<DocumentCategory> {
    const raw = await this.generate(buildOraclePrompt(input));
    const parsed = OracleReplySchema.safeParse(parseJsonPayload(raw));
    if (!parsed.success) {
      throw new Error(`Oracle reply outside category set: ${raw.slice(0, 120)}`);
    }
    return parsed.data.category;
  }
}

export const createGeminiGenerator = (config: AppConfig): TextGenerator => (prompt) =>
  rateLimitedGenerateText(config, {
    model: config.llm.classifyModel,
    prompt,
    config: {
      temperature: config.llm.temperature,
      responseMimeType: 'application/json',
    },
  });

export interface ClassificationOutcome {
  category: DocumentCategory;
  source: CategorySource;
  oracleError?: string;
}

export class FallbackClassifierChain {
  constructor(
    private readonly rules: CategoryClassifier,
    private readonly oracle: CategoryClassifier | null,
    private readonly logger: Logger,
  ) {}

  get oracleEnabled(): boolean {
    return this.oracle !== null;
  }

  async classify(input: ClassificationInput, hint: DocumentCategory): Promise<ClassificationOutcome> {
    if (hint !== 'other') {
      return { category: hint, source: 'hint' };
    }
    const ruled = await this.rules.classify(input);
    if (ruled !== 'other' || !this.oracle) {
      return { category: ruled, source: 'rules' };
    }
    try {
      const category = await this.oracle.classify(input);
      return { category, source: 'oracle' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Oracle classification failed; keeping rule category', { url: input.url, error: message });
      return { category: ruled, source: 'rules', oracleError: message };
    }
  }
}

export const createClassifierChain = (config: AppConfig, logger: Logger): FallbackClassifierChain => {
  // Without a key every oracle call fails and the error is recorded per candidate.
  const oracle = config.llm.classifyEnabled ? new OracleClassifier(createGeminiGenerator(config)) : null;
  return new FallbackClassifierChain(new RuleBasedClassifier(), oracle, logger);
};
