import type { TextGenerator } from '../llm/geminiClient';
import { buildStudyPlanPrompt } from '../llm/studyPlanPrompt';
import type { StudyStore } from '../study/studyStore';
import type { Recommendation } from '../study/types';
import { ConfigurationError, UpstreamError, ValidationError } from '../../utils/errors';
import logger from '../../utils/logger';

export const PLACEHOLDER_API_KEY = 'your-api-key-here';

export function isApiKeyConfigured(apiKey: string | undefined): boolean {
  return Boolean(apiKey && apiKey.trim() && apiKey !== PLACEHOLDER_API_KEY);
}

export interface RecommendationServiceDeps {
  store: StudyStore;
  generator: TextGenerator;
  apiKey: string | undefined;
  model: string;
}

export class RecommendationService {
  constructor(private readonly deps: RecommendationServiceDeps) {}

  /**
   * Ask the text generator for a 14-day plan covering every module and store
   * the answer. Nothing is sent when the credential is missing or there are no
   * modules yet.
   */
  async create(): Promise<Recommendation> {
    const { store, generator, apiKey, model } = this.deps;

    if (!isApiKeyConfigured(apiKey)) {
      throw new ConfigurationError('Gemini API not configured', 'Set the GEMINI_API_KEY environment variable');
    }

    const modules = await store.listModules();
    if (modules.length === 0) {
      throw new ValidationError(
        'No modules available',
        'Create modules before requesting a recommendation'
      );
    }

    const prompt = buildStudyPlanPrompt(modules);
    logger.info({ model, modules: modules.length }, 'Sending study plan request to Gemini API');

    const text = await generator.generateText(prompt);
    if (!text) {
      throw new UpstreamError('No response received from Gemini API');
    }

    const recommendation = await store.createRecommendation(text);
    logger.info({ recommendationId: recommendation.id }, 'AI recommendation created');
    return recommendation;
  }

  latest(): Promise<Recommendation | null> {
    return this.deps.store.latestRecommendation();
  }
}
