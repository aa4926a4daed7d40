/**
 * Recommendation flow: preconditions, prompt hand-off and persistence
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  PLACEHOLDER_API_KEY,
  RecommendationService,
  isApiKeyConfigured
} from '../../../src/services/recommendation/recommendationService';
import { StudyStore } from '../../../src/services/study/studyStore';
import { ConfigurationError, UpstreamError, ValidationError } from '../../../src/utils/errors';
import { StubGenerator } from '../../helpers';

describe('RecommendationService', () => {
  let store: StudyStore;

  beforeEach(() => {
    store = new StudyStore();
  });

  function service(generator: StubGenerator, apiKey: string | undefined = 'test-key') {
    return new RecommendationService({ store, generator, apiKey, model: 'gemini-test' });
  }

  it('treats a missing or placeholder key as unconfigured', () => {
    expect(isApiKeyConfigured(undefined)).toBe(false);
    expect(isApiKeyConfigured('')).toBe(false);
    expect(isApiKeyConfigured('   ')).toBe(false);
    expect(isApiKeyConfigured(PLACEHOLDER_API_KEY)).toBe(false);
    expect(isApiKeyConfigured('test-key')).toBe(true);
  });

  it('fails with a configuration error before calling the generator', async () => {
    await store.createModule({ name: 'Algorithms', targetHours: 10, examDate: null });
    const generator = new StubGenerator();

    const attempt = service(generator, PLACEHOLDER_API_KEY).create();

    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(attempt).rejects.toMatchObject({ status: 503 });
    expect(generator.prompts).toHaveLength(0);
  });

  it('requires at least one module', async () => {
    const generator = new StubGenerator();

    await expect(service(generator).create()).rejects.toBeInstanceOf(ValidationError);
    expect(generator.prompts).toHaveLength(0);
    expect(await store.latestRecommendation()).toBeNull();
  });

  it('treats an empty answer as an upstream failure and stores nothing', async () => {
    await store.createModule({ name: 'Algorithms', targetHours: 10, examDate: null });

    await expect(service(new StubGenerator('')).create()).rejects.toThrow(
      new UpstreamError('No response received from Gemini API')
    );
    expect(await store.latestRecommendation()).toBeNull();
  });

  it('propagates generator failures without storing anything', async () => {
    await store.createModule({ name: 'Algorithms', targetHours: 10, examDate: null });

    await expect(service(new StubGenerator(new UpstreamError('Gemini API request timed out'))).create()).rejects.toThrow(
      'Gemini API request timed out'
    );
    expect(await store.latestRecommendation()).toBeNull();
  });

  it('sends module progress and stores the generated plan', async () => {
    const module = await store.createModule({ name: 'Algorithms', targetHours: 10, examDate: '2026-11-20' });
    await store.createSession({ moduleId: module.id, duration: 4, date: '2026-10-01', notes: '' });
    const generator = new StubGenerator('Monday: Algorithms 2h');

    const recommendation = await service(generator).create();

    expect(generator.prompts).toHaveLength(1);
    expect(generator.prompts[0]).toContain(
      '- Algorithms: target 10h, already studied 4h, 6h remaining (exam on 2026-11-20)'
    );
    expect(recommendation.text).toBe('Monday: Algorithms 2h');
    expect(await service(generator).latest()).toEqual(recommendation);
  });
});
