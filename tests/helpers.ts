/**
 * Shared fixtures for unit and integration tests.
 */

import { parseConfig, type AppConfig } from '../src/config/env';
import type { TextGenerator } from '../src/services/llm/geminiClient';
import type { StudyModule } from '../src/services/study/types';

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return parseConfig({ NODE_ENV: 'test', GEMINI_API_KEY: 'test-key', ...overrides });
}

/**
 * Text generator that records prompts and answers with a canned reply,
 * or rejects when the reply is an Error.
 */
export class StubGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | Error = 'Monday: Algorithms 2h') {}

  async generateText(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

export function makeModule(overrides: Partial<StudyModule> = {}): StudyModule {
  return {
    id: 1,
    name: 'Algorithms',
    targetHours: 40,
    examDate: null,
    createdAt: new Date('2026-01-02T03:04:05.000Z'),
    studiedHours: 0,
    ...overrides
  };
}
