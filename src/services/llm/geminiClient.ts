import axios, { AxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { UpstreamError, errorMessage } from '../../utils/errors';
import logger from '../../utils/logger';

const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/models';
const RETRYABLE_STATUSES = new Set([502, 503, 504]);

export interface GeminiSettings {
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface GeminiClientOptions {
  http?: AxiosInstance;
  /** Pause before the single retry. */
  retryDelayMs?: number;
}

/** Anything that turns a prompt into generated text. */
export interface TextGenerator {
  generateText(prompt: string): Promise<string>;
}

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional()
          })
          .optional()
      })
    )
    .optional()
});

/**
 * Transient failures are worth one more attempt: the request never got a
 * response (reset, refused, DNS) or the gateway answered 502/503/504.
 * Timeouts are not retried.
 */
export function isTransientFailure(err: unknown): boolean {
  if (!(err instanceof AxiosError)) return false;
  if (err.code === AxiosError.ECONNABORTED || err.code === AxiosError.ETIMEDOUT) return false;
  if (err.response) return RETRYABLE_STATUSES.has(err.response.status);
  return true;
}

function toUpstreamError(err: unknown): UpstreamError {
  if (err instanceof UpstreamError) return err;
  return new UpstreamError(describeFailure(err));
}

function describeFailure(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.response) {
      return `Gemini API request failed with status ${err.response.status}`;
    }
    if (err.code === AxiosError.ECONNABORTED || err.code === AxiosError.ETIMEDOUT) {
      return 'Gemini API request timed out';
    }
  }
  return `Gemini API request failed: ${errorMessage(err)}`;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class GeminiClient implements TextGenerator {
  private readonly http: AxiosInstance;
  private readonly retryDelayMs: number;

  constructor(private readonly settings: GeminiSettings, options: GeminiClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  get model(): string {
    return this.settings.model;
  }

  /**
   * Send one prompt to `generateContent` and return the concatenated text parts.
   * Returns an empty string when the model produced no text.
   */
  async generateText(prompt: string): Promise<string> {
    try {
      return await this.request(prompt);
    } catch (err) {
      if (!isTransientFailure(err)) {
        throw toUpstreamError(err);
      }
      logger.warn({ err: errorMessage(err), model: this.settings.model }, 'Transient Gemini failure, retrying once');
    }

    await delay(this.retryDelayMs);
    try {
      return await this.request(prompt);
    } catch (err) {
      throw toUpstreamError(err);
    }
  }

  private async request(prompt: string): Promise<string> {
    const url = `${GEMINI_BASE_URL}/${encodeURIComponent(this.settings.model)}:generateContent`;
    const payload = {
      contents: [
        {
          role: 'user',
          parts: [{ text: prompt }]
        }
      ],
      generationConfig: {
        temperature: this.settings.temperature,
        maxOutputTokens: this.settings.maxOutputTokens
      }
    };

    const res = await this.http.post<unknown>(url, payload, {
      headers: {
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': this.settings.apiKey
      },
      timeout: this.settings.timeoutMs
    });

    const parsed = generateContentResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new UpstreamError('Unexpected response shape from Gemini API');
    }

    const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
    return parts
      .map((part) => part.text ?? '')
      .join('')
      .trim();
  }
}
