import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { z } from 'zod';
import { SynthesisError, errorMessage } from '../errors.js';
import { DEFAULT_RETRY_CONFIG, retryWithBackoff, type RetryConfig } from '../utils/retry.js';

/**
 * Language-model completion port. Returns the raw text of the response,
 * which is expected to hold a JSON object.
 */
export interface Synthesizer {
  complete(prompt: string): Promise<string>;
}

export interface GeminiSynthesizerOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  retry?: RetryConfig;
}

export class GeminiSynthesizer implements Synthesizer {
  private model: GenerativeModel;
  private retry: RetryConfig;

  constructor(options: GeminiSynthesizerOptions) {
    const genAI = new GoogleGenerativeAI(options.apiKey);
    this.model = genAI.getGenerativeModel({
      model: options.model,
      generationConfig: {
        temperature: options.temperature ?? 0,
        responseMimeType: 'application/json',
      },
    });
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
  }

  async complete(prompt: string): Promise<string> {
    try {
      // Wrap the call with retry logic for API overload
      const result = await retryWithBackoff(() => this.model.generateContent(prompt), this.retry);
      return result.response.text();
    } catch (error) {
      throw new SynthesisError(`Model call failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Removes a surrounding markdown code fence (```json ... ``` or ``` ... ```).
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.replace(/^```[a-zA-Z]*\s*\n?/, '').replace(/\n?\s*```\s*$/, '');
  }
  return cleaned.trim();
}

/**
 * Parses a model response against a schema. Returns null when the text is
 * not JSON or does not match.
 */
export function parseJsonResponse<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  const cleaned = stripCodeFences(text);
  let raw: unknown;
  try {
    raw = JSON.parse(cleaned);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
