import OpenAI from 'openai';

import { exponentialBackoff } from '../util/retry';

/**
 * Single text-in/text-out call. The returned text is untrusted: callers own
 * all parsing and validation.
 */
export interface StructuredAssessmentClient {
  complete(systemPrompt: string, input: Record<string, unknown>): Promise<string>;
}

type OpenAiAssessmentOptions = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  client?: OpenAI;
};

const buildUserInput = (input: Record<string, unknown>): string => JSON.stringify(input, null, 2);

export class OpenAiAssessmentClient implements StructuredAssessmentClient {
  private client: OpenAI | null;

  private readonly apiKey?: string;

  private readonly baseUrl?: string;

  private readonly model: string;

  private readonly timeoutMs: number;

  private readonly maxAttempts: number;

  constructor({ apiKey, baseUrl, model, timeoutMs, maxAttempts, client }: OpenAiAssessmentOptions) {
    this.client = client ?? null;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl;
    this.model = model;
    this.timeoutMs = timeoutMs;
    this.maxAttempts = maxAttempts;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new Error('LLM API key not configured. Set OPENAI_API_KEY.');
    }

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });

    return this.client;
  }

  async complete(systemPrompt: string, input: Record<string, unknown>): Promise<string> {
    const client = this.getClient();

    const response = await exponentialBackoff(async (attempt) => {
      if (attempt > 1) {
        console.warn(`[LLM] Retrying completion (attempt ${attempt}).`);
      }

      return client.chat.completions.create(
        {
          model: this.model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: buildUserInput(input) },
          ],
        },
        { timeout: this.timeoutMs },
      );
    }, { maxAttempts: this.maxAttempts });

    return response.choices[0]?.message?.content ?? '';
  }
}
