/**
 * Model Gateway - sends an assembled context to the language model
 * Thin adapter over the OpenAI chat completions API. No retries here:
 * failures are classified and handed back to the caller.
 */

import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import type { ContextPayload } from '../types/index.js';
import { ModelError } from '../utils/errors.js';
import { buildSystemMessage, buildUserMessage } from '../prompts/hint-prompts.js';

export type ModelResult =
  | { ok: true; text: string }
  | { ok: false; error: ModelError };

export interface ModelGateway {
  generate(payload: ContextPayload, signal?: AbortSignal): Promise<ModelResult>;
}

export interface OpenAIGatewayOptions {
  apiKey?: string;
  model: string;
  temperature: number;
  topP: number;
  maxOutputTokens: number;
}

export const EMPTY_REPLY_TEXT = "I couldn't generate a hint. Please try rephrasing your question.";

/**
 * Map any thrown value from the SDK onto the gateway's error kinds
 */
export function classifyModelError(error: unknown): ModelError {
  // Abort and connection errors extend APIError, so check them first
  if (error instanceof APIUserAbortError) {
    return new ModelError('Unavailable', 'Request was cancelled');
  }
  if (error instanceof APIConnectionError) {
    return new ModelError('Unavailable', error.message);
  }
  if (error instanceof APIError) {
    const status = error.status;
    if (status === 429) return new ModelError('RateLimited', error.message, status);
    if (status !== undefined && status >= 400 && status < 500) {
      return new ModelError('InvalidRequest', error.message, status);
    }
    if (status !== undefined && status >= 500) {
      return new ModelError('Unavailable', error.message, status);
    }
    return new ModelError('Unknown', error.message, status);
  }
  return new ModelError('Unknown', error instanceof Error ? error.message : String(error));
}

export class OpenAIModelGateway implements ModelGateway {
  private readonly openai: OpenAI;

  constructor(private readonly options: OpenAIGatewayOptions) {
    this.openai = new OpenAI({
      apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
      maxRetries: 0 // retry policy belongs to the caller
    });
  }

  async generate(payload: ContextPayload, signal?: AbortSignal): Promise<ModelResult> {
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: buildSystemMessage(payload) },
            { role: 'user', content: buildUserMessage(payload) }
          ],
          temperature: this.options.temperature,
          top_p: this.options.topP,
          max_tokens: this.options.maxOutputTokens
        },
        { signal }
      );

      const text = response.choices[0]?.message?.content?.trim();
      return { ok: true, text: text || EMPTY_REPLY_TEXT };
    } catch (error) {
      return { ok: false, error: classifyModelError(error) };
    }
  }
}
