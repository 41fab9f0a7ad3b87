/**
 * OpenAI-Compatible Completion Backend
 *
 * Works against OpenAI itself or any server exposing the chat-completions API
 * (Ollama serves one at /v1).
 */

import OpenAI from 'openai';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import type { CompletionFn } from './translator';

export interface ChatCompletionOptions {
  baseUrl: string;
  model: string;
  apiKey: string;
  timeoutMs: number;
}

export function createChatCompletion(options: ChatCompletionOptions): CompletionFn {
  const openai = new OpenAI({
    baseURL: options.baseUrl,
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
  });
  const { model } = options;

  return async (prompt: string): Promise<string> => {
    const startTime = Date.now();

    try {
      const response = await openai.chat.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0,
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model }, duration);
      llmRequestsCounter.inc({ model, status: 'success' });

      logger.info('LLM completion received', {
        model,
        request_id: response.id,
        duration_seconds: duration,
        tokens_used: response.usage?.total_tokens,
      });

      // An empty completion is a response like any other; the validator reports it
      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model }, duration);
      llmRequestsCounter.inc({ model, status: 'error' });

      logger.error('LLM completion failed', error, { model });
      throw error;
    }
  };
}
