/**
 * Judgment model used by the reranker.
 *
 * A judge answers a single prompt with a short text. The reranker owns the
 * prompt and the parsing; adapters only move text in and out, count tokens
 * and turn provider failures into `JudgeError`.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { JudgeError, errorMessage } from '../utils/errors.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { createLogger } from '../utils/logger.js';
import type { UsageTracker } from './usage-tracker.js';

const log = createLogger('judge');

export interface JudgeRequest {
  prompt: string;
  /** Text the answer should start with (assistant prefill where supported) */
  prefill?: string;
  /** Generation stops before this string */
  stopSequence?: string;
  maxTokens: number;
}

export interface JudgeResponse {
  /** Generated text, without the prefill */
  text: string;
  inputTokens: number;
  outputTokens: number;
}

export interface Judge {
  readonly name: string;
  readonly model: string;
  complete(request: JudgeRequest): Promise<JudgeResponse>;
}

export interface JudgeOptions {
  model: string;
  apiKey?: string;
  /** Calls per minute, 0 = unlimited */
  rateLimitPerMin?: number;
  /** API base URL override */
  baseUrl?: string;
  usage?: UsageTracker;
}

/**
 * Claude via the Messages API. Prefill is sent as a trailing assistant turn.
 */
export class AnthropicJudge implements Judge {
  readonly name = 'anthropic';
  readonly model: string;

  private readonly client: Anthropic;
  private readonly rateLimiter: RateLimiter;
  private readonly usage?: UsageTracker;

  constructor(options: JudgeOptions & { client?: Anthropic }) {
    this.model = options.model;
    this.usage = options.usage;
    this.rateLimiter = new RateLimiter(options.rateLimitPerMin ?? 0);
    this.client =
      options.client ?? new Anthropic({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  async complete(request: JudgeRequest): Promise<JudgeResponse> {
    await this.rateLimiter.wait();

    const messages: Anthropic.MessageParam[] = [{ role: 'user', content: request.prompt }];
    if (request.prefill) {
      messages.push({ role: 'assistant', content: request.prefill });
    }

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: 0,
        messages,
        ...(request.stopSequence ? { stop_sequences: [request.stopSequence] } : {}),
      });
    } catch (error) {
      this.usage?.recordFailure('judge');
      throw new JudgeError(`Judge call failed: ${errorMessage(error)}`, 'JUDGE_FAILED', error);
    }

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    this.usage?.recordSuccess('judge', response.usage.input_tokens, response.usage.output_tokens);
    log.debug('Judge answered', { model: this.model, stopReason: response.stop_reason });

    if (!text.trim()) {
      throw new JudgeError('Judge returned an empty response', 'JUDGE_EMPTY_RESPONSE');
    }
    return {
      text,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}

/**
 * OpenAI chat model. Chat completions take no prefill, so it is requested
 * in the prompt instead and stripped from the answer if echoed.
 */
export class OpenAIJudge implements Judge {
  readonly name = 'openai';
  readonly model: string;

  private readonly client: OpenAI;
  private readonly rateLimiter: RateLimiter;
  private readonly usage?: UsageTracker;

  constructor(options: JudgeOptions & { client?: OpenAI }) {
    this.model = options.model;
    this.usage = options.usage;
    this.rateLimiter = new RateLimiter(options.rateLimitPerMin ?? 0);
    this.client =
      options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  async complete(request: JudgeRequest): Promise<JudgeResponse> {
    await this.rateLimiter.wait();

    const prompt = request.prefill
      ? `${request.prompt}\n\nBegin your answer with ${request.prefill}`
      : request.prompt;

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: 0,
        messages: [{ role: 'user', content: prompt }],
        ...(request.stopSequence ? { stop: [request.stopSequence] } : {}),
      });
    } catch (error) {
      this.usage?.recordFailure('judge');
      throw new JudgeError(`Judge call failed: ${errorMessage(error)}`, 'JUDGE_FAILED', error);
    }

    const inputTokens = response.usage?.prompt_tokens ?? 0;
    const outputTokens = response.usage?.completion_tokens ?? 0;
    this.usage?.recordSuccess('judge', inputTokens, outputTokens);

    let text = response.choices[0]?.message.content ?? '';
    if (request.prefill && text.startsWith(request.prefill)) {
      text = text.slice(request.prefill.length);
    }
    if (!text.trim()) {
      throw new JudgeError('Judge returned an empty response', 'JUDGE_EMPTY_RESPONSE');
    }
    return { text, inputTokens, outputTokens };
  }
}
