/**
 * Tests for the judge adapters.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const { messagesCreate, chatCreate } = vi.hoisted(() => ({
  messagesCreate: vi.fn(),
  chatCreate: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn().mockImplementation(function () {
    return { messages: { create: messagesCreate } };
  }),
}));

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(function () {
    return { chat: { completions: { create: chatCreate } } };
  }),
}));

import { AnthropicJudge, OpenAIJudge } from '../../src/models/judge.js';
import { UsageTracker } from '../../src/models/usage-tracker.js';
import { JudgeError } from '../../src/utils/errors.js';

const request = {
  prompt: 'Query: q\n\nPick 2.',
  prefill: '<relevant_indices>',
  stopSequence: '</relevant_indices>',
  maxTokens: 50,
};

describe('AnthropicJudge', () => {
  beforeEach(() => {
    messagesCreate.mockReset();
  });

  it('sends the prompt with an assistant prefill and stop sequence', async () => {
    messagesCreate.mockResolvedValue({
      content: [{ type: 'text', text: '2,0' }],
      usage: { input_tokens: 300, output_tokens: 4 },
      stop_reason: 'stop_sequence',
    });
    const judge = new AnthropicJudge({ model: 'claude-3-haiku-20240307', apiKey: 'test-secret' });

    const response = await judge.complete(request);

    expect(response).toEqual({ text: '2,0', inputTokens: 300, outputTokens: 4 });
    expect(messagesCreate).toHaveBeenCalledWith({
      model: 'claude-3-haiku-20240307',
      max_tokens: 50,
      temperature: 0,
      messages: [
        { role: 'user', content: 'Query: q\n\nPick 2.' },
        { role: 'assistant', content: '<relevant_indices>' },
      ],
      stop_sequences: ['</relevant_indices>'],
    });
  });

  it('records usage', async () => {
    messagesCreate.mockResolvedValue({
      content: [{ type: 'text', text: '1' }],
      usage: { input_tokens: 10, output_tokens: 2 },
      stop_reason: 'end_turn',
    });
    const usage = new UsageTracker();

    await new AnthropicJudge({ model: 'm', apiKey: 'test-secret', usage }).complete(request);

    expect(usage.getStats().judge).toEqual({ calls: 1, failures: 0, inputTokens: 10, outputTokens: 2 });
  });

  it('wraps API failures in JudgeError', async () => {
    messagesCreate.mockRejectedValue(new Error('overloaded'));
    const usage = new UsageTracker();

    const error: unknown = await new AnthropicJudge({ model: 'm', apiKey: 'test-secret', usage })
      .complete(request)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JudgeError);
    expect(error).toMatchObject({ code: 'JUDGE_FAILED', message: 'Judge call failed: overloaded' });
    expect(usage.getStats().judge.failures).toBe(1);
  });

  it('treats an empty answer as an error', async () => {
    messagesCreate.mockResolvedValue({
      content: [],
      usage: { input_tokens: 10, output_tokens: 0 },
      stop_reason: 'end_turn',
    });

    await expect(new AnthropicJudge({ model: 'm', apiKey: 'test-secret' }).complete(request)).rejects.toMatchObject({
      code: 'JUDGE_EMPTY_RESPONSE',
    });
  });
});

describe('OpenAIJudge', () => {
  beforeEach(() => {
    chatCreate.mockReset();
  });

  it('asks for the prefill in the prompt and strips it from the answer', async () => {
    chatCreate.mockResolvedValue({
      choices: [{ message: { content: '<relevant_indices>3,1' } }],
      usage: { prompt_tokens: 200, completion_tokens: 6 },
    });
    const judge = new OpenAIJudge({ model: 'gpt-4o-mini', apiKey: 'test-secret' });

    const response = await judge.complete(request);

    expect(response).toEqual({ text: '3,1', inputTokens: 200, outputTokens: 6 });
    expect(chatCreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      max_tokens: 50,
      temperature: 0,
      messages: [{ role: 'user', content: 'Query: q\n\nPick 2.\n\nBegin your answer with <relevant_indices>' }],
      stop: ['</relevant_indices>'],
    });
  });

  it('wraps API failures in JudgeError', async () => {
    chatCreate.mockRejectedValue(new Error('timeout'));

    await expect(new OpenAIJudge({ model: 'm', apiKey: 'test-secret' }).complete(request)).rejects.toThrow(JudgeError);
  });

  it('treats a null message as empty', async () => {
    chatCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });

    await expect(new OpenAIJudge({ model: 'm', apiKey: 'test-secret' }).complete(request)).rejects.toMatchObject({
      code: 'JUDGE_EMPTY_RESPONSE',
    });
  });
});
