import OpenAI from 'openai';
import {
  DisabledCompletionClient,
  RetryingCompletionClient,
  cleanLlmReply,
  isTransientLlmError,
} from '../../src/services/llm.service';
import { ScriptedLlm } from '../fakes/llm.fake';

const request = { instruction: 'Reply with the name.', transcript: 'uh jane smith here' };

describe('llm service', () => {
  test('cleanLlmReply strips formatting and empty answers', () => {
    expect(cleanLlmReply('```\n+1 403 555 0123\n```')).toBe('+1 403 555 0123');
    expect(cleanLlmReply('"Jane Smith"')).toBe('Jane Smith');
    expect(cleanLlmReply('NONE')).toBeNull();
    expect(cleanLlmReply('n/a')).toBeNull();
    expect(cleanLlmReply('   ')).toBeNull();
    expect(cleanLlmReply(null)).toBeNull();
  });

  test('transient errors are retried once', async () => {
    const inner = new ScriptedLlm([new Error('rate limited'), 'Jane Smith']);
    const client = new RetryingCompletionClient(inner, () => true);

    await expect(client.complete(request, new AbortController().signal)).resolves.toBe('Jane Smith');
    expect(inner.requests).toHaveLength(2);
  });

  test('only one retry is made', async () => {
    const inner = new ScriptedLlm([new Error('overloaded'), new Error('overloaded'), 'Jane Smith']);
    const client = new RetryingCompletionClient(inner, () => true);

    await expect(client.complete(request, new AbortController().signal)).rejects.toThrow('overloaded');
    expect(inner.requests).toHaveLength(2);
  });

  test('other errors and aborted calls are not retried', async () => {
    const permanent = new ScriptedLlm([new Error('invalid api key'), 'Jane Smith']);
    await expect(
      new RetryingCompletionClient(permanent, () => false).complete(request, new AbortController().signal)
    ).rejects.toThrow('invalid api key');
    expect(permanent.requests).toHaveLength(1);

    const aborted = new AbortController();
    aborted.abort();
    const timedOut = new ScriptedLlm([new Error('aborted'), 'Jane Smith']);
    await expect(new RetryingCompletionClient(timedOut, () => true).complete(request, aborted.signal)).rejects.toThrow(
      'aborted'
    );
    expect(timedOut.requests).toHaveLength(1);
  });

  test('isTransientLlmError', () => {
    expect(isTransientLlmError(new OpenAI.APIConnectionError({ message: 'socket hang up' }))).toBe(true);
    expect(isTransientLlmError(new OpenAI.APIError(429, undefined, 'rate limited', undefined))).toBe(true);
    expect(isTransientLlmError(new OpenAI.APIError(503, undefined, 'unavailable', undefined))).toBe(true);
    expect(isTransientLlmError(new OpenAI.APIError(400, undefined, 'bad request', undefined))).toBe(false);
    expect(isTransientLlmError(new Error('boom'))).toBe(false);
  });

  test('the disabled client never answers', async () => {
    const client = new DisabledCompletionClient();
    expect(client.enabled).toBe(false);
    await expect(client.complete()).resolves.toBeNull();
  });
});
