/**
 * LLM Client Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LLMClient } from '../../apps/api/src/services/llm';
import type { CompletionBackend, CompletionChunk } from '../../apps/api/src/services/llm';
import type { ChatChunk, ChatMessage } from '../../apps/api/src/services/course-qa/types';

const LLM_CONFIG = {
  apiKey: 'test-secret',
  baseUrl: 'http://localhost:8080/v1',
  model: 'test-model',
};

const MESSAGES: ChatMessage[] = [
  { role: 'system', content: 'You are a parsing assistant.' },
  { role: 'user', content: 'What is recursion?' },
];

async function* chunks(items: CompletionChunk[]): AsyncGenerator<CompletionChunk> {
  for (const item of items) {
    yield item;
  }
}

function createBackend(options: { reply?: string | null; chunks?: CompletionChunk[] } = {}) {
  return {
    complete: vi.fn<CompletionBackend['complete']>().mockResolvedValue({
      choices: options.reply === undefined ? [] : [{ message: { content: options.reply } }],
    }),
    stream: vi.fn<CompletionBackend['stream']>().mockResolvedValue(chunks(options.chunks ?? [])),
  };
}

async function collect(stream: AsyncGenerator<ChatChunk>): Promise<ChatChunk[]> {
  const out: ChatChunk[] = [];
  for await (const chunk of stream) {
    out.push(chunk);
  }
  return out;
}

describe('LLMClient', () => {
  describe('chat', () => {
    it('sends a non-streaming request with the configured model and messages', async () => {
      const backend = createBackend({ reply: '[4, (0, 300)]' });
      const client = new LLMClient(LLM_CONFIG, backend);

      const reply = await client.chat(MESSAGES);

      expect(reply).toBe('[4, (0, 300)]');
      expect(backend.complete).toHaveBeenCalledTimes(1);
      expect(backend.complete.mock.calls[0][0]).toEqual({
        model: 'test-model',
        messages: MESSAGES,
        stream: false,
      });
      expect(backend.stream).not.toHaveBeenCalled();
    });

    it('returns an empty string when the completion has no choices', async () => {
      const client = new LLMClient(LLM_CONFIG, createBackend());

      expect(await client.chat(MESSAGES)).toBe('');
    });

    it('returns an empty string for null content', async () => {
      const client = new LLMClient(LLM_CONFIG, createBackend({ reply: null }));

      expect(await client.chat(MESSAGES)).toBe('');
    });

    it('propagates backend errors', async () => {
      const backend = createBackend();
      backend.complete.mockRejectedValue(new Error('upstream unavailable'));
      const client = new LLMClient(LLM_CONFIG, backend);

      await expect(client.chat(MESSAGES)).rejects.toThrow('upstream unavailable');
    });
  });

  describe('streamChat', () => {
    it('yields fragments in order, then done', async () => {
      const backend = createBackend({
        chunks: [
          { choices: [{ delta: { content: 'Recursion ' } }] },
          { choices: [{ delta: {} }] },
          { choices: [] },
          { choices: [{ delta: { content: null } }] },
          { choices: [{ delta: { content: 'calls itself.' } }] },
        ],
      });
      const client = new LLMClient(LLM_CONFIG, backend);

      const out = await collect(client.streamChat(MESSAGES));

      expect(out).toEqual([
        { type: 'content', content: 'Recursion ' },
        { type: 'content', content: '' },
        { type: 'content', content: '' },
        { type: 'content', content: '' },
        { type: 'content', content: 'calls itself.' },
        { type: 'done' },
      ]);
      expect(out.map((c) => c.content ?? '').join('')).toBe('Recursion calls itself.');
    });

    it('sends a streaming request with the configured model and messages', async () => {
      const backend = createBackend();
      const client = new LLMClient(LLM_CONFIG, backend);

      const out = await collect(client.streamChat(MESSAGES));

      expect(out).toEqual([{ type: 'done' }]);
      expect(backend.stream).toHaveBeenCalledTimes(1);
      expect(backend.stream.mock.calls[0][0]).toEqual({
        model: 'test-model',
        messages: MESSAGES,
        stream: true,
      });
      expect(backend.complete).not.toHaveBeenCalled();
    });
  });
});
