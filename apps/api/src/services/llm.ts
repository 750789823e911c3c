import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { AppConfig } from './config';
import type { ChatChunk, ChatMessage, CourseQaLlm } from './course-qa/types';
import { createLogger } from './logger';

const log = createLogger('llm');

export type CompletionResponse = {
  choices: Array<{ message?: { content?: string | null } }>;
};

export type CompletionChunk = {
  choices: Array<{ delta?: { content?: string | null } }>;
};

/** The two shapes of `chat.completions.create` this client calls. */
export interface CompletionBackend {
  complete(params: ChatCompletionCreateParamsNonStreaming): Promise<CompletionResponse>;
  stream(params: ChatCompletionCreateParamsStreaming): Promise<AsyncIterable<CompletionChunk>>;
}

export function openAiBackend(client: OpenAI): CompletionBackend {
  return {
    complete: (params) => client.chat.completions.create(params),
    stream: (params) => client.chat.completions.create(params),
  };
}

function toCompletionMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((m) => ({ role: m.role, content: m.content }));
}

/**
 * Chat-completion client for any OpenAI-compatible endpoint.
 * The hosted model is stateless: every call carries the full message list.
 */
export class LLMClient implements CourseQaLlm {
  private backend: CompletionBackend;
  private model: string;

  constructor(config: AppConfig['llm'], backend?: CompletionBackend) {
    this.backend = backend ?? openAiBackend(new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl }));
    this.model = config.model;
  }

  async chat(messages: ChatMessage[]): Promise<string> {
    log.debug({ model: this.model, messages: messages.length }, 'chat completion');
    const response = await this.backend.complete({
      model: this.model,
      messages: toCompletionMessages(messages),
      stream: false,
    });
    return response.choices[0]?.message?.content ?? '';
  }

  async *streamChat(messages: ChatMessage[]): AsyncGenerator<ChatChunk> {
    log.debug({ model: this.model, messages: messages.length }, 'streaming chat completion');
    const stream = await this.backend.stream({
      model: this.model,
      messages: toCompletionMessages(messages),
      stream: true,
    });
    for await (const chunk of stream) {
      yield { type: 'content', content: chunk.choices[0]?.delta?.content ?? '' };
    }
    yield { type: 'done' };
  }
}
