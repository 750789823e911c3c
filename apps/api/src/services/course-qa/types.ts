import type { RetrievalError } from './errors';

export type TimeRange = {
  startSeconds: number;
  endSeconds: number;
};

export type TimestampIntent = {
  lectureNumber: number;
  timeRange: TimeRange;
};

export type BlockMetadata = {
  start_time: number;
  end_time: number;
  [key: string]: unknown;
};

/** One corpus record, as stored. Fields other than title and metadata pass through untouched. */
export type TranscriptBlock = {
  document_title: string;
  block_metadata: BlockMetadata;
  [key: string]: unknown;
};

export type ConversationTurn = {
  question: string;
  response: string;
};

export type RetrievalResult =
  | { kind: 'transcript'; intent: TimestampIntent; blocks: TranscriptBlock[] }
  | { kind: 'search'; payload: unknown }
  | { kind: 'failed'; error: RetrievalError };

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatChunk = {
  type: 'content' | 'done';
  content?: string | null;
};

export interface CourseQaLlm {
  chat(messages: ChatMessage[]): Promise<string>;
  streamChat(messages: ChatMessage[]): AsyncGenerator<ChatChunk>;
}
