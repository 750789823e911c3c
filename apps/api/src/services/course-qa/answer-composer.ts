import { createLogger } from '../logger';
import type { ChatMessage, ConversationTurn, CourseQaLlm, RetrievalResult } from './types';

const log = createLogger('answer-composer');

export const PROFESSOR_SYSTEM_PROMPT =
  'Respond as if you are a professor for a computer science class being asked a question, use the information provided to answer the question. Do not include a header in your response, answer the question directly.';

type RenderableRetrieval = Exclude<RetrievalResult, { kind: 'failed' }>;

/** Text form of the retrieved content, whichever branch produced it. */
export function renderRetrievedContent(retrieved: RenderableRetrieval): string {
  const value = retrieved.kind === 'transcript' ? retrieved.blocks : retrieved.payload;
  return JSON.stringify(value) ?? String(value);
}

export function buildAnswerMessages(
  history: readonly ConversationTurn[],
  retrieved: RenderableRetrieval,
  question: string
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: PROFESSOR_SYSTEM_PROMPT }];
  for (const turn of history) {
    messages.push({ role: 'user', content: turn.question });
    messages.push({ role: 'assistant', content: turn.response });
  }
  messages.push({
    role: 'user',
    content: `Using ${renderRetrievedContent(retrieved)}, please explain ${question}`,
  });
  return messages;
}

/**
 * Stream an answer and join the fragments in arrival order.
 * A completion failure yields '' so the caller can decline to record the turn.
 */
export async function composeAnswer(params: {
  llm: CourseQaLlm;
  history: readonly ConversationTurn[];
  retrieved: RenderableRetrieval;
  question: string;
}): Promise<string> {
  const { llm, history, retrieved, question } = params;
  const messages = buildAnswerMessages(history, retrieved, question);

  let output = '';
  try {
    for await (const chunk of llm.streamChat(messages)) {
      if (chunk.type === 'content') output += chunk.content ?? '';
    }
  } catch (error) {
    log.error({ err: error, turns: history.length }, 'completion stream failed');
    return '';
  }
  return output;
}
