import { createLogger } from '../logger';
import { composeAnswer } from './answer-composer';
import type { CourseQaErrorCode } from './errors';
import { HONOR_CODE_NOTICE, isHomeworkRelated } from './honor-code';
import { routeQuestion } from './router';
import type { RetrievalDeps } from './router';
import type { ConversationTurn, TimestampIntent } from './types';

const log = createLogger('conversation');

export const RETRIEVAL_FAILED_MESSAGE = 'Failed to process your question. Please try again.';
export const NO_CONTENT_MESSAGE = 'No transcript content was found for that lecture and time range.';
export const COMPOSITION_FAILED_MESSAGE = 'The answer could not be generated. Please try again.';
export const DECLINED_MESSAGE = 'Please ask a different question.';
export const EMPTY_QUESTION_MESSAGE = 'Question must not be empty.';

export type AskOptions = {
  /** Whether to continue with a question the honor-code guard flagged. Defaults to true. */
  proceed?: boolean;
};

export type AskOutcome =
  | { status: 'answered'; turn: ConversationTurn; honorCodeWarning: boolean }
  | { status: 'declined'; message: string; honorCodeWarning: true }
  | { status: 'retrieval_failed'; code: CourseQaErrorCode; message: string; honorCodeWarning: boolean }
  | { status: 'no_content'; intent: TimestampIntent; message: string; honorCodeWarning: boolean }
  | { status: 'composition_failed'; message: string; honorCodeWarning: boolean }
  | { status: 'empty_question'; message: string; honorCodeWarning: false };

export type AskStatus = AskOutcome['status'];

/**
 * One conversation with the assistant.
 *
 * Holds the append-only turn history and runs one question at a time:
 * a call to `ask` made while another is in flight starts after it settles.
 * History only grows when a turn completes with a non-empty answer.
 */
export class ConversationContext {
  private turns: ConversationTurn[] = [];
  private pending: Promise<unknown> = Promise.resolve();

  constructor(private deps: RetrievalDeps) {}

  get history(): readonly ConversationTurn[] {
    return this.turns;
  }

  compileQuery(question: string): string {
    return [...this.turns.map((turn) => turn.question), question].join(' ');
  }

  ask(question: string, options: AskOptions = {}): Promise<AskOutcome> {
    const run = this.pending.then(() => this.process(question, options));
    // The caller receives any rejection through `run`; the chain only needs ordering.
    this.pending = run.catch(() => undefined);
    return run;
  }

  private async process(question: string, options: AskOptions): Promise<AskOutcome> {
    if (!question.trim()) {
      return { status: 'empty_question', message: EMPTY_QUESTION_MESSAGE, honorCodeWarning: false };
    }

    const honorCodeWarning = isHomeworkRelated(question);
    if (honorCodeWarning) {
      log.info('question flagged by honor-code guard');
      if (options.proceed === false) {
        return { status: 'declined', message: `${HONOR_CODE_NOTICE} ${DECLINED_MESSAGE}`, honorCodeWarning };
      }
    }

    const retrieved = await routeQuestion(
      { compiledQuery: this.compileQuery(question), question },
      this.deps
    );

    if (retrieved.kind === 'failed') {
      log.warn({ code: retrieved.error.code, err: retrieved.error }, 'retrieval failed');
      return {
        status: 'retrieval_failed',
        code: retrieved.error.code,
        message: RETRIEVAL_FAILED_MESSAGE,
        honorCodeWarning,
      };
    }

    if (retrieved.kind === 'transcript' && retrieved.blocks.length === 0) {
      return { status: 'no_content', intent: retrieved.intent, message: NO_CONTENT_MESSAGE, honorCodeWarning };
    }

    const response = await composeAnswer({
      llm: this.deps.llm,
      history: this.turns,
      retrieved,
      question,
    });

    if (!response.trim()) {
      return { status: 'composition_failed', message: COMPOSITION_FAILED_MESSAGE, honorCodeWarning };
    }

    const turn: ConversationTurn = { question, response };
    this.turns.push(turn);
    return { status: 'answered', turn, honorCodeWarning };
  }
}
