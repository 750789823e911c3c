import { createLogger } from '../logger';
import { parseTimestampQuestion } from './intent-parser';
import type { SearchResult } from './search-client';
import { filterTranscript } from './transcript-filter';
import type { TranscriptFilterResult } from './transcript-filter';
import type { CourseQaLlm, RetrievalResult, TimestampIntent } from './types';

const log = createLogger('retrieval-router');

export type RetrievalDeps = {
  llm: CourseQaLlm;
  corpusPath: string;
  search: { search(query: string): Promise<SearchResult> };
  parseIntent?: (llm: CourseQaLlm, question: string) => Promise<TimestampIntent | null>;
  filter?: typeof filterTranscript;
};

function fromFilterResult(intent: TimestampIntent, result: TranscriptFilterResult): RetrievalResult {
  if (!result.ok) return { kind: 'failed', error: result.error };
  return { kind: 'transcript', intent, blocks: result.blocks };
}

/**
 * Pick one retrieval branch and commit to it.
 * The intent is read from the current question alone; search gets the compiled query.
 * An empty transcript match is returned as is, without falling back to search.
 */
export async function routeQuestion(
  params: { compiledQuery: string; question: string },
  deps: RetrievalDeps
): Promise<RetrievalResult> {
  const { compiledQuery, question } = params;
  const parseIntent = deps.parseIntent ?? parseTimestampQuestion;
  const filter = deps.filter ?? filterTranscript;

  const intent = await parseIntent(deps.llm, question);
  if (intent) {
    log.info(
      {
        lectureNumber: intent.lectureNumber,
        startSeconds: intent.timeRange.startSeconds,
        endSeconds: intent.timeRange.endSeconds,
      },
      'routing to transcript filter'
    );
    const result = await filter({
      lectureNumber: intent.lectureNumber,
      startSeconds: intent.timeRange.startSeconds,
      endSeconds: intent.timeRange.endSeconds,
      corpusPath: deps.corpusPath,
    });
    return fromFilterResult(intent, result);
  }

  log.info('routing to semantic search');
  const result = await deps.search.search(compiledQuery);
  if (!result.ok) return { kind: 'failed', error: result.error };
  return { kind: 'search', payload: result.payload };
}
