import { createLogger } from '../logger';
import { SearchRequestFailedError } from './errors';

const log = createLogger('search-client');

export const RERANK = true;
export const NUM_BLOCKS_TO_RERANK = 10;
export const NUM_BLOCKS = 3;

export type SearchRequestBody = {
  query: string[];
  rerank: boolean;
  num_blocks_to_rerank: number;
  num_blocks: number;
};

export type SearchResult =
  | { ok: true; payload: unknown }
  | { ok: false; error: SearchRequestFailedError };

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** `null`, `[]` and `{}` carry nothing to answer from. */
export function isEmptyPayload(payload: unknown): boolean {
  if (payload === null) return true;
  if (Array.isArray(payload)) return payload.length === 0;
  if (typeof payload === 'object') return Object.keys(payload).length === 0;
  return false;
}

export function buildSearchRequestBody(query: string): SearchRequestBody {
  return {
    query: [query],
    rerank: RERANK,
    num_blocks_to_rerank: NUM_BLOCKS_TO_RERANK,
    num_blocks: NUM_BLOCKS,
  };
}

/**
 * Semantic Search Client
 * One POST per query against the course search endpoint; no retries.
 */
export class SemanticSearchClient {
  private fetchImpl: FetchLike;

  constructor(private url: string, options: { fetch?: FetchLike } = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async search(query: string): Promise<SearchResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildSearchRequestBody(query)),
      });
    } catch (error) {
      log.error({ err: error, url: this.url }, 'search request failed');
      return {
        ok: false,
        error: new SearchRequestFailedError(null, 'Search request could not be sent', error),
      };
    }

    if (response.status !== 200) {
      log.warn({ status: response.status, url: this.url }, 'search endpoint returned an error status');
      await response.body?.cancel();
      return {
        ok: false,
        error: new SearchRequestFailedError(
          response.status,
          `Failed to retrieve data. Status code: ${response.status}`
        ),
      };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      log.error({ err: error, url: this.url }, 'search response was not JSON');
      return {
        ok: false,
        error: new SearchRequestFailedError(response.status, 'Search response was not valid JSON', error),
      };
    }

    if (isEmptyPayload(payload)) {
      log.warn({ url: this.url }, 'search endpoint returned no content');
      return { ok: false, error: new SearchRequestFailedError(response.status, 'Search returned no content') };
    }
    return { ok: true, payload };
  }
}
