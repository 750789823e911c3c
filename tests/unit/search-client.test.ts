/**
 * Semantic Search Client Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  SemanticSearchClient,
  buildSearchRequestBody,
} from '../../apps/api/src/services/course-qa/search-client';
import type { FetchLike } from '../../apps/api/src/services/course-qa/search-client';
import { SearchRequestFailedError } from '../../apps/api/src/services/course-qa/errors';

const SEARCH_URL = 'https://search.example.edu/course';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('SemanticSearchClient', () => {
  it('builds the fixed rerank request body', () => {
    expect(buildSearchRequestBody('What is recursion?')).toEqual({
      query: ['What is recursion?'],
      rerank: true,
      num_blocks_to_rerank: 10,
      num_blocks: 3,
    });
  });

  it('posts the query once and returns the payload verbatim', async () => {
    const payload = [{ content: 'Recursion is a function calling itself', score: 0.91 }];
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(payload));
    const client = new SemanticSearchClient(SEARCH_URL, { fetch: fetchMock });

    const result = await client.search('What is recursion?');

    expect(result).toEqual({ ok: true, payload });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(SEARCH_URL);
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init.body))).toEqual({
      query: ['What is recursion?'],
      rerank: true,
      num_blocks_to_rerank: 10,
      num_blocks: 3,
    });
  });

  it('fails on a non-200 status without retrying', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ detail: 'busy' }, 503));
    const client = new SemanticSearchClient(SEARCH_URL, { fetch: fetchMock });

    const result = await client.search('What is a linked list?');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SearchRequestFailedError);
    expect(result.error.status).toBe(503);
    expect(result.error.message).toBe('Failed to retrieve data. Status code: 503');
  });

  it('releases the body of an error response', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      },
    });
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response(body, { status: 502 }));
    const client = new SemanticSearchClient(SEARCH_URL, { fetch: fetchMock });

    const result = await client.search('What is a queue?');

    expect(!result.ok && result.error.status).toBe(502);
    expect(cancelled).toBe(true);
  });

  it.each(['null', '[]', '{}'])('treats an empty %s payload as a failure', async (text) => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response(text, { status: 200 }));
    const client = new SemanticSearchClient(SEARCH_URL, { fetch: fetchMock });

    const result = await client.search('What is recursion?');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('SEARCH_REQUEST_FAILED');
    expect(result.error.status).toBe(200);
    expect(result.error.message).toBe('Search returned no content');
  });

  it('treats other 2xx statuses as failures', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response(null, { status: 204 }));
    const client = new SemanticSearchClient(SEARCH_URL, { fetch: fetchMock });

    const result = await client.search('Big-O');

    expect(!result.ok && result.error.status).toBe(204);
  });

  it('converts a network error into a failure', async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));
    const client = new SemanticSearchClient(SEARCH_URL, { fetch: fetchMock });

    const result = await client.search('What is a heap?');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('SEARCH_REQUEST_FAILED');
    expect(result.error.status).toBeNull();
  });

  it('converts an unparseable body into a failure', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));
    const client = new SemanticSearchClient(SEARCH_URL, { fetch: fetchMock });

    const result = await client.search('What is a graph?');

    expect(!result.ok && result.error.message).toBe('Search response was not valid JSON');
  });
});
