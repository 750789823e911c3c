import fs from 'fs/promises';
import { z } from 'zod';
import { createLogger } from '../logger';
import { CorpusMalformedError, CorpusNotFoundError, CorpusReadError } from './errors';
import type { TranscriptBlock } from './types';

const log = createLogger('transcript-filter');

const recordSchema = z
  .object({
    document_title: z.string().nullish(),
    block_metadata: z
      .object({
        start_time: z.number().default(0),
        end_time: z.number().default(0),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

type CorpusRecord = z.infer<typeof recordSchema>;

export type TranscriptFilterError = CorpusNotFoundError | CorpusMalformedError | CorpusReadError;

export type TranscriptFilterResult =
  | { ok: true; blocks: TranscriptBlock[] }
  | { ok: false; error: TranscriptFilterError };

type CorpusLoadResult =
  | { ok: true; records: CorpusRecord[] }
  | { ok: false; error: TranscriptFilterError };

export function lectureLabel(lectureNumber: number): string {
  return `Lecture ${lectureNumber}`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Read every record of a JSONL corpus. Blank lines are skipped; any other
 * bad line fails the whole load.
 */
export async function loadCorpus(corpusPath: string): Promise<CorpusLoadResult> {
  let text: string;
  try {
    text = await fs.readFile(corpusPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { ok: false, error: new CorpusNotFoundError(corpusPath, error) };
    }
    return { ok: false, error: new CorpusReadError(corpusPath, error) };
  }

  const records: CorpusRecord[] = [];
  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i].trim();
    if (!line) continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      return { ok: false, error: new CorpusMalformedError(corpusPath, i + 1, 'invalid JSON', error) };
    }

    const parsed = recordSchema.safeParse(value);
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid record';
      return { ok: false, error: new CorpusMalformedError(corpusPath, i + 1, reason, parsed.error) };
    }
    records.push(parsed.data);
  }
  return { ok: true, records };
}

function toBlock(record: CorpusRecord): TranscriptBlock | null {
  const title = record.document_title;
  if (typeof title !== 'string') return null;
  return { ...record, document_title: title };
}

/**
 * Blocks of one lecture whose [start_time, end_time] touches or crosses
 * [startSeconds, endSeconds], in corpus order. The corpus is re-read on every call.
 */
export async function filterTranscript(params: {
  lectureNumber: number;
  startSeconds: number;
  endSeconds: number;
  corpusPath: string;
}): Promise<TranscriptFilterResult> {
  const { lectureNumber, startSeconds, endSeconds, corpusPath } = params;
  const loaded = await loadCorpus(corpusPath);
  if (!loaded.ok) {
    log.error({ err: loaded.error, corpusPath }, 'corpus load failed');
    return loaded;
  }

  const label = lectureLabel(lectureNumber);
  const blocks: TranscriptBlock[] = [];
  for (const record of loaded.records) {
    if (record.document_title !== label) continue;
    const { start_time: blockStart, end_time: blockEnd } = record.block_metadata;
    if (blockStart <= endSeconds && blockEnd >= startSeconds) {
      const block = toBlock(record);
      if (block) blocks.push(block);
    }
  }

  log.debug({ lectureNumber, startSeconds, endSeconds, matched: blocks.length }, 'transcript filtered');
  return { ok: true, blocks };
}
