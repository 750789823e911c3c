import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export type CorpusFixture = {
  dir: string;
  corpusPath: string;
  cleanup: () => Promise<void>;
};

export function block(lecture: number, start: number, end: number, content: string) {
  return {
    document_title: `Lecture ${lecture}`,
    block_metadata: { start_time: start, end_time: end },
    content,
  };
}

export async function writeCorpus(lines: Array<string | object>): Promise<CorpusFixture> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'course-qa-corpus-'));
  const corpusPath = path.join(dir, 'corpus.jsonl');
  const text = lines.map((line) => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n');
  await fs.writeFile(corpusPath, `${text}\n`, 'utf-8');
  return {
    dir,
    corpusPath,
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}
