import { createLogger } from '../logger';
import type { ChatMessage, CourseQaLlm, TimestampIntent } from './types';

const log = createLogger('intent-parser');

const PARSER_SYSTEM_PROMPT = 'You are a parsing assistant.';

function buildInstructions(question: string): string {
  return [
    `Given the following question: "${question}"`,
    '',
    'Identify if it references a lecture and a specific timestamp. If so, return the following format:',
    '[lecture_number, (start_time_in_seconds, end_time_in_seconds)]',
    '',
    'Example:',
    'Input: "Summarize the first 5 minutes of lecture 4"',
    'Output: [4, (0, 300)]',
    '',
    'Input: "What is recursion?"',
    'Output: None',
    '',
    'Return only the specified format, without any extra text or explanation.',
  ].join('\n');
}

export function buildIntentMessages(question: string): ChatMessage[] {
  return [
    { role: 'system', content: PARSER_SYSTEM_PROMPT },
    { role: 'user', content: buildInstructions(question) },
  ];
}

class LiteralReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos += 1;
  }

  expect(ch: string): boolean {
    this.skipWhitespace();
    if (this.text[this.pos] !== ch) return false;
    this.pos += 1;
    return true;
  }

  readDigits(): string | null {
    const start = this.pos;
    while (this.pos < this.text.length && /[0-9]/.test(this.text[this.pos])) this.pos += 1;
    return this.pos > start ? this.text.slice(start, this.pos) : null;
  }

  readInteger(): number | null {
    this.skipWhitespace();
    const digits = this.readDigits();
    if (digits == null) return null;
    // "4.0" is a float literal, not a lecture number
    if (this.text[this.pos] === '.') return null;
    return Number(digits);
  }

  readNumber(): number | null {
    this.skipWhitespace();
    const whole = this.readDigits();
    if (whole == null) return null;
    if (this.text[this.pos] !== '.') return Number(whole);
    this.pos += 1;
    const fraction = this.readDigits();
    if (fraction == null) return null;
    return Number(`${whole}.${fraction}`);
  }

  atEnd(): boolean {
    this.skipWhitespace();
    return this.pos === this.text.length;
  }
}

/**
 * Parse `[lecture, (start, end)]` strictly. Returns null for anything else,
 * including a trailing character after the closing bracket.
 */
export function parseIntentLiteral(text: string): TimestampIntent | null {
  const reader = new LiteralReader(text);
  if (!reader.expect('[')) return null;
  const lectureNumber = reader.readInteger();
  if (lectureNumber == null || !Number.isSafeInteger(lectureNumber) || lectureNumber <= 0) return null;
  if (!reader.expect(',')) return null;
  if (!reader.expect('(')) return null;
  const start = reader.readNumber();
  if (start == null) return null;
  if (!reader.expect(',')) return null;
  const end = reader.readNumber();
  if (end == null) return null;
  if (!reader.expect(')')) return null;
  if (!reader.expect(']')) return null;
  if (!reader.atEnd()) return null;
  return {
    lectureNumber,
    timeRange: { startSeconds: Math.trunc(start), endSeconds: Math.trunc(end) },
  };
}

/**
 * Ask the model whether the question is scoped to a lecture and time range.
 * Best effort: every failure, including a service error, reads as "no intent".
 */
export async function parseTimestampQuestion(
  llm: CourseQaLlm,
  question: string
): Promise<TimestampIntent | null> {
  let reply: string;
  try {
    reply = (await llm.chat(buildIntentMessages(question))).trim();
  } catch (error) {
    log.warn({ err: error }, 'intent classification call failed');
    return null;
  }

  if (reply.toLowerCase() === 'none') return null;

  const intent = parseIntentLiteral(reply);
  if (!intent) {
    log.debug({ reply }, 'unrecognised intent reply');
  }
  return intent;
}
