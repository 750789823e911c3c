const HOMEWORK_KEYWORDS = [
  'homework',
  'assignment',
  'problem set',
  'pset',
  'task',
  'exercise',
  'solve',
  'implement',
];

export const HONOR_CODE_NOTICE =
  'It seems your question may relate to homework. Please refer to the official honor code, which does not allow the use of AI to solve or assist in completing the homework.';

export function isHomeworkRelated(question: string): boolean {
  const normalized = question.toLowerCase();
  return HOMEWORK_KEYWORDS.some((keyword) => normalized.includes(keyword));
}
