// Schema-constrained workout log parser
//
// One model call per raw entry. The model's answer must be JSON; anything else is a
// ParseError and is not repaired or retried here. A missing status counts as
// needs_review, never as ok.

import type { z } from 'zod';
import { ParseError } from './errors.js';
import type { TextGenerator } from './llm.js';
import { PARSER_INSTRUCTIONS, parserInput } from './prompts.js';
import { ParsedWorkoutSchema, ReviewSchema } from './schema.js';
import type { Activity, ParsedWorkout, ReviewPayload } from './schema.js';

export type ParseResult =
  | { status: 'ok'; parsed: ParsedWorkout; parsedJson: string }
  | { status: 'needs_review'; parsed: ReviewPayload; parsedJson: string };

const NUMBER_WORDS = [
  'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten',
  'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen', 'seventeen', 'eighteen', 'nineteen', 'twenty'
];

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

/**
 * Numbers the raw text actually states: digit groups (3, 60, 2.5), every part of
 * a comma list (8,10,12) and number words up to twenty. A lone comma pair such
 * as 2,5 also counts as the decimal 2.5.
 */
export function numbersInText(text: string): Set<number> {
  const found = new Set<number>();
  for (const match of text.matchAll(/\d+(?:\.\d+)?(?:,\d+(?:\.\d+)?)*/g)) {
    const parts = match[0].split(',');
    for (const part of parts) found.add(Number(part));
    if (parts.length === 2 && !parts[0].includes('.') && !parts[1].includes('.')) {
      found.add(Number(`${parts[0]}.${parts[1]}`));
    }
  }
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  for (const word of words) {
    const value = NUMBER_WORDS.indexOf(word);
    if (value >= 0) found.add(value);
  }
  return found;
}

/**
 * Exercises whose weight or reps is not backed by a number in the raw text.
 */
export function unbackedExercises(rawText: string, activities: Activity[]): string[] {
  const stated = numbersInText(rawText);
  const names = new Set<string>();
  for (const a of activities) {
    const invented = [a.weight, a.reps].some(v => v !== null && !stated.has(v));
    if (invented) names.add(a.exercise);
  }
  return [...names];
}

function toReview(parsed: ParsedWorkout, questions: string[]): ReviewPayload {
  return { ...parsed, status: 'needs_review', questions };
}

export async function parseWorkoutLog(generator: TextGenerator, rawText: string, defaultDate: string): Promise<ParseResult> {
  const output = await generator.generate(PARSER_INSTRUCTIONS, parserInput(rawText, defaultDate));

  let obj: unknown;
  try {
    obj = JSON.parse(output);
  } catch (err) {
    throw new ParseError(`Model output is not valid JSON: ${output.slice(0, 200)}`, { cause: err });
  }

  if (typeof obj !== 'object' || obj === null || Array.isArray(obj)) {
    throw new ParseError('Model output is not a JSON object');
  }

  const rawStatus = 'status' in obj ? obj.status : undefined;
  const status = rawStatus ?? 'needs_review';

  if (status === 'needs_review') {
    const review = ReviewSchema.safeParse({ ...obj, status });
    if (!review.success) {
      throw new ParseError(`Review payload rejected: ${formatIssues(review.error)}`);
    }
    return { status: 'needs_review', parsed: review.data, parsedJson: JSON.stringify(review.data) };
  }

  if (status !== 'ok') {
    throw new ParseError(`Unknown status ${JSON.stringify(status)}`);
  }

  const result = ParsedWorkoutSchema.safeParse(obj);
  if (!result.success) {
    throw new ParseError(`Workout rejected: ${formatIssues(result.error)}`);
  }

  // Questions on an ok answer mean the model was not sure after all
  if (result.data.questions.length > 0) {
    const review = toReview(result.data, result.data.questions);
    return { status: 'needs_review', parsed: review, parsedJson: JSON.stringify(review) };
  }

  const invented = unbackedExercises(rawText, result.data.activities);
  if (invented.length > 0) {
    const review = toReview(result.data, [
      `The log does not state the weight or reps recorded for ${invented.join(', ')}. What were they?`
    ]);
    return { status: 'needs_review', parsed: review, parsedJson: JSON.stringify(review) };
  }

  return { status: 'ok', parsed: result.data, parsedJson: JSON.stringify(result.data) };
}
