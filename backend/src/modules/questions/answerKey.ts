import { ValidationError } from "../../utils/errors";

export type OptionIndex = 0 | 1 | 2 | 3;

const ANSWER_KEYS = new Map<string, OptionIndex>([
  ["1", 0],
  ["2", 1],
  ["3", 2],
  ["4", 3],
  ["A", 0],
  ["B", 1],
  ["C", 2],
  ["D", 3]
]);

export function normalizeAnswerKey(raw: string): string {
  return raw.trim().toUpperCase();
}

export function isAnswerKey(raw: string): boolean {
  return ANSWER_KEYS.has(normalizeAnswerKey(raw));
}

/** `1`-`4` or `A`-`D` (any case) to a 0-based option index. */
export function parseAnswerKey(raw: string): OptionIndex {
  const index = ANSWER_KEYS.get(normalizeAnswerKey(raw));
  if (index === undefined) {
    throw new ValidationError(`Invalid answer key "${raw}"`, "Use 1-4 or A-D for the correct option");
  }
  return index;
}

export function isOptionIndex(value: number): value is OptionIndex {
  return value === 0 || value === 1 || value === 2 || value === 3;
}
