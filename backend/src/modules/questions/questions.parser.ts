/**
 * Bulk question import format
 * ---------------------------
 * Questions are separated by a blank line. Inside a block, from the bottom up:
 *
 *   <question text, may span several lines>
 *   <option A>
 *   <option B>
 *   <option C>
 *   <option D>
 *   <answer key: 1-4 or A-D>
 *   <explanation>
 */

import { isAnswerKey, normalizeAnswerKey } from "./answerKey";
import type { NewQuestion } from "./questions.repository";

export type ParsedImport = {
  questions: NewQuestion[];
  skipped: number;
};

const MIN_BLOCK_LINES = 7;

export function parseQuestionBlocks(text: string): ParsedImport {
  const blocks = text
    .replace(/\r\n?/g, "\n")
    .split(/\n[ \t]*\n/)
    .map((b) => b.trim())
    .filter((b) => b.length > 0);

  const questions: NewQuestion[] = [];
  let skipped = 0;

  for (const block of blocks) {
    const lines = block
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0);

    if (lines.length < MIN_BLOCK_LINES) {
      skipped++;
      continue;
    }

    const n = lines.length;
    const correct = lines[n - 2];
    if (!isAnswerKey(correct)) {
      skipped++;
      continue;
    }

    questions.push({
      question: lines.slice(0, n - 6).join("\n"),
      options: [lines[n - 6], lines[n - 5], lines[n - 4], lines[n - 3]],
      correct: normalizeAnswerKey(correct),
      explanation: lines[n - 1]
    });
  }

  return { questions, skipped };
}
