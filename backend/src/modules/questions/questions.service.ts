import { ValidationError } from "../../utils/errors";
import { withRetry, type RetryOptions } from "../../utils/retry";
import { parseQuestionBlocks } from "./questions.parser";
import type { Question, QuestionRepository } from "./questions.repository";

export type ImportSummary = {
  added: number;
  skipped: number;
};

export class QuestionService {
  constructor(private readonly repo: QuestionRepository, private readonly retry: RetryOptions) {}

  async importText(text: string): Promise<ImportSummary> {
    if (text.trim().length === 0) {
      throw new ValidationError("Nothing to import", "/addquestion <question blocks>");
    }
    const parsed = parseQuestionBlocks(text);
    const added = await this.repo.insertMany(parsed.questions);
    return { added, skipped: parsed.skipped };
  }

  count(): Promise<number> {
    return this.repo.count();
  }

  clear(): Promise<number> {
    return this.repo.deleteAll();
  }

  /** `null` means the bank is exhausted, which is a normal outcome. */
  drawAndRetire(): Promise<Question | null> {
    return withRetry(() => this.repo.drawAndRetire(), this.retry);
  }
}
