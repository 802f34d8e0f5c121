import type { Pool } from "pg";
import { runQuery, withTransaction } from "../../db/pool";

export type QuestionOptions = [string, string, string, string];

export type Question = {
  id: number;
  question: string;
  options: QuestionOptions;
  correct: string; // normalized answer key, e.g. "B" or "2"
  explanation: string;
};

export type NewQuestion = Omit<Question, "id">;

export interface QuestionRepository {
  insertMany(questions: NewQuestion[]): Promise<number>;
  count(): Promise<number>;
  deleteAll(): Promise<number>;
  /** Picks one stored question uniformly at random and deletes it in the same step. */
  drawAndRetire(): Promise<Question | null>;
}

type QuestionRow = {
  id: string;
  question: string;
  option_a: string;
  option_b: string;
  option_c: string;
  option_d: string;
  correct: string;
  explanation: string;
};

function toQuestion(r: QuestionRow): Question {
  return {
    id: Number(r.id),
    question: r.question,
    options: [r.option_a, r.option_b, r.option_c, r.option_d],
    correct: r.correct,
    explanation: r.explanation
  };
}

export class PgQuestionRepository implements QuestionRepository {
  constructor(private readonly pool: Pool) {}

  async insertMany(questions: NewQuestion[]): Promise<number> {
    if (questions.length === 0) return 0;
    return withTransaction(this.pool, async (client) => {
      for (const q of questions) {
        await client.query(
          `INSERT INTO questions (question, option_a, option_b, option_c, option_d, correct, explanation)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [q.question, ...q.options, q.correct, q.explanation]
        );
      }
      return questions.length;
    });
  }

  async count(): Promise<number> {
    const { rows } = await runQuery(() => this.pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM questions`));
    return Number(rows[0]?.count ?? 0);
  }

  async deleteAll(): Promise<number> {
    const { rowCount } = await runQuery(() => this.pool.query(`DELETE FROM questions`));
    return rowCount ?? 0;
  }

  async drawAndRetire(): Promise<Question | null> {
    // SKIP LOCKED: concurrent draws never pick (and both "retire") the same row.
    const { rows } = await runQuery(() =>
      this.pool.query<QuestionRow>(
        `DELETE FROM questions
         WHERE id = (
           SELECT id
           FROM questions
           ORDER BY random()
           LIMIT 1
           FOR UPDATE SKIP LOCKED
         )
         RETURNING id, question, option_a, option_b, option_c, option_d, correct, explanation`
      )
    );
    return rows[0] ? toQuestion(rows[0]) : null;
  }
}
