import { Router } from "express";
import { asyncHandler } from "../../middleware/errorHandler";
import { AnswerEventRequestSchema, DispatchRequestSchema } from "./quiz.validation";
import type { QuizService } from "./quiz.service";

export function createQuizRouter(quiz: QuizService): Router {
  const router = Router();

  // POST /v1/quiz/dispatch
  router.post(
    "/dispatch",
    asyncHandler(async (req, res) => {
      const parsed = DispatchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request", details: parsed.error.flatten().fieldErrors });
      }

      const question = await quiz.dispatchQuiz(parsed.data);
      if (!question) return res.json({ question: null });
      // The answer key stays server-side.
      return res.json({ question: { id: question.id, question: question.question, options: question.options } });
    })
  );

  return router;
}

export function createPollsRouter(quiz: QuizService): Router {
  const router = Router();

  // POST /v1/polls/answers
  router.post(
    "/answers",
    asyncHandler(async (req, res) => {
      const parsed = AnswerEventRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request", details: parsed.error.flatten().fieldErrors });
      }

      const result = await quiz.onAnswerEvent(parsed.data);
      return res.json(result);
    })
  );

  return router;
}
