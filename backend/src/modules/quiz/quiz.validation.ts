import { z } from "zod";

const ChatId = z.number().int().refine(Number.isSafeInteger, "must be a safe integer");

export const AnswerEventRequestSchema = z.object({
  pollId: z.string().min(1),
  userId: z.number().int().positive(),
  username: z.string().min(1).nullish(),
  displayName: z.string().min(1).nullish(),
  optionIds: z.array(z.number().int().min(0).max(9)).max(10)
});

export const DispatchRequestSchema = z.object({
  chatId: ChatId,
  isGroup: z.boolean()
});

export type AnswerEventRequest = z.infer<typeof AnswerEventRequestSchema>;
export type DispatchRequest = z.infer<typeof DispatchRequestSchema>;
