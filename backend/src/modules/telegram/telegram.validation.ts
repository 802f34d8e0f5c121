import { z } from "zod";

const UserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().optional(),
  username: z.string().optional(),
  first_name: z.string().optional()
});

export const PollAnswerSchema = z.object({
  poll_id: z.string().min(1),
  user: UserSchema,
  option_ids: z.array(z.number().int())
});

export const MessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({
    id: z.number().int(),
    type: z.string(),
    title: z.string().optional()
  }),
  from: UserSchema.optional(),
  text: z.string().optional()
});

/** Only the update kinds the bot subscribes to; anything else is accepted and ignored. */
export const UpdateSchema = z.object({
  update_id: z.number().int(),
  message: MessageSchema.optional(),
  poll_answer: PollAnswerSchema.optional()
});

export type TelegramUser = z.infer<typeof UserSchema>;
export type TelegramMessage = z.infer<typeof MessageSchema>;
export type TelegramPollAnswer = z.infer<typeof PollAnswerSchema>;
export type TelegramUpdate = z.infer<typeof UpdateSchema>;

export type ParsedCommand = {
  name: string;
  args: string;
};

/** "/cmd@BotName rest" -> { name: "cmd", args: "rest" }. Null for non-commands. */
export function parseCommand(text: string | undefined): ParsedCommand | null {
  if (!text) return null;
  const match = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;
  return { name: match[1].toLowerCase(), args: (match[2] ?? "").trim() };
}
