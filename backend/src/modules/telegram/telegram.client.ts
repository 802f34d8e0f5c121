import { z } from "zod";
import { GatewayError } from "../../utils/errors";
import { clipText, splitMessage } from "../messaging/messages";
import type { MessagingGateway, OutgoingPoll } from "../messaging/messaging.gateway";

// Bot API limits for quiz polls
export const POLL_QUESTION_LIMIT = 300;
export const POLL_OPTION_LIMIT = 100;
export const POLL_EXPLANATION_LIMIT = 200;

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional()
});

const SentPollSchema = z.object({
  poll: z.object({ id: z.string().min(1) })
});

const ChatMemberSchema = z.object({
  status: z.string()
});

export type TelegramClientOptions = {
  token: string;
  apiBase: string;
  fetchImpl?: typeof fetch;
};

export class TelegramGateway implements MessagingGateway {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TelegramClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async sendPoll(chatId: number, poll: OutgoingPoll): Promise<{ pollId: string }> {
    const result = await this.call("sendPoll", {
      chat_id: chatId,
      question: clipText(poll.question, POLL_QUESTION_LIMIT),
      options: poll.options.map((text) => ({ text: clipText(text, POLL_OPTION_LIMIT) })),
      type: "quiz",
      is_anonymous: false,
      correct_option_id: poll.correctOptionIndex,
      explanation: clipText(poll.explanation, POLL_EXPLANATION_LIMIT)
    });

    const parsed = SentPollSchema.safeParse(result);
    if (!parsed.success) throw new GatewayError("sendPoll returned no poll id");
    return { pollId: parsed.data.poll.id };
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    for (const chunk of splitMessage(text)) {
      await this.call("sendMessage", { chat_id: chatId, text: chunk, parse_mode: "HTML" });
    }
  }

  async getMemberStatus(chatId: number, userId: number): Promise<string> {
    const result = await this.call("getChatMember", { chat_id: chatId, user_id: userId });
    const parsed = ChatMemberSchema.safeParse(result);
    if (!parsed.success) throw new GatewayError("getChatMember returned no status");
    return parsed.data.status;
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call("setWebhook", {
      url,
      allowed_updates: ["message", "poll_answer"],
      ...(secretToken ? { secret_token: secretToken } : {})
    });
  }

  private async call(method: string, payload: Record<string, unknown>): Promise<unknown> {
    const url = `${this.options.apiBase}/bot${this.options.token}/${method}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload)
      });
    } catch (e) {
      throw new GatewayError(`${method} request failed`, e);
    }

    const text = await res.text();
    let body: unknown = null;
    try {
      body = text ? JSON.parse(text) : null;
    } catch {
      body = null; // proxies answer with HTML on 5xx
    }

    const parsed = ApiResponseSchema.safeParse(body);
    if (!parsed.success) throw new GatewayError(`${method} failed (${res.status})`);
    if (!parsed.data.ok) {
      throw new GatewayError(parsed.data.description ?? `${method} failed (${res.status})`);
    }
    return parsed.data.result;
  }
}
