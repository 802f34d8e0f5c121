import type { OptionIndex } from "../questions/answerKey";

export type OutgoingPoll = {
  question: string;
  options: string[];
  correctOptionIndex: OptionIndex;
  explanation: string;
};

/** Outbound side of the chat platform. Implementations throw GatewayError on refusal. */
export interface MessagingGateway {
  sendPoll(chatId: number, poll: OutgoingPoll): Promise<{ pollId: string }>;
  sendMessage(chatId: number, text: string): Promise<void>;
  /** The member's status in the chat: "creator", "administrator", "member", "left", ... */
  getMemberStatus(chatId: number, userId: number): Promise<string>;
}
