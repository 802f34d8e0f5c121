import { ValidationError } from "../../utils/errors";
import { escapeHtml } from "../messaging/messages";
import type { Compliment, ComplimentKind, ComplimentRepository } from "./compliments.repository";

const USER_PLACEHOLDER = "{user}";

export type Answerer = {
  username?: string | null;
  displayName?: string | null;
  userId: number;
};

export function parseComplimentKind(raw: string, usage: string): ComplimentKind {
  const kind = raw.toLowerCase();
  if (kind === "correct" || kind === "wrong") return kind;
  throw new ValidationError("Type must be 'correct' or 'wrong'", usage);
}

/** `@username` when there is one, otherwise the bold first name. */
export function mentionOf(user: Answerer): string {
  if (user.username) return `@${escapeHtml(user.username)}`;
  return `<b>${escapeHtml(user.displayName ?? `User ${user.userId}`)}</b>`;
}

/** Escapes the stored template, then puts the mention in place of every `{user}`. */
export function renderCompliment(template: string, user: Answerer): string {
  return escapeHtml(template).split(USER_PLACEHOLDER).join(mentionOf(user));
}

/**
 * Short reactions posted in a group after a scored answer. A group's own text for the
 * kind wins over the shared pool; groups can switch them off.
 */
export class ComplimentService {
  constructor(private readonly repo: ComplimentRepository) {}

  add(kind: ComplimentKind, text: string): Promise<Compliment> {
    const trimmed = text.trim();
    if (!trimmed) throw new ValidationError("Compliment text is empty", "/addcompliment correct|wrong <text>");
    return this.repo.add(kind, trimmed);
  }

  list(): Promise<Compliment[]> {
    return this.repo.list();
  }

  remove(id: number): Promise<boolean> {
    return this.repo.remove(id);
  }

  clear(): Promise<number> {
    return this.repo.removeAll();
  }

  async setForChat(chatId: number, kind: ComplimentKind, text: string): Promise<void> {
    const trimmed = text.trim();
    if (!trimmed) throw new ValidationError("Compliment text is empty", "/setcomp correct|wrong <text>");
    await this.repo.setForChat(chatId, kind, trimmed);
  }

  setEnabled(chatId: number, enabled: boolean): Promise<void> {
    return this.repo.setEnabledIn(chatId, enabled);
  }

  /** Rendered compliment for the answer, or null when the chat has none or turned them off. */
  async complimentFor(chatId: number, correct: boolean, user: Answerer): Promise<string | null> {
    if (!(await this.repo.isEnabledIn(chatId))) return null;

    const kind: ComplimentKind = correct ? "correct" : "wrong";
    const template = (await this.repo.findForChat(chatId, kind)) ?? (await this.repo.pickShared(kind));
    return template === null ? null : renderCompliment(template, user);
  }
}
