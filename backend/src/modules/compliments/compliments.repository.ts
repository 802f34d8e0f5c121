import type { Pool } from "pg";
import { runQuery } from "../../db/pool";

export type ComplimentKind = "correct" | "wrong";

export type Compliment = {
  id: number;
  kind: ComplimentKind;
  text: string;
};

export interface ComplimentRepository {
  add(kind: ComplimentKind, text: string): Promise<Compliment>;
  list(): Promise<Compliment[]>;
  remove(id: number): Promise<boolean>;
  removeAll(): Promise<number>;
  /** One random text from the shared pool. */
  pickShared(kind: ComplimentKind): Promise<string | null>;
  /** The chat's own text for this kind, if it set one. */
  findForChat(chatId: number, kind: ComplimentKind): Promise<string | null>;
  /** Replaces the chat's text for this kind. */
  setForChat(chatId: number, kind: ComplimentKind, text: string): Promise<void>;
  /** Chats without a stored preference have compliments on. */
  isEnabledIn(chatId: number): Promise<boolean>;
  setEnabledIn(chatId: number, enabled: boolean): Promise<void>;
}

type ComplimentRow = {
  id: string;
  kind: ComplimentKind;
  text: string;
};

function toCompliment(r: ComplimentRow): Compliment {
  return { id: Number(r.id), kind: r.kind, text: r.text };
}

export class PgComplimentRepository implements ComplimentRepository {
  constructor(private readonly pool: Pool) {}

  async add(kind: ComplimentKind, text: string): Promise<Compliment> {
    const { rows } = await runQuery(() =>
      this.pool.query<ComplimentRow>(
        `INSERT INTO compliments (kind, text) VALUES ($1, $2) RETURNING id, kind, text`,
        [kind, text]
      )
    );
    return toCompliment(rows[0]);
  }

  async list(): Promise<Compliment[]> {
    const { rows } = await runQuery(() =>
      this.pool.query<ComplimentRow>(`SELECT id, kind, text FROM compliments ORDER BY id`)
    );
    return rows.map(toCompliment);
  }

  async remove(id: number): Promise<boolean> {
    const { rowCount } = await runQuery(() => this.pool.query(`DELETE FROM compliments WHERE id = $1`, [id]));
    return (rowCount ?? 0) > 0;
  }

  async removeAll(): Promise<number> {
    const { rowCount } = await runQuery(() => this.pool.query(`DELETE FROM compliments`));
    return rowCount ?? 0;
  }

  async pickShared(kind: ComplimentKind): Promise<string | null> {
    const { rows } = await runQuery(() =>
      this.pool.query<{ text: string }>(
        `SELECT text FROM compliments WHERE kind = $1 ORDER BY random() LIMIT 1`,
        [kind]
      )
    );
    return rows[0]?.text ?? null;
  }

  async findForChat(chatId: number, kind: ComplimentKind): Promise<string | null> {
    const { rows } = await runQuery(() =>
      this.pool.query<{ text: string }>(
        `SELECT text FROM group_compliments WHERE chat_id = $1 AND kind = $2`,
        [chatId, kind]
      )
    );
    return rows[0]?.text ?? null;
  }

  async setForChat(chatId: number, kind: ComplimentKind, text: string): Promise<void> {
    await runQuery(() =>
      this.pool.query(
        `INSERT INTO group_compliments (chat_id, kind, text)
         VALUES ($1, $2, $3)
         ON CONFLICT (chat_id, kind) DO UPDATE SET text = EXCLUDED.text`,
        [chatId, kind, text]
      )
    );
  }

  async isEnabledIn(chatId: number): Promise<boolean> {
    const { rows } = await runQuery(() =>
      this.pool.query<{ compliments_enabled: boolean }>(
        `SELECT compliments_enabled FROM group_settings WHERE chat_id = $1`,
        [chatId]
      )
    );
    return rows[0]?.compliments_enabled ?? true;
  }

  async setEnabledIn(chatId: number, enabled: boolean): Promise<void> {
    await runQuery(() =>
      this.pool.query(
        `INSERT INTO group_settings (chat_id, compliments_enabled)
         VALUES ($1, $2)
         ON CONFLICT (chat_id) DO UPDATE SET compliments_enabled = EXCLUDED.compliments_enabled`,
        [chatId, enabled]
      )
    );
  }
}
