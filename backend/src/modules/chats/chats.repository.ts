import type { Pool } from "pg";
import { runQuery } from "../../db/pool";

/** Incoming profile fields; null or absent values never overwrite stored ones. */
export type ProfileUpdate = {
  userId: number;
  username?: string | null;
  firstName?: string | null;
};

export type ChatType = "private" | "group" | "supergroup" | "channel";

export type Chat = {
  chatId: number;
  type: ChatType;
  title: string | null;
};

export interface ChatRepository {
  upsertUser(profile: ProfileUpdate): Promise<void>;
  listUserIds(): Promise<number[]>;
  countUsers(): Promise<number>;

  registerChat(chat: Chat): Promise<void>;
  listGroupChats(): Promise<Chat[]>;
  removeChat(chatId: number): Promise<void>;
  /** Group chats only. */
  countChats(): Promise<number>;

  isAdmin(userId: number): Promise<boolean>;
  addAdmin(userId: number): Promise<void>;
  removeAdmin(userId: number): Promise<boolean>;
  listAdmins(): Promise<number[]>;
}

type ChatRow = {
  chat_id: string;
  type: string;
  title: string | null;
};

type IdRow = { id: string };
type CountRow = { count: string };

export function toChatType(value: string): ChatType {
  switch (value) {
    case "private":
    case "group":
    case "supergroup":
    case "channel":
      return value;
    default:
      return "group";
  }
}

export class PgChatRepository implements ChatRepository {
  constructor(private readonly pool: Pool) {}

  async upsertUser(profile: ProfileUpdate): Promise<void> {
    await runQuery(() =>
      this.pool.query(
        `INSERT INTO users (user_id, username, first_name)
         VALUES ($1, $2, $3)
         ON CONFLICT (user_id) DO UPDATE SET
           username = COALESCE(EXCLUDED.username, users.username),
           first_name = COALESCE(EXCLUDED.first_name, users.first_name)`,
        [profile.userId, profile.username ?? null, profile.firstName ?? null]
      )
    );
  }

  async listUserIds(): Promise<number[]> {
    const { rows } = await runQuery(() => this.pool.query<IdRow>(`SELECT user_id AS id FROM users ORDER BY user_id`));
    return rows.map((r) => Number(r.id));
  }

  async countUsers(): Promise<number> {
    return this.count(`SELECT COUNT(*) AS count FROM users`);
  }

  async registerChat(chat: Chat): Promise<void> {
    await runQuery(() =>
      this.pool.query(
        `INSERT INTO chats (chat_id, type, title)
         VALUES ($1, $2, $3)
         ON CONFLICT (chat_id) DO UPDATE SET
           type = EXCLUDED.type,
           title = COALESCE(EXCLUDED.title, chats.title)`,
        [chat.chatId, chat.type, chat.title]
      )
    );
  }

  async listGroupChats(): Promise<Chat[]> {
    const { rows } = await runQuery(() =>
      this.pool.query<ChatRow>(
        `SELECT chat_id, type, title
         FROM chats
         WHERE type <> 'private'
         ORDER BY added_at, chat_id`
      )
    );
    return rows.map((r) => ({ chatId: Number(r.chat_id), type: toChatType(r.type), title: r.title }));
  }

  async removeChat(chatId: number): Promise<void> {
    await runQuery(() => this.pool.query(`DELETE FROM chats WHERE chat_id = $1`, [chatId]));
  }

  async countChats(): Promise<number> {
    return this.count(`SELECT COUNT(*) AS count FROM chats WHERE type <> 'private'`);
  }

  async isAdmin(userId: number): Promise<boolean> {
    const { rows } = await runQuery(() => this.pool.query(`SELECT 1 FROM admins WHERE user_id = $1`, [userId]));
    return rows.length > 0;
  }

  async addAdmin(userId: number): Promise<void> {
    await runQuery(() =>
      this.pool.query(
        `INSERT INTO admins (user_id)
         VALUES ($1)
         ON CONFLICT (user_id) DO NOTHING`,
        [userId]
      )
    );
  }

  async removeAdmin(userId: number): Promise<boolean> {
    const { rowCount } = await runQuery(() => this.pool.query(`DELETE FROM admins WHERE user_id = $1`, [userId]));
    return (rowCount ?? 0) > 0;
  }

  async listAdmins(): Promise<number[]> {
    const { rows } = await runQuery(() => this.pool.query<IdRow>(`SELECT user_id AS id FROM admins ORDER BY added_at`));
    return rows.map((r) => Number(r.id));
  }

  private async count(sql: string): Promise<number> {
    const { rows } = await runQuery(() => this.pool.query<CountRow>(sql));
    return Number(rows[0]?.count ?? 0);
  }
}
