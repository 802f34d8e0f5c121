import { UnauthorizedError, ValidationError } from "../../utils/errors";
import type { ChatRepository } from "./chats.repository";

export class AdminService {
  constructor(private readonly chats: ChatRepository, private readonly ownerId: number) {}

  isOwner(userId: number): boolean {
    return userId === this.ownerId;
  }

  async isAdmin(userId: number): Promise<boolean> {
    if (this.isOwner(userId)) return true;
    return this.chats.isAdmin(userId);
  }

  async assertAdmin(userId: number): Promise<void> {
    if (!(await this.isAdmin(userId))) throw new UnauthorizedError();
  }

  assertOwner(userId: number): void {
    if (!this.isOwner(userId)) throw new UnauthorizedError("This action is restricted to the owner");
  }

  async addAdmin(actorId: number, userId: number): Promise<void> {
    this.assertOwner(actorId);
    if (!Number.isSafeInteger(userId)) throw new ValidationError("Invalid user id", "/addadmin <user_id>");
    await this.chats.addAdmin(userId);
  }

  async removeAdmin(actorId: number, userId: number): Promise<boolean> {
    this.assertOwner(actorId);
    if (!Number.isSafeInteger(userId)) throw new ValidationError("Invalid user id", "/removeadmin <user_id>");
    return this.chats.removeAdmin(userId);
  }

  /** Owner first, then stored admins without duplicates. */
  async listAdmins(actorId: number): Promise<number[]> {
    await this.assertAdmin(actorId);
    const stored = await this.chats.listAdmins();
    return [this.ownerId, ...stored.filter((id) => id !== this.ownerId)];
  }
}
