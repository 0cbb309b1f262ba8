import type { AuditEvent } from "../stores/interfaces";
import type { User } from "./model";
import { LibraryError } from "./errors";

export type EventActor = Pick<AuditEvent, "actorType" | "actorId">;

export const SYSTEM_ACTOR: EventActor = { actorType: "system", actorId: "overdue-sweep" };

export function actorOf(user: Pick<User, "id" | "isLibrarian">): EventActor {
  return { actorType: user.isLibrarian ? "librarian" : "member", actorId: user.id };
}

export function requireLibrarian(user: Pick<User, "id" | "isLibrarian">, action: string): void {
  if (!user.isLibrarian) {
    throw new LibraryError("Forbidden", `Only librarians may ${action}.`, { userId: user.id, action });
  }
}

export function requireOwnerOrLibrarian(user: Pick<User, "id" | "isLibrarian">, ownerId: string, action: string): void {
  if (user.isLibrarian || user.id === ownerId) return;
  throw new LibraryError("Forbidden", `You may only ${action} your own records.`, { userId: user.id, action });
}
