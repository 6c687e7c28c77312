import { Session, type SessionSocket } from "./session.js";

/** Logged-in sessions by socket, id and name */
export class SessionRegistry {
  private bySocket = new Map<SessionSocket, Session>();

  add(session: Session): void {
    this.bySocket.set(session.socket, session);
  }

  remove(socket: SessionSocket): Session | undefined {
    const session = this.bySocket.get(socket);
    this.bySocket.delete(socket);
    return session;
  }

  get(socket: SessionSocket): Session | undefined {
    return this.bySocket.get(socket);
  }

  getById(id: number): Session | undefined {
    return this.all().find((s) => s.id === id);
  }

  /** Case-insensitive */
  getByName(name: string): Session | undefined {
    const lower = name.toLowerCase();
    return this.all().find((s) => s.name.toLowerCase() === lower);
  }

  all(): Session[] {
    return Array.from(this.bySocket.values());
  }

  get size(): number {
    return this.bySocket.size;
  }
}
