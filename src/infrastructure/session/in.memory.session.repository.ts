import type { SessionState } from "../../domain/entities/session";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";

/**
 * Session states live only as long as the process.
 */
export class InMemorySessionRepository implements ISessionRepository {
  private sessions = new Map<string, SessionState>();

  async findById(id: string): Promise<SessionState | null> {
    return this.sessions.get(id) ?? null;
  }

  async save(state: SessionState): Promise<SessionState> {
    this.sessions.set(state.id, state);
    return state;
  }

  async delete(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  async deleteIdleSince(cutoff: Date): Promise<string[]> {
    const expired: string[] = [];
    for (const [id, state] of this.sessions) {
      if (state.lastActiveAt.getTime() < cutoff.getTime()) {
        expired.push(id);
      }
    }
    for (const id of expired) {
      this.sessions.delete(id);
    }
    return expired;
  }

  async count(): Promise<number> {
    return this.sessions.size;
  }
}
