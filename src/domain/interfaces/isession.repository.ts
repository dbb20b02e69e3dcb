import type { SessionState } from "../entities/session";

export interface ISessionRepository {
  findById(id: string): Promise<SessionState | null>;
  save(state: SessionState): Promise<SessionState>;
  delete(id: string): Promise<boolean>;
  deleteIdleSince(cutoff: Date): Promise<string[]>;
  count(): Promise<number>;
}
