import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { SessionState } from "../../domain/entities/session";
import { SessionNotFoundError } from "../../domain/errors/app.error";
import { resetSession } from "../../domain/utils/session.state";

export interface ResetSessionUseCaseParams {
  sessionId: string;
}

export class ResetSessionUseCase {
  constructor(private sessionRepository: ISessionRepository) {}

  async execute(params: ResetSessionUseCaseParams): Promise<SessionState> {
    const session = await this.sessionRepository.findById(params.sessionId);
    if (!session) {
      throw new SessionNotFoundError(params.sessionId);
    }
    return this.sessionRepository.save(resetSession(session));
  }
}
