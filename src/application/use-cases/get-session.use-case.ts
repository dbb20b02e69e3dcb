import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { SessionState } from "../../domain/entities/session";
import { SessionNotFoundError } from "../../domain/errors/app.error";
import { touch } from "../../domain/utils/session.state";

export interface GetSessionUseCaseParams {
  sessionId: string;
}

export class GetSessionUseCase {
  constructor(private sessionRepository: ISessionRepository) {}

  async execute(params: GetSessionUseCaseParams): Promise<SessionState> {
    const session = await this.sessionRepository.findById(params.sessionId);
    if (!session) {
      throw new SessionNotFoundError(params.sessionId);
    }
    // Polling the view counts as activity for idle expiry
    return this.sessionRepository.save(touch(session));
  }
}
