import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import { SessionNotFoundError } from "../../domain/errors/app.error";

export interface EndSessionUseCaseParams {
  sessionId: string;
}

export class EndSessionUseCase {
  constructor(private sessionRepository: ISessionRepository) {}

  async execute(params: EndSessionUseCaseParams): Promise<void> {
    const deleted = await this.sessionRepository.delete(params.sessionId);
    if (!deleted) {
      throw new SessionNotFoundError(params.sessionId);
    }
    console.log(`[EndSessionUseCase] Ended session ${params.sessionId}`);
  }
}
