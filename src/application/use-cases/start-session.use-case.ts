import { randomUUID } from "crypto";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { SessionState } from "../../domain/entities/session";
import { ConfigurationError } from "../../domain/errors/app.error";
import { startSession } from "../../domain/utils/session.state";

export class StartSessionUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private appPassword: string | undefined
  ) {}

  async execute(): Promise<SessionState> {
    const session = startSession(randomUUID(), this.appPassword);

    // Fail closed: without a configured password no session is handed out
    if (session.gate.error?.kind === "configuration") {
      throw new ConfigurationError(session.gate.error.message);
    }

    await this.sessionRepository.save(session);
    console.log(`[StartSessionUseCase] Started session ${session.id}`);
    return session;
  }
}
