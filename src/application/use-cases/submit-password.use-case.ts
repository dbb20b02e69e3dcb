import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { SessionState } from "../../domain/entities/session";
import { ConfigurationError, SessionNotFoundError } from "../../domain/errors/app.error";
import { isAuthenticated, submitPassword } from "../../domain/utils/auth.gate";
import { withGate } from "../../domain/utils/session.state";
import type { SessionTokenService } from "../../infrastructure/auth/session-token.service";

export interface SubmitPasswordUseCaseParams {
  sessionId: string;
  password: string;
}

export interface SubmitPasswordResult {
  session: SessionState;
  token: string | null; // null while the gate stays closed
}

export class SubmitPasswordUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private tokenService: SessionTokenService,
    private appPassword: string | undefined
  ) {}

  async execute(params: SubmitPasswordUseCaseParams): Promise<SubmitPasswordResult> {
    const { sessionId, password } = params;

    const session = await this.sessionRepository.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    const gate = submitPassword(session.gate, password, this.appPassword);
    if (gate.error?.kind === "configuration") {
      throw new ConfigurationError(gate.error.message);
    }

    const updated = await this.sessionRepository.save(withGate(session, gate));

    if (!isAuthenticated(gate)) {
      console.warn(`[SubmitPasswordUseCase] Wrong password for session ${sessionId}`);
      return { session: updated, token: null };
    }

    return { session: updated, token: this.tokenService.issue(sessionId) };
  }
}
