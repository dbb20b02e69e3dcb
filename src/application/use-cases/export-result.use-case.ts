import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import { ResultNotFoundError, SessionNotFoundError } from "../../domain/errors/app.error";
import { touch } from "../../domain/utils/session.state";
import { buildExportArtifact, type ExportArtifact } from "../services/result-export.service";

export interface ExportResultUseCaseParams {
  sessionId: string;
  filename: string;
}

export class ExportResultUseCase {
  constructor(private sessionRepository: ISessionRepository) {}

  /**
   * Resolves with null when the artifact would be an empty CSV.
   */
  async execute(params: ExportResultUseCaseParams): Promise<ExportArtifact | null> {
    const { sessionId, filename } = params;

    const session = await this.sessionRepository.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    if (!session.current) {
      throw new ResultNotFoundError();
    }

    const artifact = buildExportArtifact(filename, session.current.result);
    await this.sessionRepository.save(touch(session));
    return artifact;
  }
}
