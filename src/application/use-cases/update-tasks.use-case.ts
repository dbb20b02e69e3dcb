import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { SessionState } from "../../domain/entities/session";
import { SessionNotFoundError, ValidationError } from "../../domain/errors/app.error";
import { toTasks } from "../../domain/utils/result.parser";
import { replaceTasks } from "../../domain/utils/session.state";

export interface UpdateTasksUseCaseParams {
  sessionId: string;
  tasks: unknown;
}

/**
 * Replaces the current task table with the user's edited rows.
 */
export class UpdateTasksUseCase {
  constructor(private sessionRepository: ISessionRepository) {}

  async execute(params: UpdateTasksUseCaseParams): Promise<SessionState> {
    const { sessionId, tasks } = params;

    if (!Array.isArray(tasks)) {
      throw new ValidationError("tasks must be a list");
    }

    const session = await this.sessionRepository.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    return this.sessionRepository.save(replaceTasks(session, toTasks(tasks)));
  }
}
