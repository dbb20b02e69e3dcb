import { randomUUID } from "crypto";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import type { SessionState } from "../../domain/entities/session";
import { isEmptyResult } from "../../domain/entities/extraction-result";
import { SessionNotFoundError, ValidationError } from "../../domain/errors/app.error";
import { summarizeInput } from "../../domain/utils/input.summary";
import { recordResult, touch } from "../../domain/utils/session.state";
import type { ExtractionInput, StructuredExtractionService } from "../services/structured-extraction.service";

export interface ExtractInputUseCaseParams extends ExtractionInput {
  sessionId: string;
  apiKey?: string;
}

export class ExtractInputUseCase {
  constructor(
    private sessionRepository: ISessionRepository,
    private extractionService: StructuredExtractionService
  ) {}

  async execute(params: ExtractInputUseCaseParams): Promise<SessionState> {
    const { sessionId, apiKey, text, image, audio } = params;

    const session = await this.sessionRepository.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    if (!apiKey) {
      throw new ValidationError("An API key is required. Send it in the X-API-Key header");
    }

    const outcome = await this.extractionService.extract(apiKey, { text, image, audio });

    // The session may have moved on while the model was answering
    const latest = await this.sessionRepository.findById(sessionId);
    if (!latest) {
      throw new SessionNotFoundError(sessionId);
    }

    // Nothing extracted: the current result and history stay as they were
    if (outcome.model === null || isEmptyResult(outcome.result)) {
      return this.sessionRepository.save(touch(latest));
    }

    const { summary, source } = summarizeInput({
      text,
      hasImage: Boolean(image),
      hasAudio: Boolean(audio),
    });

    return this.sessionRepository.save(
      recordResult(latest, {
        id: randomUUID(),
        summary,
        source,
        model: outcome.model,
        result: outcome.result,
        timestamp: new Date(),
      })
    );
  }
}
