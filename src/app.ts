import express, { ErrorRequestHandler, Express } from "express";
import cors from "cors";
import multer from "multer";
import type { AppConfig } from "./infrastructure/config/app.config";
import type { IExtractionProvider } from "./domain/interfaces/iextraction.provider";
import type { ISessionRepository } from "./domain/interfaces/isession.repository";
import { AppError } from "./domain/errors/app.error";
import { SessionTokenService } from "./infrastructure/auth/session-token.service";
import { StructuredExtractionService } from "./application/services/structured-extraction.service";
import { StartSessionUseCase } from "./application/use-cases/start-session.use-case";
import { SubmitPasswordUseCase } from "./application/use-cases/submit-password.use-case";
import { GetSessionUseCase } from "./application/use-cases/get-session.use-case";
import { ExtractInputUseCase } from "./application/use-cases/extract-input.use-case";
import { UpdateTasksUseCase } from "./application/use-cases/update-tasks.use-case";
import { ExportResultUseCase } from "./application/use-cases/export-result.use-case";
import { ResetSessionUseCase } from "./application/use-cases/reset-session.use-case";
import { EndSessionUseCase } from "./application/use-cases/end-session.use-case";
import { SessionController } from "./presentation/controllers/session.controller";
import { ExtractionController } from "./presentation/controllers/extraction.controller";
import { ExportController } from "./presentation/controllers/export.controller";
import { createJwtMiddleware } from "./presentation/middleware/jwt.middleware";
import { createSessionRoutes } from "./presentation/routes/session.routes";
import { createBrainRoutes } from "./presentation/routes/brain.routes";

export interface AppDependencies {
  config: AppConfig;
  sessionRepository: ISessionRepository;
  extractionProvider: IExtractionProvider;
}

const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof AppError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error("Error:", err);
  res.status(500).json({ error: "Internal server error" });
};

export function createApp({ config, sessionRepository, extractionProvider }: AppDependencies): Express {
  const tokenService = new SessionTokenService(config.jwt.secret, config.jwt.expiresInSeconds);
  const extractionService = new StructuredExtractionService(extractionProvider, {
    candidateModels: config.ai.candidateModels,
    multimodalTags: config.ai.multimodalTags,
  });

  // Initialize use cases
  const startSessionUseCase = new StartSessionUseCase(sessionRepository, config.appPassword);
  const submitPasswordUseCase = new SubmitPasswordUseCase(sessionRepository, tokenService, config.appPassword);
  const getSessionUseCase = new GetSessionUseCase(sessionRepository);
  const extractInputUseCase = new ExtractInputUseCase(sessionRepository, extractionService);
  const updateTasksUseCase = new UpdateTasksUseCase(sessionRepository);
  const exportResultUseCase = new ExportResultUseCase(sessionRepository);
  const resetSessionUseCase = new ResetSessionUseCase(sessionRepository);
  const endSessionUseCase = new EndSessionUseCase(sessionRepository);

  // Initialize controllers
  const sessionController = new SessionController(
    startSessionUseCase,
    submitPasswordUseCase,
    getSessionUseCase,
    resetSessionUseCase,
    endSessionUseCase
  );
  const extractionController = new ExtractionController(extractInputUseCase, updateTasksUseCase, config.upload);
  const exportController = new ExportController(exportResultUseCase);

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Routes
  app.use("/api/session", createSessionRoutes(sessionController));
  app.use(
    "/api/brain",
    createBrainRoutes(
      createJwtMiddleware(tokenService, sessionRepository),
      sessionController,
      extractionController,
      exportController,
      config.upload
    )
  );

  // Error handling middleware
  app.use(errorHandler);

  return app;
}
