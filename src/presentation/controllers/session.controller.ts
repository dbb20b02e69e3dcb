import { Response } from "express";
import type { AuthenticatedRequest } from "../middleware/jwt.middleware";
import { StartSessionUseCase } from "../../application/use-cases/start-session.use-case";
import { SubmitPasswordUseCase } from "../../application/use-cases/submit-password.use-case";
import { GetSessionUseCase } from "../../application/use-cases/get-session.use-case";
import { ResetSessionUseCase } from "../../application/use-cases/reset-session.use-case";
import { EndSessionUseCase } from "../../application/use-cases/end-session.use-case";
import {
  SessionResponse,
  SubmitPasswordRequest,
  SubmitPasswordResponse,
  toSessionResponse,
} from "../dto/session.dto";
import { sendError } from "../utils/error.response";

export class SessionController {
  constructor(
    private startSessionUseCase: StartSessionUseCase,
    private submitPasswordUseCase: SubmitPasswordUseCase,
    private getSessionUseCase: GetSessionUseCase,
    private resetSessionUseCase: ResetSessionUseCase,
    private endSessionUseCase: EndSessionUseCase
  ) {}

  async startSession(_req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const session = await this.startSessionUseCase.execute();
      const response: SessionResponse = toSessionResponse(session);
      res.status(201).json(response);
    } catch (error) {
      sendError(res, error, "Failed to start session");
    }
  }

  async submitPassword(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const password: SubmitPasswordRequest["password"] | undefined =
        typeof req.body?.password === "string" ? req.body.password : undefined;

      if (password === undefined) {
        res.status(400).json({ error: "Password is required" });
        return;
      }

      const { session, token } = await this.submitPasswordUseCase.execute({
        sessionId: req.params.sessionId,
        password,
      });

      if (!token) {
        res.status(401).json({
          error: session.gate.error?.message ?? "Incorrect password",
          session: toSessionResponse(session),
        });
        return;
      }

      const response: SubmitPasswordResponse = { token, session: toSessionResponse(session) };
      res.status(200).json(response);
    } catch (error) {
      sendError(res, error, "Failed to check password");
    }
  }

  async getSession(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      if (!req.auth) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const session = await this.getSessionUseCase.execute({ sessionId: req.auth.sessionId });
      res.status(200).json(toSessionResponse(session));
    } catch (error) {
      sendError(res, error, "Failed to get session");
    }
  }

  async resetSession(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      if (!req.auth) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const session = await this.resetSessionUseCase.execute({ sessionId: req.auth.sessionId });
      res.status(200).json(toSessionResponse(session));
    } catch (error) {
      sendError(res, error, "Failed to reset session");
    }
  }

  async endSession(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      if (!req.auth) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      await this.endSessionUseCase.execute({ sessionId: req.auth.sessionId });
      res.status(204).send();
    } catch (error) {
      sendError(res, error, "Failed to end session");
    }
  }
}
