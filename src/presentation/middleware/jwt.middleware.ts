import type { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";
import { isAuthenticated } from "../../domain/utils/auth.gate";
import type { SessionTokenService } from "../../infrastructure/auth/session-token.service";

export interface AuthenticatedRequest extends Request {
  auth?: {
    sessionId: string;
  };
}

/**
 * Requires a Bearer token for a live session whose gate is open.
 */
export function createJwtMiddleware(
  tokenService: SessionTokenService,
  sessionRepository: ISessionRepository
): RequestHandler {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader) {
        res.status(401).json({ error: "Authorization header missing" });
        return;
      }

      const token = authHeader.startsWith("Bearer ")
        ? authHeader.slice(7)
        : authHeader;

      if (!token) {
        res.status(401).json({ error: "Token missing" });
        return;
      }

      const { sessionId } = tokenService.verify(token);

      const session = await sessionRepository.findById(sessionId);
      if (!session) {
        res.status(401).json({ error: "Session has ended" });
        return;
      }

      if (!isAuthenticated(session.gate)) {
        res.status(401).json({ error: "Session is locked. Submit the password again" });
        return;
      }

      req.auth = { sessionId };
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({ error: "Token expired" });
        return;
      }
      if (error instanceof jwt.JsonWebTokenError) {
        res.status(401).json({ error: "Invalid token" });
        return;
      }
      console.error("[JwtMiddleware] Authentication error:", error);
      res.status(500).json({ error: "Authentication error" });
    }
  };
}
