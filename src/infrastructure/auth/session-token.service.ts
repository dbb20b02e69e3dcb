import jwt from "jsonwebtoken";

export interface SessionTokenPayload {
  sessionId: string;
}

/**
 * Signs and checks the bearer tokens handed out once a session's gate opens.
 */
export class SessionTokenService {
  constructor(
    private secret: string,
    private expiresInSeconds: number
  ) {}

  issue(sessionId: string): string {
    return jwt.sign({ sessionId }, this.secret, { expiresIn: this.expiresInSeconds });
  }

  verify(token: string): SessionTokenPayload {
    const decoded = jwt.verify(token, this.secret);
    if (typeof decoded === "string" || typeof decoded.sessionId !== "string") {
      throw new jwt.JsonWebTokenError("Invalid token payload");
    }
    return { sessionId: decoded.sessionId };
  }
}
