import { Router } from "express";
import { SessionController } from "../controllers/session.controller";

export function createSessionRoutes(sessionController: SessionController): Router {
  const router = Router();

  // Open a session; the gate starts out asking for the password
  router.post("/", (req, res) => sessionController.startSession(req, res));

  // Unlock a session and receive its bearer token
  router.post("/:sessionId/password", (req, res) => sessionController.submitPassword(req, res));

  return router;
}
