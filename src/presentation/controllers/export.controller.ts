import { Response } from "express";
import type { AuthenticatedRequest } from "../middleware/jwt.middleware";
import { ExportResultUseCase } from "../../application/use-cases/export-result.use-case";
import { sendError } from "../utils/error.response";

export class ExportController {
  constructor(private exportResultUseCase: ExportResultUseCase) {}

  async exportResult(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      if (!req.auth) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const artifact = await this.exportResultUseCase.execute({
        sessionId: req.auth.sessionId,
        filename: req.params.filename,
      });

      // Nothing to put in the file
      if (!artifact) {
        res.status(204).send();
        return;
      }

      // attachment() guesses a type from the extension, so set ours after it
      res.attachment(artifact.filename);
      res.setHeader("Content-Type", artifact.contentType);
      res.status(200).send(Buffer.from(artifact.body, "utf8"));
    } catch (error) {
      sendError(res, error, "Failed to export result");
    }
  }
}
