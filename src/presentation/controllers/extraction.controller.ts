import { Request, Response } from "express";
import type { AuthenticatedRequest } from "../middleware/jwt.middleware";
import { ExtractInputUseCase } from "../../application/use-cases/extract-input.use-case";
import { UpdateTasksUseCase } from "../../application/use-cases/update-tasks.use-case";
import type { ExtractRequest, UpdateTasksRequest } from "../dto/extraction.dto";
import { toSessionResponse } from "../dto/session.dto";
import { sendError } from "../utils/error.response";

export interface UploadLimits {
  maxImageBytes: number;
  maxAudioBytes: number;
}

export function uploadTooLargeMessage(field: string, limits: UploadLimits): string {
  return field === "audio"
    ? `Recording is larger than ${limits.maxAudioBytes} bytes`
    : `Image is larger than ${limits.maxImageBytes} bytes`;
}

function pickFile(files: Request["files"], field: string): Express.Multer.File | undefined {
  if (!files || Array.isArray(files)) {
    return undefined;
  }
  return files[field]?.[0];
}

function readBodyString(body: unknown, key: keyof ExtractRequest): string | undefined {
  if (typeof body !== "object" || body === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

export class ExtractionController {
  constructor(
    private extractInputUseCase: ExtractInputUseCase,
    private updateTasksUseCase: UpdateTasksUseCase,
    private limits: UploadLimits
  ) {}

  async extract(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      if (!req.auth) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const image = pickFile(req.files, "image");
      const audio = pickFile(req.files, "audio");

      if (image && image.size > this.limits.maxImageBytes) {
        res.status(400).json({ error: uploadTooLargeMessage("image", this.limits) });
        return;
      }
      if (audio && audio.size > this.limits.maxAudioBytes) {
        res.status(400).json({ error: uploadTooLargeMessage("audio", this.limits) });
        return;
      }

      // The key is used for this request only and never stored
      const apiKey = req.header("x-api-key") || readBodyString(req.body, "apiKey");

      const session = await this.extractInputUseCase.execute({
        sessionId: req.auth.sessionId,
        apiKey,
        text: readBodyString(req.body, "text"),
        image: image ? { data: image.buffer, mimeType: image.mimetype } : undefined,
        audio: audio ? { data: audio.buffer } : undefined,
      });

      res.status(200).json(toSessionResponse(session));
    } catch (error) {
      sendError(res, error, "Failed to analyze input");
    }
  }

  async updateTasks(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      if (!req.auth) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const body: Partial<UpdateTasksRequest> = typeof req.body === "object" && req.body !== null ? req.body : {};

      const session = await this.updateTasksUseCase.execute({
        sessionId: req.auth.sessionId,
        tasks: body.tasks,
      });

      res.status(200).json(toSessionResponse(session));
    } catch (error) {
      sendError(res, error, "Failed to update tasks");
    }
  }
}
