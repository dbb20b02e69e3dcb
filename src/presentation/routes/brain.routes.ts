import { RequestHandler, Router } from "express";
import multer from "multer";
import { SessionController } from "../controllers/session.controller";
import { ExtractionController, UploadLimits, uploadTooLargeMessage } from "../controllers/extraction.controller";
import { ExportController } from "../controllers/export.controller";
import { ValidationError } from "../../domain/errors/app.error";

const IMAGE_MIME_TYPES = ["image/png", "image/jpeg"];

function createUpload(limits: UploadLimits): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      // Per-field limits are checked by the controller
      fileSize: Math.max(limits.maxImageBytes, limits.maxAudioBytes),
      files: 2,
    },
    fileFilter: (_req, file, cb) => {
      if (file.fieldname === "image" && IMAGE_MIME_TYPES.includes(file.mimetype)) {
        cb(null, true);
      } else if (file.fieldname === "audio" && file.mimetype.startsWith("audio/")) {
        cb(null, true);
      } else {
        cb(new ValidationError(`Unsupported upload "${file.fieldname}" (${file.mimetype}). Send a PNG/JPEG image or a WAV recording`));
      }
    },
  }).fields([
    { name: "image", maxCount: 1 },
    { name: "audio", maxCount: 1 },
  ]);

  // multer stops at the larger of the two limits; report it like the per-field check
  return (req, res, next) => {
    upload(req, res, (err?: unknown) => {
      if (err instanceof multer.MulterError && err.code === "LIMIT_FILE_SIZE") {
        next(new ValidationError(uploadTooLargeMessage(err.field ?? "", limits)));
        return;
      }
      next(err);
    });
  };
}

export function createBrainRoutes(
  authMiddleware: RequestHandler,
  sessionController: SessionController,
  extractionController: ExtractionController,
  exportController: ExportController,
  limits: UploadLimits
): Router {
  const router = Router();
  const upload = createUpload(limits);

  // All routes require an unlocked session
  router.use(authMiddleware);

  // Current session view
  router.get("/", (req, res) => sessionController.getSession(req, res));

  // End the session
  router.delete("/", (req, res) => sessionController.endSession(req, res));

  // Analyze text, an image or a recording (multipart: text, image, audio)
  router.post("/extract", upload, (req, res) => extractionController.extract(req, res));

  // Replace the task table with edited rows
  router.put("/tasks", (req, res) => extractionController.updateTasks(req, res));

  // Download brain.json, tasks.csv, memos.csv or brain.md
  router.get("/export/:filename", (req, res) => exportController.exportResult(req, res));

  // Clear the current result and start over
  router.post("/reset", (req, res) => sessionController.resetSession(req, res));

  return router;
}
