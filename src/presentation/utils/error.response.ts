import type { Response } from "express";
import { AppError } from "../../domain/errors/app.error";

/**
 * Known errors keep their status and message; anything else becomes a 500.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof AppError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  console.error(`[Controller] ${fallbackMessage}:`, error);
  res.status(500).json({ error: fallbackMessage });
}
