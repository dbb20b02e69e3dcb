import type { ExtractionResult } from "../entities/extraction-result";
import type { Task } from "../entities/task";
import type { Memo } from "../entities/memo";
import { ExtractionError } from "../errors/app.error";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown, fallback: string): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return fallback;
}

function readNullableString(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return readString(value, "") || null;
}

export function toTask(raw: Record<string, unknown>): Task {
  return {
    category: readString(raw.category, ""),
    action: readString(raw.action, ""),
    priority: readString(raw.priority, ""),
    deadline: readNullableString(raw.deadline),
  };
}

export function toMemo(raw: Record<string, unknown>): Memo {
  return { content: readString(raw.content, "") };
}

/**
 * Reads task rows, dropping anything that is not an object.
 */
export function toTasks(entries: readonly unknown[]): Task[] {
  return entries.filter(isRecord).map(toTask);
}

export function toMemos(entries: readonly unknown[]): Memo[] {
  return entries.filter(isRecord).map(toMemo);
}

function readList(parsed: Record<string, unknown>, key: "tasks" | "memos"): unknown[] {
  const value = parsed[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ExtractionError(`Model response field "${key}" is not a list`);
  }
  return value;
}

/**
 * Turns the model's JSON text into a result. Both keys are optional;
 * field values are taken as they come.
 */
export function parseExtractionResult(text: string): ExtractionResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Model response is not valid JSON: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new ExtractionError("Model response is not a JSON object");
  }

  return {
    tasks: toTasks(readList(parsed, "tasks")),
    memos: toMemos(readList(parsed, "memos")),
  };
}
