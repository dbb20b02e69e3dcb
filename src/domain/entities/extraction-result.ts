import type { Task } from "./task";
import type { Memo } from "./memo";

export interface ExtractionResult {
  tasks: Task[];
  memos: Memo[];
}

export function emptyResult(): ExtractionResult {
  return { tasks: [], memos: [] };
}

export function isEmptyResult(result: ExtractionResult): boolean {
  return result.tasks.length === 0 && result.memos.length === 0;
}
