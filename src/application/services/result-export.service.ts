import type { ExtractionResult } from "../../domain/entities/extraction-result";
import { HIGH_PRIORITY, type Task } from "../../domain/entities/task";
import type { Memo } from "../../domain/entities/memo";
import { ExportError } from "../../domain/errors/app.error";

export const UTF8_BOM = "\uFEFF";

export const EXPORT_FILENAMES = ["brain.json", "tasks.csv", "memos.csv", "brain.md"] as const;
export type ExportFilename = (typeof EXPORT_FILENAMES)[number];

export interface ExportArtifact {
  filename: ExportFilename;
  contentType: string;
  body: string;
}

export function isExportFilename(value: string): value is ExportFilename {
  return EXPORT_FILENAMES.some((filename) => filename === value);
}

/**
 * Indented JSON of the result. Keys keep a fixed order and non-ASCII text is written as is.
 */
export function toJsonExport(result: ExtractionResult): string {
  const tasks = result.tasks.map((t) => ({
    category: t.category,
    action: t.action,
    priority: t.priority,
    deadline: t.deadline,
  }));
  const memos = result.memos.map((m) => ({ content: m.content }));
  return JSON.stringify({ tasks, memos }, null, 2);
}

function escapeCsv(cell: unknown): string {
  if (cell === null || cell === undefined) {
    return "";
  }
  const text = typeof cell === "object" ? JSON.stringify(cell) : String(cell);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Header row from every column seen (first-seen order), then one row per record.
 * Output starts with a UTF-8 byte-order mark.
 * No records, no file: returns "".
 */
export function toCsv(records: readonly object[]): string {
  if (records.length === 0) {
    return "";
  }

  const rows = records.map((record) => new Map<string, unknown>(Object.entries(record)));
  const columns: string[] = [];
  for (const row of rows) {
    for (const column of row.keys()) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
    }
  }

  const lines = [
    columns.map(escapeCsv).join(","),
    ...rows.map((row) => columns.map((column) => escapeCsv(row.get(column))).join(",")),
  ];

  return UTF8_BOM + lines.join("\n") + "\n";
}

export function toMarkdown(tasks: readonly Task[], memos: readonly Memo[]): string {
  let md = "# Brain Cleaner Results\n\n";

  md += "## ✅ Tasks\n";
  for (const task of tasks) {
    const priorityIcon = task.priority === HIGH_PRIORITY ? "🔥" : "🔹";
    md += `- [${task.category}] ${task.action} ${priorityIcon}`;
    if (task.deadline) {
      md += ` (📅 ${task.deadline})`;
    }
    md += "\n";
  }

  md += "\n## 💡 Memos\n";
  for (const memo of memos) {
    md += `- ${memo.content}\n`;
  }

  return md;
}

/**
 * Builds one of the fixed download artifacts. Returns null for a CSV with no rows.
 */
export function buildExportArtifact(filename: string, result: ExtractionResult): ExportArtifact | null {
  if (!isExportFilename(filename)) {
    throw new ExportError(`Unknown export: ${filename}. Expected one of ${EXPORT_FILENAMES.join(", ")}`);
  }

  switch (filename) {
    case "brain.json":
      return { filename, contentType: "application/json; charset=utf-8", body: toJsonExport(result) };
    case "tasks.csv": {
      const body = toCsv(result.tasks);
      return body ? { filename, contentType: "text/csv; charset=utf-8", body } : null;
    }
    case "memos.csv": {
      const body = toCsv(result.memos);
      return body ? { filename, contentType: "text/csv; charset=utf-8", body } : null;
    }
    case "brain.md":
      return { filename, contentType: "text/markdown; charset=utf-8", body: toMarkdown(result.tasks, result.memos) };
  }
}

/**
 * The artifacts worth offering for a result; CSVs without rows are left out.
 */
export function availableExports(result: ExtractionResult): ExportFilename[] {
  return EXPORT_FILENAMES.filter((filename) => {
    if (filename === "tasks.csv") return result.tasks.length > 0;
    if (filename === "memos.csv") return result.memos.length > 0;
    return true;
  });
}
