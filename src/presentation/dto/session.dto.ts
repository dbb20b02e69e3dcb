import type { GateError, GateStatus, InputSource, SessionState } from "../../domain/entities/session";
import type { Task } from "../../domain/entities/task";
import type { Memo } from "../../domain/entities/memo";
import { isAuthenticated } from "../../domain/utils/auth.gate";
import { availableExports, type ExportFilename } from "../../application/services/result-export.service";

// Columns a compact task table shows, in display order
export const COMPACT_TASK_COLUMNS = ["category", "priority", "action"] as const;

export type SessionAction = "submit_password" | "extract" | "edit_tasks" | "export" | "reset" | "end_session";

export interface SubmitPasswordRequest {
  password: string;
}

export interface CurrentResultResponse {
  tasks: Task[];
  memos: Memo[];
  taskColumns: string[];
  model: string;
}

export interface HistoryEntryResponse {
  id: string;
  summary: string;
  source: InputSource;
  model: string;
  timestamp: string;
}

export interface ExportLinkResponse {
  filename: ExportFilename;
  url: string;
}

export interface SessionResponse {
  sessionId: string;
  gate: {
    status: GateStatus;
    error: GateError | null;
  };
  resetKey: number;
  current: CurrentResultResponse | null;
  history: HistoryEntryResponse[];
  exports: ExportLinkResponse[];
  actions: SessionAction[];
}

export interface SubmitPasswordResponse {
  token: string;
  session: SessionResponse;
}

function availableActions(state: SessionState): SessionAction[] {
  if (!isAuthenticated(state.gate)) {
    return state.gate.status === "awaiting_password" ? ["submit_password"] : [];
  }
  const actions: SessionAction[] = ["extract"];
  if (state.current) {
    actions.push("edit_tasks", "export", "reset");
  }
  actions.push("end_session");
  return actions;
}

/**
 * Renders a session state for the client. Pure: the same state always renders the same view.
 */
export function toSessionResponse(state: SessionState): SessionResponse {
  const current = state.current;

  return {
    sessionId: state.id,
    gate: {
      status: state.gate.status,
      error: state.gate.error,
    },
    resetKey: state.resetKey,
    current: current
      ? {
          tasks: current.result.tasks.map((task) => ({ ...task })),
          memos: current.result.memos.map((memo) => ({ ...memo })),
          taskColumns: current.result.tasks.length > 0 ? [...COMPACT_TASK_COLUMNS] : [],
          model: current.model,
        }
      : null,
    history: [...state.history].reverse().map((entry) => ({
      id: entry.id,
      summary: entry.summary,
      source: entry.source,
      model: entry.model,
      timestamp: entry.timestamp.toISOString(),
    })),
    exports: current
      ? availableExports(current.result).map((filename) => ({
          filename,
          url: `/api/brain/export/${filename}`,
        }))
      : [],
    actions: availableActions(state),
  };
}
