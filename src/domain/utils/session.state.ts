import type { AuthGateState, HistoryEntry, SessionState } from "../entities/session";
import type { Task } from "../entities/task";
import { ResultNotFoundError } from "../errors/app.error";
import { initialGateState, promptForPassword } from "./auth.gate";

export function startSession(id: string, secret: string | undefined, now: Date = new Date()): SessionState {
  return {
    id,
    gate: promptForPassword(initialGateState(), secret),
    current: null,
    history: [],
    resetKey: 0,
    createdAt: now,
    lastActiveAt: now,
  };
}

export function withGate(state: SessionState, gate: AuthGateState, now: Date = new Date()): SessionState {
  return { ...state, gate, lastActiveAt: now };
}

/**
 * Makes the entry's result current and appends it to the history.
 */
export function recordResult(state: SessionState, entry: HistoryEntry, now: Date = new Date()): SessionState {
  return {
    ...state,
    current: { result: entry.result, model: entry.model },
    history: [...state.history, entry],
    lastActiveAt: now,
  };
}

export function replaceTasks(state: SessionState, tasks: Task[], now: Date = new Date()): SessionState {
  if (!state.current) {
    throw new ResultNotFoundError();
  }
  return {
    ...state,
    current: {
      ...state.current,
      result: { ...state.current.result, tasks },
    },
    lastActiveAt: now,
  };
}

// History survives a reset; only the current result goes
export function resetSession(state: SessionState, now: Date = new Date()): SessionState {
  return {
    ...state,
    current: null,
    resetKey: state.resetKey + 1,
    lastActiveAt: now,
  };
}

export function touch(state: SessionState, now: Date = new Date()): SessionState {
  return { ...state, lastActiveAt: now };
}
