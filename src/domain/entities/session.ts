import type { ExtractionResult } from "./extraction-result";

export type GateStatus = "unauthenticated" | "awaiting_password" | "authenticated";

export type GateErrorKind = "configuration" | "authentication";

export interface GateError {
  kind: GateErrorKind;
  message: string;
}

export interface AuthGateState {
  readonly status: GateStatus;
  readonly error: GateError | null;
}

export type InputSource = "text" | "image" | "audio";

export interface HistoryEntry {
  readonly id: string;
  readonly summary: string;
  readonly source: InputSource;
  readonly model: string;
  readonly result: ExtractionResult;
  readonly timestamp: Date;
}

export interface CurrentResult {
  readonly result: ExtractionResult;
  readonly model: string;
}

/**
 * Everything one user's session holds. States are never mutated:
 * each action produces a new one (see domain/utils/session-state).
 */
export interface SessionState {
  readonly id: string;
  readonly gate: AuthGateState;
  readonly current: CurrentResult | null;
  readonly history: readonly HistoryEntry[];
  // Bumped on reset so clients can recreate their input widgets
  readonly resetKey: number;
  readonly createdAt: Date;
  readonly lastActiveAt: Date;
}
