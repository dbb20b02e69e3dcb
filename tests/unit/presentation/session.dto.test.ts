import { describe, it, expect } from "vitest";
import { toSessionResponse } from "../../../src/presentation/dto/session.dto";
import { recordResult, startSession, withGate } from "../../../src/domain/utils/session.state";
import type { HistoryEntry } from "../../../src/domain/entities/session";

const started = new Date("2025-03-01T09:00:00.000Z");

function entry(id: string, summary: string, timestamp: string): HistoryEntry {
  return {
    id,
    summary,
    source: "text",
    model: "gemini-1.5-flash",
    result: {
      tasks: [{ category: "Work", action: "Send invoice", priority: "High", deadline: null }],
      memos: [],
    },
    timestamp: new Date(timestamp),
  };
}

describe("toSessionResponse", () => {
  it("offers only the password prompt while locked", () => {
    const view = toSessionResponse(startSession("session-1", "test-password", started));

    expect(view).toEqual({
      sessionId: "session-1",
      gate: { status: "awaiting_password", error: null },
      resetKey: 0,
      current: null,
      history: [],
      exports: [],
      actions: ["submit_password"],
    });
  });

  it("offers nothing when the gate is misconfigured", () => {
    const view = toSessionResponse(startSession("session-1", undefined, started));
    expect(view.actions).toEqual([]);
    expect(view.gate.error?.kind).toBe("configuration");
  });

  it("renders the current result, newest history first and the exports with rows", () => {
    let state = withGate(startSession("session-1", "test-password", started), { status: "authenticated", error: null });
    state = recordResult(state, entry("a", "first...", "2025-03-01T09:01:00.000Z"));
    state = recordResult(state, entry("b", "second...", "2025-03-01T09:02:00.000Z"));

    const view = toSessionResponse(state);

    expect(view.current).toEqual({
      tasks: [{ category: "Work", action: "Send invoice", priority: "High", deadline: null }],
      memos: [],
      taskColumns: ["category", "priority", "action"],
      model: "gemini-1.5-flash",
    });
    expect(view.history.map((h) => [h.id, h.timestamp])).toEqual([
      ["b", "2025-03-01T09:02:00.000Z"],
      ["a", "2025-03-01T09:01:00.000Z"],
    ]);
    expect(view.exports).toEqual([
      { filename: "brain.json", url: "/api/brain/export/brain.json" },
      { filename: "tasks.csv", url: "/api/brain/export/tasks.csv" },
      { filename: "brain.md", url: "/api/brain/export/brain.md" },
    ]);
    expect(view.actions).toEqual(["extract", "edit_tasks", "export", "reset", "end_session"]);
  });

  it("renders the same view for the same state", () => {
    const state = withGate(startSession("session-1", "test-password", started), { status: "authenticated", error: null });
    expect(toSessionResponse(state)).toEqual(toSessionResponse(state));
    expect(toSessionResponse(state).actions).toEqual(["extract", "end_session"]);
  });
});
