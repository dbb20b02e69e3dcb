import { describe, it, expect } from "vitest";
import { parseExtractionResult, toTasks } from "../../../src/domain/utils/result.parser";
import { ExtractionError } from "../../../src/domain/errors/app.error";

describe("parseExtractionResult", () => {
  it("reads tasks and memos as given", () => {
    const result = parseExtractionResult(
      JSON.stringify({
        tasks: [{ category: "Errand", action: "세탁소 가기", priority: "Low", deadline: "내일" }],
        memos: [{ content: "좋은 카페" }],
      })
    );

    expect(result).toEqual({
      tasks: [{ category: "Errand", action: "세탁소 가기", priority: "Low", deadline: "내일" }],
      memos: [{ content: "좋은 카페" }],
    });
  });

  it("defaults missing lists and deadlines", () => {
    expect(parseExtractionResult('{"tasks":[{"category":"Work","action":"Ship","priority":"High"}]}')).toEqual({
      tasks: [{ category: "Work", action: "Ship", priority: "High", deadline: null }],
      memos: [],
    });
    expect(parseExtractionResult("{}")).toEqual({ tasks: [], memos: [] });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseExtractionResult("not json")).toThrow(ExtractionError);
  });

  it("rejects JSON that is not an object", () => {
    expect(() => parseExtractionResult("[1, 2]")).toThrow("Model response is not a JSON object");
  });

  it("rejects a tasks field that is not a list", () => {
    expect(() => parseExtractionResult('{"tasks": "none"}')).toThrow('Model response field "tasks" is not a list');
  });
});

describe("toTasks", () => {
  it("drops entries that are not objects and stringifies scalar fields", () => {
    expect(toTasks(["loose text", null, { category: "Health", action: "Run", priority: 1, deadline: "" }])).toEqual([
      { category: "Health", action: "Run", priority: "1", deadline: null },
    ]);
  });
});
