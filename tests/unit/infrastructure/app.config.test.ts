import { describe, it, expect } from "vitest";
import { getConfig } from "../../../src/infrastructure/config/app.config";
import { GEMINI_OPENAI_BASE_URL } from "../../../src/infrastructure/openai/openai.extraction.provider";

describe("getConfig", () => {
  it("falls back to defaults", () => {
    const config = getConfig({});

    expect(config.port).toBe(3000);
    expect(config.appPassword).toBeUndefined();
    expect(config.jwt.secret).toMatch(/^[0-9a-f]{64}$/);
    expect(config.jwt.expiresInSeconds).toBe(43200);
    expect(config.ai).toEqual({
      baseUrl: GEMINI_OPENAI_BASE_URL,
      candidateModels: ["gemini-3-flash-preview", "gemini-1.5-flash"],
      multimodalTags: ["1.5", "2.0", "2.5", "gemini-3"],
    });
    expect(config.session.idleTimeoutMinutes).toBe(60);
    expect(config.upload).toEqual({ maxImageBytes: 10485760, maxAudioBytes: 26214400 });
  });

  it("reads values from the environment", () => {
    const config = getConfig({
      PORT: "8080",
      APP_PASSWORD: "test-password",
      JWT_SECRET: "test-secret",
      AI_BASE_URL: "http://localhost:9999/v1",
      AI_CANDIDATE_MODELS: " model-a , ,model-b ",
      SESSION_IDLE_TIMEOUT_MINUTES: "15",
    });

    expect(config.port).toBe(8080);
    expect(config.appPassword).toBe("test-password");
    expect(config.jwt.secret).toBe("test-secret");
    expect(config.ai.baseUrl).toBe("http://localhost:9999/v1");
    expect(config.ai.candidateModels).toEqual(["model-a", "model-b"]);
    expect(config.session.idleTimeoutMinutes).toBe(15);
  });

  it("treats an empty password as missing and ignores bad numbers", () => {
    const config = getConfig({ APP_PASSWORD: "", PORT: "abc", SESSION_IDLE_TIMEOUT_MINUTES: "-5" });

    expect(config.appPassword).toBeUndefined();
    expect(config.port).toBe(3000);
    expect(config.session.idleTimeoutMinutes).toBe(60);
  });
});
