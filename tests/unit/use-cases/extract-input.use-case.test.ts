import { describe, it, expect, beforeEach } from "vitest";
import { ExtractInputUseCase } from "../../../src/application/use-cases/extract-input.use-case";
import { StructuredExtractionService } from "../../../src/application/services/structured-extraction.service";
import { MEDIA_ONLY_INSTRUCTION } from "../../../src/application/services/extraction.prompt";
import { InMemorySessionRepository } from "../../../src/infrastructure/session/in.memory.session.repository";
import { startSession } from "../../../src/domain/utils/session.state";
import { ScriptedProvider } from "../../helpers/scripted.provider";

const started = new Date("2025-03-01T09:00:00.000Z");

const validReply = JSON.stringify({
  tasks: [{ category: "Shopping", action: "우유 사기", priority: "Normal", deadline: null }],
  memos: [],
});

describe("ExtractInputUseCase", () => {
  let repository: InMemorySessionRepository;

  beforeEach(async () => {
    repository = new InMemorySessionRepository();
    await repository.save(startSession("session-1", "test-password", started));
  });

  function createUseCase(provider: ScriptedProvider): ExtractInputUseCase {
    const service = new StructuredExtractionService(provider, { candidateModels: ["gemini-1.5-flash"] });
    return new ExtractInputUseCase(repository, service);
  }

  it("labels whitespace-only text sent with an image as an image", async () => {
    const provider = new ScriptedProvider({ "gemini-1.5-flash": validReply });
    const useCase = createUseCase(provider);

    const session = await useCase.execute({
      sessionId: "session-1",
      apiKey: "test-key",
      text: "   ",
      image: { data: Buffer.from("png"), mimeType: "image/png" },
    });

    expect(provider.calls[0].parts[0]).toEqual({ kind: "text", text: MEDIA_ONLY_INSTRUCTION });
    expect(session.history).toHaveLength(1);
    expect(session.history[0].summary).toBe("Image");
    expect(session.history[0].source).toBe("image");
  });

  it("records nothing when the model finds no tasks or memos", async () => {
    const provider = new ScriptedProvider({ "gemini-1.5-flash": "{}" });
    const useCase = createUseCase(provider);

    const session = await useCase.execute({ sessionId: "session-1", apiKey: "test-key", text: "안녕하세요" });

    expect(provider.calls).toHaveLength(1);
    expect(session.current).toBeNull();
    expect(session.history).toEqual([]);
    expect(session.lastActiveAt.getTime()).toBeGreaterThan(started.getTime());
  });

  it("keeps the previous result when a later extraction is empty", async () => {
    const provider = new ScriptedProvider({ "gemini-1.5-flash": validReply });
    const useCase = createUseCase(provider);
    await useCase.execute({ sessionId: "session-1", apiKey: "test-key", text: "우유 사기" });

    const emptyProvider = new ScriptedProvider({ "gemini-1.5-flash": JSON.stringify({ tasks: [], memos: [] }) });
    const session = await createUseCase(emptyProvider).execute({
      sessionId: "session-1",
      apiKey: "test-key",
      text: "그냥 인사",
    });

    expect(session.current?.result.tasks).toEqual([
      { category: "Shopping", action: "우유 사기", priority: "Normal", deadline: null },
    ]);
    expect(session.history).toHaveLength(1);
  });
});
