import { describe, it, expect } from "vitest";
import { SessionCleanupCron } from "../../../src/infrastructure/cron/session-cleanup.cron";
import { InMemorySessionRepository } from "../../../src/infrastructure/session/in.memory.session.repository";
import { startSession } from "../../../src/domain/utils/session.state";

describe("SessionCleanupCron.runOnce", () => {
  it("ends sessions idle longer than the timeout", async () => {
    const repository = new InMemorySessionRepository();
    await repository.save(startSession("stale", "test-password", new Date("2025-03-01T08:00:00.000Z")));
    await repository.save(startSession("fresh", "test-password", new Date("2025-03-01T08:45:00.000Z")));

    const cron = new SessionCleanupCron(repository, 30);
    const ended = await cron.runOnce(new Date("2025-03-01T09:00:00.000Z"));

    expect(ended).toEqual(["stale"]);
    expect(await repository.findById("stale")).toBeNull();
    expect(await repository.findById("fresh")).not.toBeNull();
    expect(await repository.count()).toBe(1);
  });

  it("is inactive until started", () => {
    const cron = new SessionCleanupCron(new InMemorySessionRepository(), 30);
    expect(cron.isActive()).toBe(false);
  });
});
