import { describe, it, expect } from "vitest";
import {
  INCORRECT_PASSWORD_MESSAGE,
  MISSING_SECRET_MESSAGE,
  initialGateState,
  isAuthenticated,
  promptForPassword,
  submitPassword,
} from "../../../src/domain/utils/auth.gate";

const secret = "test-password";

describe("auth gate", () => {
  it("starts unauthenticated and moves to the password prompt", () => {
    const gate = promptForPassword(initialGateState(), secret);
    expect(gate).toEqual({ status: "awaiting_password", error: null });
  });

  it("stays on the prompt with a visible error after a wrong password", () => {
    const prompt = promptForPassword(initialGateState(), secret);

    const gate = submitPassword(prompt, "wrong", secret);

    expect(gate.status).toBe("awaiting_password");
    expect(gate.error).toEqual({ kind: "authentication", message: INCORRECT_PASSWORD_MESSAGE });
    expect(isAuthenticated(gate)).toBe(false);
  });

  it("authenticates on an exact match and clears the error", () => {
    const failed = submitPassword(promptForPassword(initialGateState(), secret), "wrong", secret);

    const gate = submitPassword(failed, secret, secret);

    expect(gate).toEqual({ status: "authenticated", error: null });
  });

  it("is idempotent on repeated correct submissions", () => {
    const first = submitPassword(promptForPassword(initialGateState(), secret), secret, secret);
    const second = submitPassword(first, secret, secret);

    expect(second).toBe(first);
  });

  it("does not accept near matches", () => {
    const prompt = promptForPassword(initialGateState(), secret);
    expect(submitPassword(prompt, "test-password ", secret).status).toBe("awaiting_password");
    expect(submitPassword(prompt, "TEST-PASSWORD", secret).status).toBe("awaiting_password");
  });

  it("fails closed when no secret is configured", () => {
    const prompt = promptForPassword(initialGateState(), undefined);
    expect(prompt).toEqual({
      status: "unauthenticated",
      error: { kind: "configuration", message: MISSING_SECRET_MESSAGE },
    });

    expect(submitPassword(prompt, "", undefined).status).toBe("unauthenticated");
    expect(submitPassword(prompt, "", "").error?.kind).toBe("configuration");
  });
});
