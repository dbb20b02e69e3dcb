import { timingSafeEqual } from "crypto";
import type { AuthGateState } from "../entities/session";

export const MISSING_SECRET_MESSAGE = "Configuration error: APP_PASSWORD is not set";
export const INCORRECT_PASSWORD_MESSAGE = "Incorrect password";

export function initialGateState(): AuthGateState {
  return { status: "unauthenticated", error: null };
}

function configurationErrorState(): AuthGateState {
  return {
    status: "unauthenticated",
    error: { kind: "configuration", message: MISSING_SECRET_MESSAGE },
  };
}

function passwordsMatch(submitted: string, secret: string): boolean {
  const a = Buffer.from(submitted, "utf8");
  const b = Buffer.from(secret, "utf8");
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

/**
 * Moves a fresh gate to the password prompt.
 * Without a configured secret the gate never opens.
 */
export function promptForPassword(state: AuthGateState, secret: string | undefined): AuthGateState {
  if (!secret) {
    return configurationErrorState();
  }
  if (state.status !== "unauthenticated") {
    return state;
  }
  return { status: "awaiting_password", error: null };
}

export function submitPassword(
  state: AuthGateState,
  password: string,
  secret: string | undefined
): AuthGateState {
  if (!secret) {
    return configurationErrorState();
  }

  if (passwordsMatch(password, secret)) {
    if (state.status === "authenticated" && state.error === null) {
      return state;
    }
    return { status: "authenticated", error: null };
  }

  return {
    status: "awaiting_password",
    error: { kind: "authentication", message: INCORRECT_PASSWORD_MESSAGE },
  };
}

export function isAuthenticated(state: AuthGateState): boolean {
  return state.status === "authenticated";
}
