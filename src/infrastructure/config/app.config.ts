/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";
import { randomBytes } from "crypto";
import { DEFAULT_CANDIDATE_MODELS, DEFAULT_MULTIMODAL_TAGS } from "../../domain/utils/model.capabilities";
import { GEMINI_OPENAI_BASE_URL } from "../openai/openai.extraction.provider";

// Load environment variables from .env file
dotenv.config();

export interface AppConfig {
  // Server
  port: number;

  // Shared password for the gate. Left undefined, nobody gets in.
  appPassword?: string;

  jwt: {
    secret: string;
    expiresInSeconds: number;
  };

  ai: {
    baseUrl: string;
    candidateModels: string[];
    multimodalTags: string[];
  };

  session: {
    idleTimeoutMinutes: number;
  };

  upload: {
    maxImageBytes: number;
    maxAudioBytes: number;
  };
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const appPassword = env.APP_PASSWORD || undefined;
  if (!appPassword) {
    console.warn("[AppConfig] APP_PASSWORD is not set: every session will be refused");
  }

  // Sessions do not outlive the process, so a per-process secret is enough by default
  const jwtSecret = env.JWT_SECRET || randomBytes(32).toString("hex");

  return {
    port: parsePositiveInt(env.PORT, 3000),

    appPassword,

    jwt: {
      secret: jwtSecret,
      expiresInSeconds: parsePositiveInt(env.JWT_EXPIRES_IN_SECONDS, 12 * 60 * 60),
    },

    ai: {
      baseUrl: env.AI_BASE_URL || GEMINI_OPENAI_BASE_URL,
      candidateModels: parseList(env.AI_CANDIDATE_MODELS, DEFAULT_CANDIDATE_MODELS),
      multimodalTags: parseList(env.AI_MULTIMODAL_TAGS, DEFAULT_MULTIMODAL_TAGS),
    },

    session: {
      idleTimeoutMinutes: parsePositiveInt(env.SESSION_IDLE_TIMEOUT_MINUTES, 60),
    },

    upload: {
      maxImageBytes: parsePositiveInt(env.MAX_IMAGE_BYTES, 10 * 1024 * 1024), // 10MB
      maxAudioBytes: parsePositiveInt(env.MAX_AUDIO_BYTES, 25 * 1024 * 1024), // 25MB
    },
  };
}
