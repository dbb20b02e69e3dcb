import type { InputSource } from "../entities/session";

export interface InputKinds {
  text?: string;
  hasImage: boolean;
  hasAudio: boolean;
}

const SUMMARY_LENGTH = 15;

/**
 * Short label for the history list. Typed text wins over media, audio over image.
 * Whitespace-only text counts as no text.
 */
export function summarizeInput(input: InputKinds): { summary: string; source: InputSource } {
  if (input.text?.trim()) {
    const head = Array.from(input.text).slice(0, SUMMARY_LENGTH).join("");
    return { summary: `${head}...`, source: "text" };
  }
  if (input.hasAudio) {
    return { summary: "Audio", source: "audio" };
  }
  if (input.hasImage) {
    return { summary: "Image", source: "image" };
  }
  return { summary: "Text", source: "text" };
}
