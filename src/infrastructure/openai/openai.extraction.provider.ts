import OpenAI from "openai";
import type { ContentPart, IExtractionProvider, ModelRequest } from "../../domain/interfaces/iextraction.provider";
import { ModelCallError } from "../../domain/errors/app.error";

// Gemini models behind Google's OpenAI-compatible endpoint
export const GEMINI_OPENAI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";

function toChatContentPart(part: ContentPart, model: string): OpenAI.Chat.ChatCompletionContentPart {
  if (part.kind === "text") {
    return { type: "text", text: part.text };
  }

  const base64 = part.data.toString("base64");
  if (part.mimeType.startsWith("image/")) {
    return { type: "image_url", image_url: { url: `data:${part.mimeType};base64,${base64}` } };
  }
  // Recordings always arrive as WAV
  if (part.mimeType.startsWith("audio/")) {
    return { type: "input_audio", input_audio: { data: base64, format: "wav" } };
  }
  throw new ModelCallError(model, `Unsupported media type: ${part.mimeType}`);
}

export class OpenAIExtractionProvider implements IExtractionProvider {
  constructor(private baseURL: string = GEMINI_OPENAI_BASE_URL) {}

  async generateJson(request: ModelRequest): Promise<string> {
    // The key belongs to the caller's session, so each call gets its own client.
    // SDK retries are off: fallback to the next candidate replaces them.
    const client = new OpenAI({ apiKey: request.apiKey, baseURL: this.baseURL, maxRetries: 0 });

    try {
      const response = await client.chat.completions.create({
        model: request.model,
        messages: [
          { role: "system", content: request.systemInstruction },
          { role: "user", content: request.parts.map((part) => toChatContentPart(part, request.model)) },
        ],
        response_format: { type: "json_object" },
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ModelCallError(request.model, "Model returned an empty response");
      }
      return content;
    } catch (error) {
      if (error instanceof ModelCallError) {
        throw error;
      }
      if (error instanceof OpenAI.APIError) {
        throw new ModelCallError(request.model, error.message, error.status);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelCallError(request.model, message);
    }
  }
}
