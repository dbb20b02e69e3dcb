import type { ContentPart, IExtractionProvider } from "../../domain/interfaces/iextraction.provider";
import { type ExtractionResult, emptyResult } from "../../domain/entities/extraction-result";
import { ExtractionError, ModelCallError } from "../../domain/errors/app.error";
import { parseExtractionResult } from "../../domain/utils/result.parser";
import {
  DEFAULT_CANDIDATE_MODELS,
  DEFAULT_MULTIMODAL_TAGS,
  isMultimodalModel,
} from "../../domain/utils/model.capabilities";
import { EXTRACTION_SYSTEM_PROMPT, MEDIA_ONLY_INSTRUCTION } from "./extraction.prompt";

// Recordings always come in as WAV
export const AUDIO_MIME_TYPE = "audio/wav";

export interface ExtractionInput {
  text?: string;
  image?: { data: Buffer; mimeType: string };
  audio?: { data: Buffer };
}

export interface ExtractionOutcome {
  result: ExtractionResult;
  model: string | null; // null when nothing was sent to a model
}

export interface StructuredExtractionOptions {
  candidateModels: string[];
  multimodalTags: string[];
}

export function hasExtractableContent(input: ExtractionInput): boolean {
  return Boolean(input.text?.trim() || input.image || input.audio);
}

export class StructuredExtractionService {
  private readonly options: StructuredExtractionOptions;

  constructor(
    private provider: IExtractionProvider,
    options?: Partial<StructuredExtractionOptions>
  ) {
    this.options = {
      candidateModels: options?.candidateModels ?? DEFAULT_CANDIDATE_MODELS,
      multimodalTags: options?.multimodalTags ?? DEFAULT_MULTIMODAL_TAGS,
    };
  }

  /**
   * Ordered request parts: text (or a generic instruction), then image, then audio.
   */
  buildContentParts(input: ExtractionInput): ContentPart[] {
    const parts: ContentPart[] = [];

    const text = input.text?.trim() ? input.text : MEDIA_ONLY_INSTRUCTION;
    parts.push({ kind: "text", text });

    if (input.image) {
      parts.push({ kind: "media", mimeType: input.image.mimeType, data: input.image.data });
    }

    if (input.audio) {
      parts.push({ kind: "media", mimeType: AUDIO_MIME_TYPE, data: input.audio.data });
    }

    return parts;
  }

  /**
   * Tries each candidate model in order until one answers.
   * A bad API key stops the loop at once; any other call failure moves on to the next candidate.
   * Unusable JSON from an answering model is not retried elsewhere.
   */
  async extract(apiKey: string, input: ExtractionInput): Promise<ExtractionOutcome> {
    if (!hasExtractableContent(input)) {
      return { result: emptyResult(), model: null };
    }

    const parts = this.buildContentParts(input);
    const hasMedia = Boolean(input.image || input.audio);
    let lastError: Error | null = null;

    for (const model of this.options.candidateModels) {
      if (hasMedia && !isMultimodalModel(model, this.options.multimodalTags)) {
        console.log(`[StructuredExtractionService] Skipping ${model}: no image/audio support`);
        continue;
      }

      let responseText: string;
      try {
        console.log(`[StructuredExtractionService] Calling ${model} with ${parts.length} part(s)`);
        responseText = await this.provider.generateJson({
          apiKey,
          model,
          systemInstruction: EXTRACTION_SYSTEM_PROMPT,
          parts,
        });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        console.warn(`[StructuredExtractionService] ${model} failed: ${lastError.message}`);

        if (error instanceof ModelCallError && error.isAuthFailure) {
          throw new ExtractionError(`The model provider rejected the API key: ${error.message}`);
        }
        continue;
      }

      const result = parseExtractionResult(responseText);
      console.log(
        `[StructuredExtractionService] ${model} returned ${result.tasks.length} task(s), ${result.memos.length} memo(s)`
      );
      return { result, model };
    }

    const reason = lastError ? lastError.message : "no candidate model accepts image or audio input";
    throw new ExtractionError(`All models failed. Last error: ${reason}`);
  }
}
