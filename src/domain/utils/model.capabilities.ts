export const DEFAULT_CANDIDATE_MODELS = ["gemini-3-flash-preview", "gemini-1.5-flash"];

// Version tags of model families that accept image and audio parts
export const DEFAULT_MULTIMODAL_TAGS = ["1.5", "2.0", "2.5", "gemini-3"];

export function isMultimodalModel(model: string, tags: readonly string[] = DEFAULT_MULTIMODAL_TAGS): boolean {
  return tags.some((tag) => model.includes(tag));
}
