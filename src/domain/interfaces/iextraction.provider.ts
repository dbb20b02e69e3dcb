export type ContentPart =
  | { kind: "text"; text: string }
  | { kind: "media"; mimeType: string; data: Buffer };

export interface ModelRequest {
  apiKey: string;
  model: string;
  systemInstruction: string;
  parts: ContentPart[];
}

export interface IExtractionProvider {
  /**
   * Sends one request to one model and resolves with the raw JSON text it returned.
   * Rejects with a ModelCallError when the call itself fails.
   */
  generateJson(request: ModelRequest): Promise<string>;
}
