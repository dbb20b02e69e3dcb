import type { IExtractionProvider, ModelRequest } from "../../src/domain/interfaces/iextraction.provider";
import { ModelCallError } from "../../src/domain/errors/app.error";

export type ScriptedReply = string | ModelCallError;

/**
 * Answers each model from a script. Models missing from the script fail with a 404.
 */
export class ScriptedProvider implements IExtractionProvider {
  readonly calls: ModelRequest[] = [];

  constructor(private replies: Record<string, ScriptedReply> = {}) {}

  get calledModels(): string[] {
    return this.calls.map((call) => call.model);
  }

  async generateJson(request: ModelRequest): Promise<string> {
    this.calls.push(request);
    const reply = this.replies[request.model];
    if (reply === undefined) {
      throw new ModelCallError(request.model, `404 model ${request.model} not found`, 404);
    }
    if (reply instanceof ModelCallError) {
      throw reply;
    }
    return reply;
  }
}
