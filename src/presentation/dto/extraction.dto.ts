export interface ExtractRequest {
  text?: string;
  apiKey?: string; // Prefer the X-API-Key header
}

export interface UpdateTasksRequest {
  tasks: unknown;
}
