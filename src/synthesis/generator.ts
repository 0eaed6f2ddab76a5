/** One request to a generative-text backend. */
export interface GenerationRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  /** Ask the backend for a JSON object */
  json: boolean;
}

export interface TextGenerator {
  /** Model name stamped on generated protocols */
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}
