/**
 * Model-facing types for SQL translation.
 */

/** System + user message pair sent to the model */
export interface PromptText {
  system: string;
  user: string;
}

export interface ModelResponse {
  /** Raw completion text, untrusted */
  text: string;
  latencyMs: number;
  model: string;
  /** Attempts used, including the successful one */
  attempts: number;
}

export type StatementKind = 'select' | 'other';

/** SQL isolated from a model response, not yet validated */
export interface CandidateStatement {
  sql: string;
  kind: StatementKind;
}

export interface ModelClient {
  translate(prompt: PromptText, signal?: AbortSignal): Promise<ModelResponse>;
}
