/**
 * LLM module barrel export.
 */

export type {
  CandidateStatement,
  ModelClient,
  ModelResponse,
  PromptText,
  StatementKind,
} from './types.js';
export { OpenAIModelClient } from './client.js';
export type { OpenAIModelClientOptions } from './client.js';
export { buildPrompt, normalizeQuestion, SQL_FENCE_TAG } from './prompt.js';
export { extractSql, classifyLead } from './extract.js';
