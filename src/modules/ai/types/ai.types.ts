/**
 * Language model backends reachable over HTTP.
 */
export type LlmProviderName = 'openai' | 'groq' | 'anthropic' | 'ollama';

/**
 * How the model is asked to return its answer:
 * - json: output constrained to a JSON object
 * - text: free text that should contain a JSON object
 * - tool: arguments of a forced tool call
 */
export type GenerationMode = 'json' | 'text' | 'tool';

/**
 * Structured SQL proposal. `sql` is always present, even when generation failed.
 */
export interface GenerationResult {
  sql: string;
  explanation: string;
  confidence: number;
  tablesUsed: string[];
  failed: boolean;
}

export interface GenerationConfig {
  provider: LlmProviderName;
  mode?: GenerationMode;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
}

/**
 * Which schemas go into the prompt.
 */
export type PromptMode = { kind: 'all' } | { kind: 'relevant'; topK: number };

export interface ChatRequest {
  system: string;
  user: string;
}

/**
 * JSON Schema for a tool's arguments.
 */
export interface ToolParameters {
  type: 'object';
  properties: Record<string, { type: string; description: string; items?: { type: string } }>;
  required: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/**
 * Advisory findings about a statement. Never affects the safety verdict.
 */
export interface QueryReview {
  warnings: string[];
}
