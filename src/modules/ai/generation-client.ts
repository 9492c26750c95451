import { z } from 'zod';
import { GenerationError, getErrorMessage } from '../../core/errors.js';
import { logEvent } from '../../core/logger.js';
import {
  AnthropicChatModel,
  OllamaChatModel,
  OpenAICompatibleChatModel,
  type JsonChatModel,
  type TextChatModel,
  type ToolChatModel
} from './chat-models.js';
import { buildUserMessage } from './prompt-builder.js';
import type {
  ChatRequest,
  GenerationConfig,
  GenerationMode,
  GenerationResult,
  LlmProviderName,
  ToolDefinition
} from './types/ai.types.js';

/**
 * Inert statement returned when generation fails. Touches no table.
 */
export const FAILURE_SQL = "SELECT 'Error generating SQL' AS error_message";

/**
 * Confidence reported for tool-call answers, whose schema carries no confidence field.
 */
export const TOOL_CALL_CONFIDENCE = 0.9;

export const SQL_TOOL: ToolDefinition = {
  name: 'generate_sql_query',
  description: "Generate an SQL query based on the user's natural language request",
  parameters: {
    type: 'object',
    properties: {
      sql: { type: 'string', description: 'The SQL query generated from the natural language request' },
      explanation: { type: 'string', description: 'Explanation of what the SQL query does' },
      tables_used: {
        type: 'array',
        items: { type: 'string' },
        description: 'Names of database tables used in the query'
      }
    },
    required: ['sql', 'explanation', 'tables_used']
  }
};

const DEFAULT_BASE_URLS: Record<LlmProviderName, string> = {
  openai: 'https://api.openai.com/v1',
  groq: 'https://api.groq.com/openai/v1',
  anthropic: 'https://api.anthropic.com/v1',
  ollama: 'http://localhost:11434'
};

const DEFAULT_MODES: Record<LlmProviderName, GenerationMode> = {
  openai: 'json',
  groq: 'json',
  anthropic: 'text',
  ollama: 'json'
};

const nonEmptySql = z.string().trim().min(1, 'sql must be a non-empty string');

const generationPayloadSchema = z.object({
  sql: nonEmptySql,
  explanation: z.string().nullish(),
  // Quoted numbers are coerced; anything else reads as 0.
  confidence: z.coerce.number().catch(0),
  tables_used: z.array(z.string()).nullish()
});

const toolArgumentsSchema = z.object({
  sql: nonEmptySql,
  explanation: z.string(),
  tables_used: z.array(z.string())
});

/**
 * Sends a prompt and question to a language model and returns a structured SQL proposal.
 * `generate` never rejects: any failure becomes a result built by `createFailureResult`.
 */
export interface GenerationClient {
  readonly mode: GenerationMode;
  generate(question: string, prompt: string): Promise<GenerationResult>;
}

export function createFailureResult(reason: string): GenerationResult {
  return {
    sql: FAILURE_SQL,
    explanation: `Failed to generate SQL: ${reason}`,
    confidence: 0,
    tablesUsed: [],
    failed: true
  };
}

abstract class BaseGenerationClient implements GenerationClient {
  abstract readonly mode: GenerationMode;

  async generate(question: string, prompt: string): Promise<GenerationResult> {
    const startedAt = Date.now();
    try {
      const result = await this.request({ system: prompt, user: buildUserMessage(question) });
      logEvent('GENERATION', this.mode, 'SUCCESS', Date.now() - startedAt, `Confidence:${result.confidence}`);
      return result;
    } catch (error) {
      const message = getErrorMessage(error, 'Unknown generation error');
      logEvent('GENERATION', this.mode, 'ERROR', Date.now() - startedAt, message);
      return createFailureResult(message);
    }
  }

  protected abstract request(chat: ChatRequest): Promise<GenerationResult>;
}

/**
 * Provider constrains its output to a JSON object.
 */
export class JsonModeGenerationClient extends BaseGenerationClient {
  readonly mode = 'json' as const;

  constructor(private readonly model: JsonChatModel) {
    super();
  }

  protected async request(chat: ChatRequest): Promise<GenerationResult> {
    const text = await this.model.completeJson(chat);
    return parseGenerationPayload(parseJson(text));
  }
}

/**
 * Provider answers in prose; the JSON object is cut out of it.
 */
export class TextExtractionGenerationClient extends BaseGenerationClient {
  readonly mode = 'text' as const;

  constructor(private readonly model: TextChatModel) {
    super();
  }

  protected async request(chat: ChatRequest): Promise<GenerationResult> {
    const text = await this.model.completeText(chat);
    return parseGenerationPayload(extractJsonObject(text));
  }
}

/**
 * Provider is forced to call `generate_sql_query`; its arguments are the answer.
 */
export class ToolCallGenerationClient extends BaseGenerationClient {
  readonly mode = 'tool' as const;

  constructor(private readonly model: ToolChatModel) {
    super();
  }

  protected async request(chat: ChatRequest): Promise<GenerationResult> {
    const args = await this.model.callTool(chat, SQL_TOOL);
    const parsed = toolArgumentsSchema.safeParse(args);
    if (!parsed.success) {
      throw invalidPayload(parsed.error);
    }

    return {
      sql: parsed.data.sql,
      explanation: parsed.data.explanation,
      confidence: TOOL_CALL_CONFIDENCE,
      tablesUsed: uniqueTables(parsed.data.tables_used),
      failed: false
    };
  }
}

/**
 * Pick the client variant for `config` once, at construction time.
 */
export function createGenerationClient(config: GenerationConfig): GenerationClient {
  const mode = config.mode ?? DEFAULT_MODES[config.provider];
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URLS[config.provider];

  switch (config.provider) {
    case 'openai':
    case 'groq': {
      const model = new OpenAICompatibleChatModel(requireApiKey(config), config.model, baseUrl, config.timeoutMs);
      if (mode === 'json') return new JsonModeGenerationClient(model);
      if (mode === 'text') return new TextExtractionGenerationClient(model);
      return new ToolCallGenerationClient(model);
    }
    case 'anthropic': {
      const model = new AnthropicChatModel(requireApiKey(config), config.model, baseUrl, config.timeoutMs);
      if (mode === 'json') {
        throw new GenerationError('Anthropic does not support json mode', 'GENERATION_CONFIGURATION_ERROR', 'Use text or tool');
      }
      return mode === 'text' ? new TextExtractionGenerationClient(model) : new ToolCallGenerationClient(model);
    }
    case 'ollama': {
      const model = new OllamaChatModel(config.model, baseUrl, config.timeoutMs);
      if (mode === 'tool') {
        throw new GenerationError('Ollama does not support tool mode', 'GENERATION_CONFIGURATION_ERROR', 'Use json or text');
      }
      return mode === 'json' ? new JsonModeGenerationClient(model) : new TextExtractionGenerationClient(model);
    }
    default: {
      const _exhaustive: never = config.provider;
      return _exhaustive;
    }
  }
}

/**
 * Greedy scan from the first `{` to the last `}`. Falls back to parsing the whole text.
 * Best effort only: braces inside string values or several objects in one reply defeat it.
 */
export function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  return parseJson(match ? match[0] : text);
}

export function parseGenerationPayload(payload: unknown): GenerationResult {
  const parsed = generationPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw invalidPayload(parsed.error);
  }

  const confidence = parsed.data.confidence;
  return {
    sql: parsed.data.sql,
    explanation: parsed.data.explanation ?? '',
    confidence: Math.min(Math.max(confidence, 0), 1),
    tablesUsed: uniqueTables(parsed.data.tables_used ?? []),
    failed: false
  };
}

function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text.trim());
    return parsed;
  } catch (error) {
    throw new GenerationError(
      'Model response was not valid JSON',
      'GENERATION_RESPONSE_INVALID',
      getErrorMessage(error, 'Invalid JSON')
    );
  }
}

function invalidPayload(error: z.ZodError): GenerationError {
  const details = error.issues.map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`).join(', ');
  return new GenerationError(`Model response did not match the SQL contract (${details})`, 'GENERATION_RESPONSE_INVALID', details);
}

function uniqueTables(tables: string[]): string[] {
  return Array.from(new Set(tables));
}

function requireApiKey(config: GenerationConfig): string {
  if (!config.apiKey) {
    throw new GenerationError(`Missing API key for ${config.provider}`, 'GENERATION_CONFIGURATION_ERROR');
  }
  return config.apiKey;
}
