import { z } from 'zod';
import { GenerationError } from '../../core/errors.js';
import { postJson } from '../../core/fetch-with-timeout.js';
import type { ChatRequest, ToolDefinition } from './types/ai.types.js';

export interface JsonChatModel {
  /** Returns the raw JSON text the model produced. */
  completeJson(request: ChatRequest): Promise<string>;
}

export interface TextChatModel {
  completeText(request: ChatRequest): Promise<string>;
}

export interface ToolChatModel {
  /** Forces a call to `tool` and returns its arguments. */
  callTool(request: ChatRequest, tool: ToolDefinition): Promise<unknown>;
}

const TEMPERATURE = 0.1;
const MAX_TOKENS = 2000;

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(z.object({ function: z.object({ name: z.string(), arguments: z.string() }) }))
            .nullish()
        })
      })
    )
    .min(1)
});

const anthropicMessageSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      name: z.string().optional(),
      input: z.unknown().optional()
    })
  )
});

const ollamaGenerateSchema = z.object({ response: z.string() });

function parseReply<S extends z.ZodTypeAny>(schema: S, raw: unknown, provider: string): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new GenerationError(
      `${provider} response had an unexpected shape`,
      'GENERATION_RESPONSE_INVALID',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
    );
  }
  return parsed.data;
}

/**
 * OpenAI chat completions and compatible APIs (Groq).
 */
export class OpenAICompatibleChatModel implements JsonChatModel, TextChatModel, ToolChatModel {
  constructor(
    private readonly apiKey: string,
    private readonly modelName: string,
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  async completeJson(request: ChatRequest): Promise<string> {
    return this.complete(request, { response_format: { type: 'json_object' } });
  }

  async completeText(request: ChatRequest): Promise<string> {
    return this.complete(request, {});
  }

  async callTool(request: ChatRequest, tool: ToolDefinition): Promise<unknown> {
    const reply = await this.send(request, {
      tools: [{ type: 'function', function: tool }],
      tool_choice: { type: 'function', function: { name: tool.name } }
    });

    const call = reply.choices[0].message.tool_calls?.find((item) => item.function.name === tool.name);
    if (!call) {
      throw new GenerationError('No tool calls found in the response', 'GENERATION_RESPONSE_INVALID');
    }

    try {
      const args: unknown = JSON.parse(call.function.arguments);
      return args;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Invalid tool arguments';
      throw new GenerationError('Tool call arguments were not valid JSON', 'GENERATION_RESPONSE_INVALID', message);
    }
  }

  private async complete(request: ChatRequest, extra: Record<string, unknown>): Promise<string> {
    const reply = await this.send(request, extra);
    const content = reply.choices[0].message.content;
    if (!content) {
      throw new GenerationError('Chat completion missing choices[0].message.content', 'GENERATION_RESPONSE_INVALID');
    }
    return content;
  }

  private async send(request: ChatRequest, extra: Record<string, unknown>) {
    const payload = {
      model: this.modelName,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user }
      ],
      temperature: TEMPERATURE,
      max_tokens: MAX_TOKENS,
      ...extra
    };

    const raw = await postJson(
      `${this.baseUrl}/chat/completions`,
      payload,
      { Authorization: `Bearer ${this.apiKey}` },
      this.timeoutMs
    );
    return parseReply(chatCompletionSchema, raw, 'Chat completion');
  }
}

/**
 * Anthropic Messages API.
 */
export class AnthropicChatModel implements TextChatModel, ToolChatModel {
  constructor(
    private readonly apiKey: string,
    private readonly modelName: string,
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  async completeText(request: ChatRequest): Promise<string> {
    const reply = await this.send(request, {});
    const text = reply.content
      .filter((block) => block.type === 'text' && typeof block.text === 'string')
      .map((block) => block.text)
      .join('');
    if (!text) {
      throw new GenerationError('Anthropic response contained no text blocks', 'GENERATION_RESPONSE_INVALID');
    }
    return text;
  }

  async callTool(request: ChatRequest, tool: ToolDefinition): Promise<unknown> {
    const reply = await this.send(request, {
      tools: [{ name: tool.name, description: tool.description, input_schema: tool.parameters }],
      tool_choice: { type: 'tool', name: tool.name }
    });

    const block = reply.content.find((item) => item.type === 'tool_use' && item.name === tool.name);
    if (!block) {
      throw new GenerationError('No tool_use block found in the response', 'GENERATION_RESPONSE_INVALID');
    }
    return block.input;
  }

  private async send(request: ChatRequest, extra: Record<string, unknown>) {
    const payload = {
      model: this.modelName,
      max_tokens: MAX_TOKENS,
      temperature: TEMPERATURE,
      system: request.system,
      messages: [{ role: 'user', content: request.user }],
      ...extra
    };

    const raw = await postJson(
      `${this.baseUrl}/messages`,
      payload,
      { 'x-api-key': this.apiKey, 'anthropic-version': '2023-06-01' },
      this.timeoutMs
    );
    return parseReply(anthropicMessageSchema, raw, 'Anthropic');
  }
}

/**
 * Ollama `/api/generate`, non-streaming.
 */
export class OllamaChatModel implements JsonChatModel, TextChatModel {
  constructor(
    private readonly modelName: string,
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  async completeJson(request: ChatRequest): Promise<string> {
    return this.generate(request, 'json');
  }

  async completeText(request: ChatRequest): Promise<string> {
    return this.generate(request);
  }

  private async generate(request: ChatRequest, format?: 'json'): Promise<string> {
    const payload = {
      model: this.modelName,
      prompt: `System: ${request.system}\n\nUser: ${request.user}`,
      stream: false,
      options: { temperature: TEMPERATURE },
      ...(format ? { format } : {})
    };

    const raw = await postJson(`${this.baseUrl}/api/generate`, payload, {}, this.timeoutMs);
    return parseReply(ollamaGenerateSchema, raw, 'Ollama').response;
  }
}
