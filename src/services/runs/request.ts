import { InvalidArgumentError } from '../../errors/categories.js';
import { withoutCallArguments, type AssistantTool } from './tools.js';
import type { RunMessage } from './messages.js';
import {
  decodeTruncationStrategy,
  encodeTruncationStrategy,
  type TruncationStrategy,
} from './truncation.js';
import {
  encodeToolChoice,
  resolveToolChoice,
  toolChoiceArgument,
  type ToolChoice,
} from './tool-choice.js';
import {
  decodeResponseFormat,
  encodeResponseFormat,
  resolveResponseFormat,
  type JsonSchema,
  type ResponseFormat,
  type ResponseFormatSetting,
} from './response-format.js';
import { createRunRequestBodySchema, type CreateRunRequestBody } from './schema.js';

export interface CreateRunOptions {
  /** Overrides the assistant's model for this run. */
  model?: string;
  /** Replaces the assistant's instructions for this run. */
  instructions?: string;
  /** Appended after the instructions, for per-run tweaks. */
  additionalInstructions?: string;
  /** Added to the thread before the run starts. */
  additionalMessages?: readonly RunMessage[];
  tools?: readonly AssistantTool[];
  /**
   * Up to 16 pairs; keys up to 64 characters, values up to 512. Only checked
   * when request validation is switched on.
   */
  metadata?: Readonly<Record<string, string>>;
  /** 0 to 2. */
  temperature?: number;
  /** 0 to 1. Tune this or temperature, not both. */
  topP?: number;
  /** Past this budget the run ends as `incomplete`. */
  maxPromptTokens?: number;
  /** Past this budget the run ends as `incomplete`. */
  maxCompletionTokens?: number;
  truncationStrategy?: TruncationStrategy;
  /**
   * `auto`, `none`, `required`, or the name of one of `tools`. Defaults to
   * `auto` when tools are given.
   */
  toolChoice?: string | null;
  parallelToolCalls?: boolean;
  /** Structured output contract; takes precedence over `responseFormat`. */
  jsonSchema?: JsonSchema;
  /** Defaults to `text`. */
  responseFormat?: ResponseFormat;
}

/**
 * Body of a "create run" call.
 *
 * Immutable once built. The runs service alone may rebind the assistant and
 * flag the request as streaming just before sending it.
 */
export class CreateRunRequest {
  readonly model?: string;
  readonly instructions?: string;
  readonly additionalInstructions?: string;
  readonly additionalMessages?: readonly RunMessage[];
  readonly tools?: readonly AssistantTool[];
  readonly metadata?: Readonly<Record<string, string>>;
  readonly temperature?: number;
  readonly topP?: number;
  readonly maxPromptTokens?: number;
  readonly maxCompletionTokens?: number;
  readonly truncationStrategy?: TruncationStrategy;
  readonly toolChoice: ToolChoice;
  readonly parallelToolCalls?: boolean;
  readonly responseFormat: ResponseFormatSetting;

  private assistant: string;
  private streaming = false;

  constructor(assistantId: string, options: CreateRunOptions = {}) {
    this.assistant = assistantId;
    this.model = options.model;
    this.instructions = options.instructions;
    this.additionalInstructions = options.additionalInstructions;
    this.additionalMessages = options.additionalMessages && Object.freeze(structuredClone([...options.additionalMessages]));
    this.tools = options.tools && Object.freeze(options.tools.map(withoutCallArguments));
    this.toolChoice = resolveToolChoice(this.tools, options.toolChoice);
    this.metadata = options.metadata && Object.freeze({ ...options.metadata });
    this.temperature = options.temperature;
    this.topP = options.topP;
    this.maxPromptTokens = options.maxPromptTokens;
    this.maxCompletionTokens = options.maxCompletionTokens;
    this.truncationStrategy = options.truncationStrategy;
    this.parallelToolCalls = options.parallelToolCalls;
    this.responseFormat = resolveResponseFormat(options.responseFormat, options.jsonSchema);
  }

  get assistantId(): string {
    return this.assistant;
  }

  get stream(): boolean {
    return this.streaming;
  }

  /** @internal Used by the runs service to send the request on behalf of another assistant. */
  rebindAssistant(assistantId: string): void {
    this.assistant = assistantId;
  }

  /** @internal Set by the runs service according to the endpoint being called. */
  setStreaming(stream: boolean): void {
    this.streaming = stream;
  }

  toJSON(): CreateRunRequestBody {
    const body: CreateRunRequestBody = { assistant_id: this.assistant };

    if (this.model !== undefined) body.model = this.model;
    if (this.instructions !== undefined) body.instructions = this.instructions;
    if (this.additionalInstructions !== undefined) body.additional_instructions = this.additionalInstructions;
    if (this.additionalMessages !== undefined) body.additional_messages = structuredClone([...this.additionalMessages]);
    if (this.tools !== undefined) body.tools = this.tools.map(withoutCallArguments);
    if (this.metadata !== undefined) body.metadata = { ...this.metadata };
    if (this.temperature !== undefined) body.temperature = this.temperature;
    if (this.topP !== undefined) body.top_p = this.topP;
    if (this.streaming) body.stream = true;
    if (this.maxPromptTokens !== undefined) body.max_prompt_tokens = this.maxPromptTokens;
    if (this.maxCompletionTokens !== undefined) body.max_completion_tokens = this.maxCompletionTokens;
    if (this.truncationStrategy !== undefined) body.truncation_strategy = encodeTruncationStrategy(this.truncationStrategy);

    const toolChoice = encodeToolChoice(this.toolChoice);
    if (toolChoice !== undefined) body.tool_choice = toolChoice;

    if (this.parallelToolCalls !== undefined) body.parallel_tool_calls = this.parallelToolCalls;

    const responseFormat = encodeResponseFormat(this.responseFormat);
    if (responseFormat !== undefined) body.response_format = responseFormat;

    return body;
  }

  /** Rebuilds a request from a wire body, e.g. one captured from a log. */
  static fromJSON(body: unknown): CreateRunRequest {
    const parsed = createRunRequestBodySchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue?.path.join('.') ?? '';
      throw new InvalidArgumentError(
        `Invalid run request body${path ? ` at '${path}'` : ''}: ${issue?.message ?? 'unknown error'}`,
        { param: path || undefined }
      );
    }

    const wire = parsed.data;
    const format = decodeResponseFormat(wire.response_format);
    const request = new CreateRunRequest(wire.assistant_id, {
      model: wire.model,
      instructions: wire.instructions,
      additionalInstructions: wire.additional_instructions,
      additionalMessages: wire.additional_messages,
      tools: wire.tools,
      metadata: wire.metadata,
      temperature: wire.temperature,
      topP: wire.top_p,
      maxPromptTokens: wire.max_prompt_tokens,
      maxCompletionTokens: wire.max_completion_tokens,
      truncationStrategy: wire.truncation_strategy && decodeTruncationStrategy(wire.truncation_strategy),
      toolChoice: toolChoiceArgument(wire.tool_choice),
      parallelToolCalls: wire.parallel_tool_calls,
      jsonSchema: format.type === 'json_schema' ? format.jsonSchema : undefined,
      responseFormat: format.type === 'json_schema' ? undefined : format.type,
    });
    request.setStreaming(wire.stream === true);
    return request;
  }
}
