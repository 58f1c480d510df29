import { z } from 'zod';
import type { AssistantTool } from './tools.js';
import type { RunMessage } from './messages.js';
import type { TruncationStrategyBody } from './truncation.js';
import type { ToolChoiceBody } from './tool-choice.js';
import type { ResponseFormatBody } from './response-format.js';

/** Wire body of `POST /v1/threads/{thread_id}/runs`. */
export interface CreateRunRequestBody {
  assistant_id: string;
  model?: string;
  instructions?: string;
  additional_instructions?: string;
  additional_messages?: RunMessage[];
  tools?: AssistantTool[];
  metadata?: Record<string, string>;
  temperature?: number;
  top_p?: number;
  stream?: boolean;
  max_prompt_tokens?: number;
  max_completion_tokens?: number;
  truncation_strategy?: TruncationStrategyBody;
  tool_choice?: ToolChoiceBody;
  parallel_tool_calls?: boolean;
  response_format?: ResponseFormatBody;
}

const jsonObject = z.record(z.unknown());

const toolSchema: z.ZodType<AssistantTool> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('function'),
    function: z.object({
      name: z.string(),
      description: z.string().optional(),
      parameters: jsonObject.optional(),
      strict: z.boolean().optional(),
      arguments: z.string().optional(),
    }),
  }),
  z.object({ type: z.literal('code_interpreter') }),
  z.object({
    type: z.literal('file_search'),
    file_search: z
      .object({
        max_num_results: z.number().int().optional(),
        ranking_options: z
          .object({
            ranker: z.enum(['auto', 'default_2024_08_21']).optional(),
            score_threshold: z.number(),
          })
          .optional(),
      })
      .optional(),
  }),
]);

const detail = z.enum(['auto', 'low', 'high']).optional();

const messageSchema: z.ZodType<RunMessage> = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.union([
    z.string(),
    z.array(
      z.discriminatedUnion('type', [
        z.object({ type: z.literal('text'), text: z.string() }),
        z.object({ type: z.literal('image_file'), image_file: z.object({ file_id: z.string(), detail }) }),
        z.object({ type: z.literal('image_url'), image_url: z.object({ url: z.string(), detail }) }),
      ])
    ),
  ]),
  attachments: z
    .array(
      z.object({
        file_id: z.string(),
        tools: z.array(z.union([
          z.object({ type: z.literal('code_interpreter') }),
          z.object({ type: z.literal('file_search') }),
        ])),
      })
    )
    .optional(),
  metadata: z.record(z.string()).optional(),
});

const truncationSchema: z.ZodType<TruncationStrategyBody> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('auto') }),
  z.object({ type: z.literal('last_messages'), last_messages: z.number().int() }),
]);

const toolChoiceSchema: z.ZodType<ToolChoiceBody> = z.union([
  z.enum(['auto', 'none', 'required']),
  z.object({ type: z.literal('function'), function: z.object({ name: z.string() }) }),
]);

const responseFormatSchema: z.ZodType<ResponseFormatBody> = z.union([
  z.literal('auto'),
  z.object({ type: z.literal('text') }),
  z.object({ type: z.literal('json_object') }),
  z.object({
    type: z.literal('json_schema'),
    json_schema: z.object({
      name: z.string(),
      description: z.string().optional(),
      strict: z.boolean(),
      schema: jsonObject,
    }),
  }),
]);

export const createRunRequestBodySchema: z.ZodType<CreateRunRequestBody> = z.object({
  assistant_id: z.string(),
  model: z.string().optional(),
  instructions: z.string().optional(),
  additional_instructions: z.string().optional(),
  additional_messages: z.array(messageSchema).optional(),
  tools: z.array(toolSchema).optional(),
  metadata: z.record(z.string()).optional(),
  temperature: z.number().optional(),
  top_p: z.number().optional(),
  stream: z.boolean().optional(),
  max_prompt_tokens: z.number().int().optional(),
  max_completion_tokens: z.number().int().optional(),
  truncation_strategy: truncationSchema.optional(),
  tool_choice: toolChoiceSchema.optional(),
  parallel_tool_calls: z.boolean().optional(),
  response_format: responseFormatSchema.optional(),
});
