import { InvalidArgumentError } from '../../errors/categories.js';

/**
 * Output format of the run's messages. `auto` defers to the assistant's own
 * setting. `text`, the default, is left off the wire.
 */
export const ResponseFormat = {
  Auto: 'auto',
  Text: 'text',
  Json: 'json_object',
  JsonSchema: 'json_schema',
} as const;

export type ResponseFormat = (typeof ResponseFormat)[keyof typeof ResponseFormat];

export const DEFAULT_RESPONSE_FORMAT = ResponseFormat.Text;

/**
 * Structured-output contract. `strict` defaults to true, which makes the
 * model follow `schema` exactly.
 */
export interface JsonSchema {
  name: string;
  description?: string;
  strict?: boolean;
  schema: Record<string, unknown>;
}

export type ResponseFormatSetting =
  | { readonly type: 'auto' | 'text' | 'json_object' }
  | { readonly type: 'json_schema'; readonly jsonSchema: JsonSchema };

export type ResponseFormatBody =
  | 'auto'
  | { type: 'text' }
  | { type: 'json_object' }
  | {
      type: 'json_schema';
      json_schema: { name: string; description?: string; strict: boolean; schema: Record<string, unknown> };
    };

/** A supplied schema always wins over the enumerated format. */
export function resolveResponseFormat(
  format: ResponseFormat = DEFAULT_RESPONSE_FORMAT,
  jsonSchema?: JsonSchema
): ResponseFormatSetting {
  if (jsonSchema) {
    return { type: 'json_schema', jsonSchema: { ...jsonSchema, schema: structuredClone(jsonSchema.schema) } };
  }
  if (format === ResponseFormat.JsonSchema) {
    throw new InvalidArgumentError(
      "response format 'json_schema' requires a JSON schema",
      { param: 'response_format' }
    );
  }
  return { type: format };
}

export function encodeResponseFormat(setting: ResponseFormatSetting): ResponseFormatBody | undefined {
  switch (setting.type) {
    case 'text':
      return undefined;
    case 'auto':
      return 'auto';
    case 'json_object':
      return { type: 'json_object' };
    case 'json_schema': {
      const { name, description, strict, schema } = setting.jsonSchema;
      return {
        type: 'json_schema',
        json_schema: {
          name,
          ...(description !== undefined && { description }),
          strict: strict ?? true,
          schema: structuredClone(schema),
        },
      };
    }
  }
}

export function decodeResponseFormat(body: ResponseFormatBody | undefined): ResponseFormatSetting {
  if (body === undefined) {
    return { type: DEFAULT_RESPONSE_FORMAT };
  }
  if (body === 'auto') {
    return { type: 'auto' };
  }
  if (body.type === 'json_schema') {
    return { type: 'json_schema', jsonSchema: { ...body.json_schema } };
  }
  return { type: body.type };
}
