import { describe, it, expect } from 'vitest';
import {
  ResponseFormat,
  resolveResponseFormat,
  encodeResponseFormat,
  decodeResponseFormat,
  type JsonSchema,
} from '../response-format.js';
import { InvalidArgumentError } from '../../../errors/categories.js';

const weatherSchema: JsonSchema = {
  name: 'weather_report',
  description: 'Current conditions for a city',
  schema: {
    type: 'object',
    properties: { city: { type: 'string' }, celsius: { type: 'number' } },
    required: ['city', 'celsius'],
    additionalProperties: false,
  },
};

describe('resolveResponseFormat', () => {
  it('should default to text', () => {
    expect(resolveResponseFormat()).toEqual({ type: 'text' });
  });

  it('should keep an enumerated format when no schema is given', () => {
    expect(resolveResponseFormat(ResponseFormat.Auto)).toEqual({ type: 'auto' });
    expect(resolveResponseFormat(ResponseFormat.Json)).toEqual({ type: 'json_object' });
  });

  it('should let a schema win over any enumerated format', () => {
    expect(resolveResponseFormat(ResponseFormat.Json, weatherSchema)).toEqual({
      type: 'json_schema',
      jsonSchema: weatherSchema,
    });
    expect(resolveResponseFormat(undefined, weatherSchema)).toEqual({
      type: 'json_schema',
      jsonSchema: weatherSchema,
    });
  });

  it('should reject json_schema without a schema', () => {
    expect(() => resolveResponseFormat(ResponseFormat.JsonSchema)).toThrow(InvalidArgumentError);
    expect(() => resolveResponseFormat(ResponseFormat.JsonSchema)).toThrow(
      "response format 'json_schema' requires a JSON schema"
    );
  });
});

describe('encodeResponseFormat', () => {
  it('should leave text off the wire', () => {
    expect(encodeResponseFormat({ type: 'text' })).toBeUndefined();
  });

  it('should encode auto as a bare string', () => {
    expect(encodeResponseFormat({ type: 'auto' })).toBe('auto');
  });

  it('should encode json_object as an object', () => {
    expect(encodeResponseFormat({ type: 'json_object' })).toEqual({ type: 'json_object' });
  });

  it('should encode a schema with strict defaulting to true', () => {
    expect(encodeResponseFormat({ type: 'json_schema', jsonSchema: weatherSchema })).toEqual({
      type: 'json_schema',
      json_schema: {
        name: 'weather_report',
        description: 'Current conditions for a city',
        strict: true,
        schema: weatherSchema.schema,
      },
    });
  });

  it('should keep an explicit non-strict flag and omit a missing description', () => {
    const loose: JsonSchema = { name: 'loose', strict: false, schema: { type: 'object' } };

    expect(encodeResponseFormat({ type: 'json_schema', jsonSchema: loose })).toEqual({
      type: 'json_schema',
      json_schema: { name: 'loose', strict: false, schema: { type: 'object' } },
    });
  });
});

describe('decodeResponseFormat', () => {
  it('should read a missing field as text', () => {
    expect(decodeResponseFormat(undefined)).toEqual({ type: 'text' });
  });

  it('should read every wire shape back', () => {
    expect(decodeResponseFormat('auto')).toEqual({ type: 'auto' });
    expect(decodeResponseFormat({ type: 'text' })).toEqual({ type: 'text' });
    expect(decodeResponseFormat({ type: 'json_object' })).toEqual({ type: 'json_object' });
    expect(
      decodeResponseFormat({
        type: 'json_schema',
        json_schema: { name: 'weather_report', strict: true, schema: { type: 'object' } },
      })
    ).toEqual({
      type: 'json_schema',
      jsonSchema: { name: 'weather_report', strict: true, schema: { type: 'object' } },
    });
  });
});
