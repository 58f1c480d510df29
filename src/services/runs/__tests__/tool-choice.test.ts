import { describe, it, expect } from 'vitest';
import {
  resolveToolChoice,
  encodeToolChoice,
  toolChoiceArgument,
  isToolChoiceMode,
  ToolChoices,
} from '../tool-choice.js';
import { functionTool, codeInterpreterTool, fileSearchTool } from '../tools.js';
import { InvalidArgumentError } from '../../../errors/categories.js';

describe('resolveToolChoice', () => {
  const tools = [functionTool('get_weather'), functionTool('get_weather_forecast'), codeInterpreterTool()];

  describe('without tools', () => {
    it('should stay unset when no tools are given', () => {
      expect(resolveToolChoice(undefined, 'get_weather')).toEqual({ kind: 'unset' });
    });

    it('should stay unset for an empty tool list', () => {
      expect(resolveToolChoice([], 'required')).toEqual({ kind: 'unset' });
    });
  });

  describe('modes', () => {
    it('should default to auto when no choice is given', () => {
      expect(resolveToolChoice(tools)).toEqual({ kind: 'mode', mode: 'auto' });
    });

    it('should treat null and blank choices as auto', () => {
      expect(resolveToolChoice(tools, null)).toEqual({ kind: 'mode', mode: 'auto' });
      expect(resolveToolChoice(tools, '')).toEqual({ kind: 'mode', mode: 'auto' });
      expect(resolveToolChoice(tools, '   ')).toEqual({ kind: 'mode', mode: 'auto' });
    });

    it.each(['auto', 'none', 'required'] as const)('should pass %s through', (mode) => {
      expect(resolveToolChoice(tools, mode)).toEqual({ kind: 'mode', mode });
    });
  });

  describe('function names', () => {
    it('should prefer an exact match over an earlier partial match', () => {
      const ordered = [functionTool('get_weather_forecast'), functionTool('get_weather')];

      expect(resolveToolChoice(ordered, 'get_weather')).toEqual({ kind: 'function', name: 'get_weather' });
    });

    it('should fall back to the first function whose name contains the choice', () => {
      expect(resolveToolChoice(tools, 'weather')).toEqual({ kind: 'function', name: 'get_weather' });
      expect(resolveToolChoice(tools, 'forecast')).toEqual({ kind: 'function', name: 'get_weather_forecast' });
    });

    it('should ignore tools that are not functions', () => {
      expect(() => resolveToolChoice([codeInterpreterTool(), fileSearchTool()], 'code_interpreter')).toThrow(
        InvalidArgumentError
      );
    });

    it('should throw when no function matches', () => {
      expect(() => resolveToolChoice(tools, 'send_email')).toThrow(
        "The specified tool choice 'send_email' was not found in the list of tools"
      );
    });

    it('should name tool_choice as the offending parameter', () => {
      let caught: unknown;
      try {
        resolveToolChoice(tools, 'send_email');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidArgumentError);
      expect(caught).toMatchObject({ param: 'tool_choice' });
    });
  });
});

describe('encodeToolChoice', () => {
  it('should omit an unset choice', () => {
    expect(encodeToolChoice(ToolChoices.unset())).toBeUndefined();
  });

  it('should encode a mode as its bare string', () => {
    expect(encodeToolChoice(ToolChoices.mode('required'))).toBe('required');
  });

  it('should encode a function choice as an object', () => {
    expect(encodeToolChoice(ToolChoices.function('get_weather'))).toEqual({
      type: 'function',
      function: { name: 'get_weather' },
    });
  });
});

describe('toolChoiceArgument', () => {
  it('should recover the caller-facing string from both wire shapes', () => {
    expect(toolChoiceArgument(undefined)).toBeUndefined();
    expect(toolChoiceArgument('none')).toBe('none');
    expect(toolChoiceArgument({ type: 'function', function: { name: 'get_weather' } })).toBe('get_weather');
  });
});

describe('isToolChoiceMode', () => {
  it('should recognise only the three mode literals', () => {
    expect(isToolChoiceMode('auto')).toBe(true);
    expect(isToolChoiceMode('none')).toBe(true);
    expect(isToolChoiceMode('required')).toBe(true);
    expect(isToolChoiceMode('Auto')).toBe(false);
    expect(isToolChoiceMode('get_weather')).toBe(false);
  });
});
