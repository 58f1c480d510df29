import { InvalidArgumentError } from '../../errors/categories.js';
import { isFunctionTool, type AssistantTool, type FunctionTool } from './tools.js';

export const TOOL_CHOICE_MODES = ['auto', 'none', 'required'] as const;

export type ToolChoiceMode = (typeof TOOL_CHOICE_MODES)[number];

export type ToolChoice =
  | { readonly kind: 'unset' }
  | { readonly kind: 'mode'; readonly mode: ToolChoiceMode }
  | { readonly kind: 'function'; readonly name: string };

export type ToolChoiceBody =
  | ToolChoiceMode
  | { type: 'function'; function: { name: string } };

export const ToolChoices = {
  unset(): ToolChoice {
    return { kind: 'unset' };
  },
  mode(mode: ToolChoiceMode): ToolChoice {
    return { kind: 'mode', mode };
  },
  function(name: string): ToolChoice {
    return { kind: 'function', name };
  },
} as const;

export function isToolChoiceMode(value: string): value is ToolChoiceMode {
  return TOOL_CHOICE_MODES.some((mode) => mode === value);
}

/**
 * Turns the caller's tool-choice string into its resolved form.
 *
 * Without tools there is nothing to choose from, so the choice stays unset.
 * With tools, a blank choice means `auto` and the three mode literals pass
 * through. Anything else names a function tool: an exact name wins, then
 * the first function whose name contains the string.
 */
export function resolveToolChoice(
  tools: readonly AssistantTool[] | undefined,
  choice?: string | null
): ToolChoice {
  if (!tools || tools.length === 0) {
    return ToolChoices.unset();
  }

  if (choice === undefined || choice === null || choice.trim() === '') {
    return ToolChoices.mode('auto');
  }

  if (isToolChoiceMode(choice)) {
    return ToolChoices.mode(choice);
  }

  const functions = tools.filter(isFunctionTool);
  const match = findByExactName(functions, choice) ?? functions.find((tool) => tool.function.name.includes(choice));

  if (!match) {
    throw new InvalidArgumentError(
      `The specified tool choice '${choice}' was not found in the list of tools`,
      { param: 'tool_choice' }
    );
  }

  return ToolChoices.function(match.function.name);
}

function findByExactName(functions: FunctionTool[], name: string): FunctionTool | undefined {
  return functions.find((tool) => tool.function.name === name);
}

export function encodeToolChoice(choice: ToolChoice): ToolChoiceBody | undefined {
  switch (choice.kind) {
    case 'unset':
      return undefined;
    case 'mode':
      return choice.mode;
    case 'function':
      return { type: 'function', function: { name: choice.name } };
  }
}

/** Recovers the caller-facing string from either wire shape. */
export function toolChoiceArgument(body: ToolChoiceBody | undefined): string | undefined {
  if (body === undefined) return undefined;
  return typeof body === 'string' ? body : body.function.name;
}
