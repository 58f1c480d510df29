export interface FunctionDefinition {
  name: string;
  description?: string;
  /** JSON Schema for the function's parameters. */
  parameters?: Record<string, unknown>;
  strict?: boolean;
  /**
   * Arguments from a previous tool call, as the raw JSON string the model
   * produced. Never sent with a run request.
   */
  arguments?: string;
}

export interface FunctionTool {
  type: 'function';
  function: FunctionDefinition;
}

export interface CodeInterpreterTool {
  type: 'code_interpreter';
}

export interface FileSearchRankingOptions {
  ranker?: 'auto' | 'default_2024_08_21';
  score_threshold: number;
}

export interface FileSearchTool {
  type: 'file_search';
  file_search?: {
    max_num_results?: number;
    ranking_options?: FileSearchRankingOptions;
  };
}

export type AssistantTool = FunctionTool | CodeInterpreterTool | FileSearchTool;

export function isFunctionTool(tool: AssistantTool): tool is FunctionTool {
  return tool.type === 'function';
}

export function functionTool(
  name: string,
  options: Omit<FunctionDefinition, 'name' | 'arguments'> = {}
): FunctionTool {
  return { type: 'function', function: { name, ...options } };
}

export function codeInterpreterTool(): CodeInterpreterTool {
  return { type: 'code_interpreter' };
}

export function fileSearchTool(options?: FileSearchTool['file_search']): FileSearchTool {
  return options ? { type: 'file_search', file_search: options } : { type: 'file_search' };
}

/**
 * Returns a fresh copy of the tool without stale call arguments. Nested
 * objects are copied too, so the copy shares nothing with the input.
 */
export function withoutCallArguments(tool: AssistantTool): AssistantTool {
  switch (tool.type) {
    case 'function': {
      const { arguments: _stale, parameters, ...definition } = tool.function;
      return {
        type: 'function',
        function: parameters === undefined ? definition : { ...definition, parameters: structuredClone(parameters) },
      };
    }
    case 'code_interpreter':
      return { type: 'code_interpreter' };
    case 'file_search': {
      const options = tool.file_search;
      if (options === undefined) return { type: 'file_search' };
      const { ranking_options: ranking, ...rest } = options;
      return {
        type: 'file_search',
        file_search: ranking === undefined ? rest : { ...rest, ranking_options: { ...ranking } },
      };
    }
  }
}
