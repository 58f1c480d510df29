export type { RunsService, RunsServiceOptions, RunCreateOptions } from './service.js';
export { RunsServiceImpl } from './service.js';
export { CreateRunRequest, type CreateRunOptions } from './request.js';
export { createRunRequestBodySchema, type CreateRunRequestBody } from './schema.js';
export { RunRequestValidator, METADATA_LIMITS } from './validation.js';
export type {
  FunctionDefinition,
  FunctionTool,
  CodeInterpreterTool,
  FileSearchTool,
  FileSearchRankingOptions,
  AssistantTool,
} from './tools.js';
export {
  functionTool,
  codeInterpreterTool,
  fileSearchTool,
  isFunctionTool,
  withoutCallArguments,
} from './tools.js';
export type {
  RunMessage,
  RunMessageRole,
  MessageContentPart,
  TextContentPart,
  ImageFileContentPart,
  ImageUrlContentPart,
  MessageAttachment,
} from './messages.js';
export { userMessage, assistantMessage } from './messages.js';
export type { TruncationStrategy, TruncationStrategyBody } from './truncation.js';
export { TruncationStrategies, encodeTruncationStrategy, decodeTruncationStrategy } from './truncation.js';
export type { ToolChoice, ToolChoiceMode, ToolChoiceBody } from './tool-choice.js';
export {
  ToolChoices,
  TOOL_CHOICE_MODES,
  isToolChoiceMode,
  resolveToolChoice,
  encodeToolChoice,
  toolChoiceArgument,
} from './tool-choice.js';
export type { JsonSchema, ResponseFormatSetting, ResponseFormatBody } from './response-format.js';
export {
  ResponseFormat,
  DEFAULT_RESPONSE_FORMAT,
  resolveResponseFormat,
  encodeResponseFormat,
  decodeResponseFormat,
} from './response-format.js';
export type { RunStreamEvent, RunLifecycleEvent, RunStepEvent, RunEventName } from './stream.js';
export { RUN_EVENTS, isRunEvent, isRunStepEvent, finalRun } from './stream.js';
export type {
  RunStatus,
  Run,
  RunRequiredAction,
  RunToolCall,
  RunError,
  RunUpdateRequest,
  RunToolOutput,
  RunSubmitToolOutputsRequest,
  RunListParams,
  RunListResponse,
  RunStepStatus,
  RunStep,
  RunStepDetails,
  RunStepDetailsMessageCreation,
  RunStepDetailsToolCalls,
  RunStepListResponse,
} from './types.js';
export { TERMINAL_RUN_STATUSES } from './types.js';
