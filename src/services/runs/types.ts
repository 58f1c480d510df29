import type { PaginatedResponse, PaginationParams, Usage } from '../../types/common.js';
import type { AssistantTool } from './tools.js';
import type { TruncationStrategyBody } from './truncation.js';
import type { ToolChoiceBody } from './tool-choice.js';
import type { ResponseFormatBody } from './response-format.js';

export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'cancelled'
  | 'failed'
  | 'completed'
  | 'incomplete'
  | 'expired';

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ['cancelled', 'failed', 'completed', 'incomplete', 'expired'];

export interface Run {
  id: string;
  object: 'thread.run';
  created_at: number;
  thread_id: string;
  assistant_id: string;
  status: RunStatus;
  required_action: RunRequiredAction | null;
  last_error: RunError | null;
  incomplete_details?: { reason: 'max_prompt_tokens' | 'max_completion_tokens' } | null;
  expires_at: number | null;
  started_at: number | null;
  cancelled_at: number | null;
  failed_at: number | null;
  completed_at: number | null;
  model: string;
  instructions: string | null;
  tools: AssistantTool[];
  metadata: Record<string, string>;
  usage: Usage | null;
  temperature?: number | null;
  top_p?: number | null;
  max_prompt_tokens?: number | null;
  max_completion_tokens?: number | null;
  truncation_strategy?: TruncationStrategyBody;
  tool_choice?: ToolChoiceBody;
  parallel_tool_calls?: boolean;
  response_format?: ResponseFormatBody;
}

export interface RunRequiredAction {
  type: 'submit_tool_outputs';
  submit_tool_outputs: {
    tool_calls: RunToolCall[];
  };
}

export interface RunToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface RunError {
  code: 'server_error' | 'rate_limit_exceeded' | 'invalid_prompt' | string;
  message: string;
}

export interface RunUpdateRequest {
  metadata?: Record<string, string>;
}

export interface RunToolOutput {
  tool_call_id: string;
  output: string;
}

export interface RunSubmitToolOutputsRequest {
  tool_outputs: RunToolOutput[];
}

export type RunListParams = PaginationParams;

export type RunListResponse = PaginatedResponse<Run>;

export type RunStepStatus = 'in_progress' | 'cancelled' | 'failed' | 'completed' | 'expired';

export interface RunStep {
  id: string;
  object: 'thread.run.step';
  created_at: number;
  assistant_id: string;
  thread_id: string;
  run_id: string;
  type: 'message_creation' | 'tool_calls';
  status: RunStepStatus;
  step_details: RunStepDetails;
  last_error: RunError | null;
  expired_at: number | null;
  cancelled_at: number | null;
  failed_at: number | null;
  completed_at: number | null;
  metadata: Record<string, string> | null;
  usage: Usage | null;
}

export type RunStepDetails = RunStepDetailsMessageCreation | RunStepDetailsToolCalls;

export interface RunStepDetailsMessageCreation {
  type: 'message_creation';
  message_creation: {
    message_id: string;
  };
}

export interface RunStepDetailsToolCalls {
  type: 'tool_calls';
  tool_calls: RunToolCall[];
}

export type RunStepListResponse = PaginatedResponse<RunStep>;
