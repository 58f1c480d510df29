import type { Run, RunListResponse, RunStep, RunToolCall } from '../services/runs/types.js';

export function createRun(overrides: Partial<Run> = {}): Run {
  return {
    id: 'run_abc123',
    object: 'thread.run',
    created_at: 1717000000,
    thread_id: 'thread_abc123',
    assistant_id: 'asst_abc123',
    status: 'queued',
    required_action: null,
    last_error: null,
    expires_at: 1717000600,
    started_at: null,
    cancelled_at: null,
    failed_at: null,
    completed_at: null,
    model: 'gpt-4o',
    instructions: 'You are a helpful assistant.',
    tools: [],
    metadata: {},
    usage: null,
    ...overrides,
  };
}

export function createCompletedRun(overrides: Partial<Run> = {}): Run {
  return createRun({
    status: 'completed',
    started_at: 1717000001,
    completed_at: 1717000005,
    expires_at: null,
    usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 },
    ...overrides,
  });
}

export function createToolCall(overrides: Partial<RunToolCall> = {}): RunToolCall {
  return {
    id: 'call_abc123',
    type: 'function',
    function: {
      name: 'get_weather',
      arguments: '{"city":"Paris"}',
    },
    ...overrides,
  };
}

export function createRequiresActionRun(toolCalls: RunToolCall[] = [createToolCall()]): Run {
  return createRun({
    status: 'requires_action',
    started_at: 1717000001,
    required_action: {
      type: 'submit_tool_outputs',
      submit_tool_outputs: { tool_calls: toolCalls },
    },
  });
}

export function createRunList(runs: Run[] = [createRun()]): RunListResponse {
  return {
    object: 'list',
    data: runs,
    first_id: runs[0]?.id,
    last_id: runs[runs.length - 1]?.id,
    has_more: false,
  };
}

export function createRunStep(overrides: Partial<RunStep> = {}): RunStep {
  return {
    id: 'step_abc123',
    object: 'thread.run.step',
    created_at: 1717000002,
    assistant_id: 'asst_abc123',
    thread_id: 'thread_abc123',
    run_id: 'run_abc123',
    type: 'message_creation',
    status: 'completed',
    step_details: {
      type: 'message_creation',
      message_creation: { message_id: 'msg_abc123' },
    },
    last_error: null,
    expired_at: null,
    cancelled_at: null,
    failed_at: null,
    completed_at: 1717000004,
    metadata: null,
    usage: null,
    ...overrides,
  };
}
