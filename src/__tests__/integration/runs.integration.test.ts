import { describe, it, expect, beforeEach } from 'vitest';
import { createClient } from '../../client/factory.js';
import type { AssistantsClient } from '../../client/index.js';
import {
  CreateRunRequest,
  ResponseFormat,
  TruncationStrategies,
  finalRun,
  functionTool,
  userMessage,
} from '../../services/runs/index.js';
import { AuthenticationError } from '../../errors/categories.js';
import { createCompletedRun, createRequiresActionRun, createRun } from '../../__fixtures__/index.js';
import {
  captured,
  mockRateLimitOnce,
  mockRunStream,
  mockToolOutputs,
  mockUnauthorizedError,
} from './setup.js';

describe('Runs Integration Tests', () => {
  let client: AssistantsClient;

  beforeEach(() => {
    client = createClient({
      apiKey: 'test-secret',
      organizationId: 'org-test',
      projectId: 'proj-test',
      maxRetries: 2,
      retryDelay: 1,
    });
  });

  describe('create', () => {
    it('should send an authenticated snake_case body', async () => {
      const request = new CreateRunRequest('asst_1', {
        additionalMessages: [userMessage('What is the weather in Paris?')],
        tools: [functionTool('get_weather', { parameters: { type: 'object' } })],
        toolChoice: 'weather',
        truncationStrategy: TruncationStrategies.lastMessages(5),
        responseFormat: ResponseFormat.Json,
      });

      const run = await client.runs.create('thread_1', request);

      expect(run.thread_id).toBe('thread_1');
      expect(captured).toHaveLength(1);
      const [sent] = captured;
      expect(sent?.url).toBe('https://api.openai.com/v1/threads/thread_1/runs');
      expect(sent?.headers.get('authorization')).toBe('Bearer test-secret');
      expect(sent?.headers.get('openai-organization')).toBe('org-test');
      expect(sent?.headers.get('openai-project')).toBe('proj-test');
      expect(sent?.headers.get('openai-beta')).toBe('assistants=v2');
      expect(sent?.body).toEqual({
        assistant_id: 'asst_1',
        additional_messages: [{ role: 'user', content: 'What is the weather in Paris?' }],
        tools: [{ type: 'function', function: { name: 'get_weather', parameters: { type: 'object' } } }],
        truncation_strategy: { type: 'last_messages', last_messages: 5 },
        tool_choice: { type: 'function', function: { name: 'get_weather' } },
        response_format: { type: 'json_object' },
      });
    });

    it('should retry after a rate limit', async () => {
      mockRateLimitOnce();

      const run = await client.runs.create('thread_1', new CreateRunRequest('asst_1'));

      expect(run.status).toBe('queued');
      expect(captured).toHaveLength(1);
    });

    it('should surface authentication failures', async () => {
      mockUnauthorizedError();

      await expect(client.runs.create('thread_1', new CreateRunRequest('asst_1'))).rejects.toBeInstanceOf(
        AuthenticationError
      );
    });
  });

  describe('stream', () => {
    it('should follow a streamed run to its final state', async () => {
      const completed = createCompletedRun({ id: 'run_streamed' });
      mockRunStream(completed);

      const run = await finalRun(client.runs.stream('thread_1', new CreateRunRequest('asst_1')));

      expect(run).toEqual(completed);
      expect(captured[0]?.body).toEqual({ assistant_id: 'asst_1', stream: true });
      expect(captured[0]?.headers.get('accept')).toBe('text/event-stream');
    });

    it('should yield step events alongside run events', async () => {
      mockRunStream();

      const names: string[] = [];
      for await (const event of client.runs.stream('thread_1', new CreateRunRequest('asst_1'))) {
        names.push(event.event);
      }

      expect(names).toEqual([
        'thread.run.created',
        'thread.run.in_progress',
        'thread.run.step.completed',
        'thread.run.completed',
      ]);
    });
  });

  describe('tool outputs', () => {
    it('should answer a run that requires action', async () => {
      const pending = createRequiresActionRun();
      mockToolOutputs(createRun({ status: 'in_progress' }));

      const callId = pending.required_action?.submit_tool_outputs.tool_calls[0]?.id ?? '';
      const run = await client.runs.submitToolOutputs('thread_1', pending.id, {
        tool_outputs: [{ tool_call_id: callId, output: '18C and sunny' }],
      });

      expect(run.status).toBe('in_progress');
      expect(captured[0]?.url).toBe('https://api.openai.com/v1/threads/thread_1/runs/run_abc123/submit_tool_outputs');
      expect(captured[0]?.body).toEqual({
        tool_outputs: [{ tool_call_id: 'call_abc123', output: '18C and sunny' }],
        stream: false,
      });
    });
  });

  describe('list', () => {
    it('should pass pagination in the query string', async () => {
      const list = await client.runs.list('thread_1', { limit: 2, order: 'asc' });

      expect(list.data).toHaveLength(1);
      expect(captured[0]?.url).toBe('https://api.openai.com/v1/threads/thread_1/runs?limit=2&order=asc');
    });
  });
});
