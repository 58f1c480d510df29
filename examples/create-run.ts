/**
 * Starts a run that must answer in a fixed JSON shape, follows it over the
 * event stream and answers any function calls along the way.
 *
 *   OPENAI_API_KEY=... THREAD_ID=thread_... ASSISTANT_ID=asst_... npx tsx examples/create-run.ts
 */
import {
  createClientFromEnv,
  CreateRunRequest,
  finalRun,
  functionTool,
  isRunEvent,
  userMessage,
  type Run,
  type RunToolOutput,
} from '../src/index.js';

const threadId = process.env.THREAD_ID ?? '';
const assistantId = process.env.ASSISTANT_ID ?? '';

const client = createClientFromEnv();

const request = new CreateRunRequest(assistantId, {
  additionalMessages: [userMessage('What should I wear in Paris today?')],
  tools: [
    functionTool('get_weather', {
      description: 'Current weather for a city',
      parameters: {
        type: 'object',
        properties: { city: { type: 'string' } },
        required: ['city'],
      },
    }),
  ],
  jsonSchema: {
    name: 'outfit',
    schema: {
      type: 'object',
      properties: { top: { type: 'string' }, bottom: { type: 'string' } },
      required: ['top', 'bottom'],
      additionalProperties: false,
    },
  },
});

function answer(run: Run): RunToolOutput[] {
  const calls = run.required_action?.submit_tool_outputs.tool_calls ?? [];
  return calls.map((call) => ({
    tool_call_id: call.id,
    output: JSON.stringify({ arguments: call.function.arguments, celsius: 18, sky: 'sunny' }),
  }));
}

let run = await finalRun(client.runs.stream(threadId, request));

while (run.status === 'requires_action') {
  for await (const event of client.runs.submitToolOutputsStream(threadId, run.id, { tool_outputs: answer(run) })) {
    if (isRunEvent(event)) {
      run = event.data;
      console.log(`${event.event}: ${run.status}`);
    }
  }
}

console.log(`Run ${run.id} finished as ${run.status}`);
await client.flushTelemetry();
