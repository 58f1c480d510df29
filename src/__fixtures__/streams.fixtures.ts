import type { Run } from '../services/runs/types.js';
import { createCompletedRun, createRun, createRunStep } from './runs.fixtures.js';

export interface SSEEvent {
  event?: string;
  data: string;
}

export function formatSSEEvent(event: SSEEvent): string {
  let result = '';
  if (event.event) {
    result += `event: ${event.event}\n`;
  }
  result += `data: ${event.data}\n\n`;
  return result;
}

export function createSSEStream(events: SSEEvent[]): string {
  return events.map(formatSSEEvent).join('');
}

/** A streamed run from creation to completion, terminated by `[DONE]`. */
export function createRunStreamSSE(final: Run = createCompletedRun()): string {
  const base = { id: final.id, thread_id: final.thread_id, assistant_id: final.assistant_id };
  return createSSEStream([
    { event: 'thread.run.created', data: JSON.stringify(createRun({ ...base, status: 'queued' })) },
    { event: 'thread.run.in_progress', data: JSON.stringify(createRun({ ...base, status: 'in_progress' })) },
    { event: 'thread.run.step.completed', data: JSON.stringify(createRunStep({ run_id: final.id })) },
    { event: `thread.run.${final.status}`, data: JSON.stringify(final) },
    { event: 'done', data: '[DONE]' },
  ]);
}

/** Wraps text in a byte stream, cut into pieces of `chunkSize` characters. */
export function toReadableStream(text: string, chunkSize = text.length): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const size = Math.max(1, chunkSize);
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (let offset = 0; offset < text.length; offset += size) {
        controller.enqueue(encoder.encode(text.slice(offset, offset + size)));
      }
      controller.close();
    },
  });
}
