import { StreamError } from '../../errors/categories.js';
import type { Run, RunStep } from './types.js';

export const RUN_EVENTS = [
  'thread.run.created',
  'thread.run.queued',
  'thread.run.in_progress',
  'thread.run.requires_action',
  'thread.run.completed',
  'thread.run.incomplete',
  'thread.run.failed',
  'thread.run.cancelling',
  'thread.run.cancelled',
  'thread.run.expired',
] as const;

export type RunEventName = (typeof RUN_EVENTS)[number];

/**
 * One server-sent event from a streamed run. Besides run snapshots the
 * stream carries step, message and delta events; their payloads are passed
 * through as parsed JSON.
 */
export interface RunStreamEvent {
  event: string;
  data: unknown;
}

export interface RunLifecycleEvent extends RunStreamEvent {
  event: RunEventName;
  data: Run;
}

export interface RunStepEvent extends RunStreamEvent {
  data: RunStep;
}

function isObjectOfKind(data: unknown, kind: string): boolean {
  return typeof data === 'object' && data !== null && 'object' in data && data.object === kind;
}

export function isRunEvent(event: RunStreamEvent): event is RunLifecycleEvent {
  return RUN_EVENTS.some((name) => name === event.event) && isObjectOfKind(event.data, 'thread.run');
}

export function isRunStepEvent(event: RunStreamEvent): event is RunStepEvent {
  return event.event.startsWith('thread.run.step.') && isObjectOfKind(event.data, 'thread.run.step');
}

function errorMessage(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return 'Run stream reported an error';
}

/**
 * Drains a run stream and returns the last run snapshot it carried, which
 * holds the run's final status.
 */
export async function finalRun(events: AsyncIterable<RunStreamEvent>): Promise<Run> {
  let last: Run | undefined;

  for await (const event of events) {
    if (event.event === 'error') {
      throw new StreamError(errorMessage(event.data));
    }
    if (isRunEvent(event)) {
      last = event.data;
    }
  }

  if (!last) {
    throw new StreamError('Run stream ended without a run event');
  }
  return last;
}
