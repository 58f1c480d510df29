import { vi, type Mock } from 'vitest';
import type { ResilienceOrchestrator } from '../resilience/orchestrator.js';
import type { HttpRequest, StreamChunk } from '../types/common.js';

export interface MockResilienceOrchestrator extends ResilienceOrchestrator {
  requestMock: Mock<[HttpRequest], Promise<unknown>>;
  streamMock: Mock<[HttpRequest], AsyncIterable<StreamChunk<unknown>>>;
}

export function createMockResilienceOrchestrator(): MockResilienceOrchestrator {
  const requestMock = vi.fn<[HttpRequest], Promise<unknown>>();
  const streamMock = vi.fn<[HttpRequest], AsyncIterable<StreamChunk<unknown>>>();

  return {
    requestMock,
    streamMock,
    request<T>(request: HttpRequest): Promise<T> {
      return requestMock(request) as Promise<T>;
    },
    stream<T>(request: HttpRequest): AsyncIterable<StreamChunk<T>> {
      return streamMock(request) as AsyncIterable<StreamChunk<T>>;
    },
  };
}

export function mockResilienceOrchestratorResponse(
  orchestrator: MockResilienceOrchestrator,
  response: unknown
): void {
  orchestrator.requestMock.mockResolvedValue(response);
}

export function mockResilienceOrchestratorError(
  orchestrator: MockResilienceOrchestrator,
  error: Error
): void {
  orchestrator.requestMock.mockRejectedValue(error);
}

export function mockResilienceOrchestratorStream(
  orchestrator: MockResilienceOrchestrator,
  chunks: StreamChunk<unknown>[]
): void {
  orchestrator.streamMock.mockImplementation(async function* () {
    for (const chunk of chunks) {
      yield chunk;
    }
  });
}
