import { vi, type Mock } from 'vitest';
import type { HttpTransport } from '../transport/http-transport.js';
import type { HttpRequest, StreamChunk } from '../types/common.js';

export interface MockHttpTransport extends HttpTransport {
  requestMock: Mock<[HttpRequest], Promise<unknown>>;
  streamMock: Mock<[HttpRequest], AsyncIterable<StreamChunk<unknown>>>;
}

export function createMockHttpTransport(): MockHttpTransport {
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

export function mockHttpTransportStream(
  transport: MockHttpTransport,
  chunks: StreamChunk<unknown>[],
  failWith?: Error
): void {
  transport.streamMock.mockImplementation(async function* () {
    for (const chunk of chunks) {
      yield chunk;
    }
    if (failWith) throw failWith;
  });
}
