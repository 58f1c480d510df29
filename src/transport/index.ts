export type { HttpTransport, HttpRequest } from './http-transport.js';
export { FetchHttpTransport } from './http-transport.js';
export { RequestBuilder } from './request-builder.js';
export { parseSSEStream, type SSEMessage } from './sse.js';
