export {
  createRun,
  createCompletedRun,
  createRequiresActionRun,
  createToolCall,
  createRunList,
  createRunStep,
} from './runs.fixtures.js';

export {
  formatSSEEvent,
  createSSEStream,
  createRunStreamSSE,
  toReadableStream,
} from './streams.fixtures.js';

export type { SSEEvent } from './streams.fixtures.js';

export {
  createApiError,
  create400InvalidRequestError,
  create401UnauthorizedError,
  create404NotFoundError,
  create429RateLimitError,
  create500InternalServerError,
} from './errors.fixtures.js';
