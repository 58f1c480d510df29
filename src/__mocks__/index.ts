export {
  createMockHttpTransport,
  mockHttpTransportStream,
} from './http-transport.mock.js';

export type { MockHttpTransport } from './http-transport.mock.js';

export {
  createMockResilienceOrchestrator,
  mockResilienceOrchestratorError,
  mockResilienceOrchestratorResponse,
  mockResilienceOrchestratorStream,
} from './resilience.mock.js';

export type { MockResilienceOrchestrator } from './resilience.mock.js';

export { createMockLogger } from './logger.mock.js';

export type { MockLogger } from './logger.mock.js';
