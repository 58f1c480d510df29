import type { AssistantsClient } from './index.js';
import type { AssistantsConfig } from './config.js';
import { AssistantsClientImpl, type ClientDependencies } from './client-impl.js';
import { validateConfig, configFromEnv } from './config.js';

export function createClient(config: AssistantsConfig, dependencies?: ClientDependencies): AssistantsClient {
  validateConfig(config);
  return new AssistantsClientImpl(config, dependencies);
}

export function createClientFromEnv(dependencies?: ClientDependencies): AssistantsClient {
  return createClient(configFromEnv(), dependencies);
}
