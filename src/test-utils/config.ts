import { AssistantConfig, buildAssistantConfig } from '../config/assistant.config';

/** Config for unit tests: no back-off delays, placeholder keys. */
export function testConfig(env: Record<string, string> = {}): AssistantConfig {
  return buildAssistantConfig({
    OPENAI_API_KEY: 'test-secret',
    TAVILY_API_KEY: 'test-secret',
    SEARCH_RETRY_DELAY_MS: '0',
    FETCH_RETRY_DELAY_MS: '0',
    WORKER_POOL_SIZE: '4',
    ...env,
  });
}
