export { AGENT_PROMPTS } from './prompts.js';
export { ModelAgentRunner, renderTranscript, EMPTY_TRANSCRIPT } from './model-agent.js';
export type { ModelAgentOptions } from './model-agent.js';
