export { convertSDKError } from './error-converter.js';
export { toChatMessages } from './history.js';
export { calculateCost } from './cost.js';
export { callWithResilience, RETRYABLE_AGENT_ERRORS, type AgentCallOptions } from './api-call.js';
