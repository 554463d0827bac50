// packages/core/src/agents -- Agent runner layer

export { createAgentConfig, createTopic } from './agent-config.js';
export type { AgentConfigInput, DebateTopicInput } from './agent-config.js';
export { knownModelNames, resolveModelId } from './model-ids.js';
export { failedResponse, succeededResponse } from './responses.js';
export { buildFilteredEnv, runProcess } from './process.js';
export type { ProcessResult, ProgressCallbacks, RunProcessOptions } from './process.js';
export { PROVIDER_SPECS, claudeSpec, geminiSpec, stripCredentialNoise } from './providers.js';
export type { ProviderSpec } from './providers.js';
export { CliAgent, createAgent } from './cli-agent.js';
export type { Agent, CliAgentOptions } from './cli-agent.js';
export { AgentRunner } from './runner.js';
export type { AgentExecutor, AgentRunnerOptions } from './runner.js';
export { clearDetectionCache, detectAgentCli } from './detector.js';
export type { CliDetectionResult } from './detector.js';
