export { ShellAgent, type AgentState, type ExecutionEvent, type ShellAgentOptions } from './agent/shell-agent.js';
export { AdmissionPipeline, type PipelineTerminal } from './admission/pipeline.js';
export { CommandPolicy, analyzeShellCommand, type CommandAnalysis } from './admission/policy.js';
export * from './admission/types.js';
export { loadConfig, ConfigError, type ShellgateConfig } from './config/index.js';
export { IpcClient, type RetryOptions } from './ipc/client.js';
export { IpcServer, type IpcRequestHandler } from './ipc/server.js';
export { ChannelClosedError, ConnectionRefusedError, ProtocolError } from './ipc/errors.js';
export { createLogger, createSilentLogger, type Logger } from './logging/logger.js';
export { TerminalSession, SpawnError, TerminalClosedError } from './terminal/session.js';
export { ConfirmationBroker } from './ui/providers/confirmation-broker.js';
