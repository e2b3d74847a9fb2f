export { WorkspaceAgent, abortable } from './agent/loop.js';
export type { AgentRunResult, WorkspaceAgentOptions } from './agent/loop.js';
export * from './config/index.js';
export * from './errors.js';
export * from './llm/index.js';
export { CredentialManager } from './llm/auth/credential-manager.js';
export { parseConversation, serializeConversation } from './llm/messages.js';
export { createLogger, setLogLevel } from './logging.js';
export type { LogLevelName } from './logging.js';
export * from './server/index.js';
export * from './tools/index.js';
export { McpToolProvider, connectMcpServer } from './tools/mcp.js';
export type { McpServerDefinition, McpSession } from './tools/mcp.js';
