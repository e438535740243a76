export { McpDispatcher, type DispatcherOptions, type ToolCallResult } from './dispatcher';
export { SessionRegistry, type Session, type SendFn } from './sessions';
export { REMOTE_TOOL_NAMES, listRemoteTools, type RemoteToolDefinition, type RemoteToolName } from './tools';
export * from './protocol';
