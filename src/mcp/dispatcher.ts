/**
 * JSON-RPC method dispatch for the remote tool server.
 *
 * Pipeline failures never escape: they become `isError` tool results so the
 * client sees the message and the session stays usable. Protocol problems
 * (unknown method, unknown tool, malformed params) become JSON-RPC errors.
 */
import { z } from 'zod';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { Pipelines } from '../pipelines';
import {
  DEFAULT_PROTOCOL_VERSION,
  ERROR_CODES,
  JsonRpcError,
  failure,
  success,
  type JsonRpcMessage,
  type JsonRpcResponse,
} from './protocol';
import { getRemoteTool, isRemoteToolName, listRemoteTools } from './tools';

export interface ToolCallResult {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

export interface DispatcherOptions {
  pipelines: Pipelines;
  logger: Logger;
  serverName?: string;
  serverVersion?: string;
}

const initializeParams = z.object({
  protocolVersion: z.string().optional(),
});

const callToolParams = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).optional(),
});

export class McpDispatcher {
  private readonly pipelines: Pipelines;
  private readonly logger: Logger;
  private readonly serverName: string;
  private readonly serverVersion: string;

  constructor({ pipelines, logger, serverName = 'marketing-crew', serverVersion = '1.0.0' }: DispatcherOptions) {
    this.pipelines = pipelines;
    this.logger = logger.child({ component: 'mcp' });
    this.serverName = serverName;
    this.serverVersion = serverVersion;
  }

  /**
   * Handle one message. Returns undefined for notifications.
   */
  async handle(message: JsonRpcMessage): Promise<JsonRpcResponse | undefined> {
    if (message.id === undefined) {
      this.logger.debug({ method: message.method }, 'Notification received');
      return undefined;
    }

    try {
      const result = await this.dispatch(message.method, message.params ?? {});
      return success(message.id, result);
    } catch (error) {
      if (error instanceof JsonRpcError) {
        this.logger.warn({ method: message.method, code: error.code, error: error.message }, 'Request rejected');
        return failure(message.id, error.code, error.message);
      }
      this.logger.error({ method: message.method, error: errorMessage(error) }, 'Request failed');
      return failure(message.id, ERROR_CODES.INTERNAL_ERROR, errorMessage(error));
    }
  }

  private async dispatch(method: string, params: Record<string, unknown>): Promise<unknown> {
    switch (method) {
      case 'initialize': {
        const parsed = initializeParams.safeParse(params);
        const requested = parsed.success ? parsed.data.protocolVersion : undefined;
        return {
          protocolVersion: requested ?? DEFAULT_PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo: { name: this.serverName, version: this.serverVersion },
        };
      }
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: listRemoteTools() };
      case 'tools/call':
        return this.callTool(params);
      default:
        throw new JsonRpcError(ERROR_CODES.METHOD_NOT_FOUND, `Method not found: ${method}`);
    }
  }

  private async callTool(params: Record<string, unknown>): Promise<ToolCallResult> {
    const parsed = callToolParams.safeParse(params);
    if (!parsed.success) {
      throw new JsonRpcError(ERROR_CODES.INVALID_PARAMS, 'tools/call requires a tool name');
    }

    const { name } = parsed.data;
    if (!isRemoteToolName(name)) {
      throw new JsonRpcError(ERROR_CODES.INVALID_PARAMS, `Unknown tool: ${name}`);
    }

    const tool = getRemoteTool(name);
    this.logger.info({ tool: name }, 'Tool call started');
    try {
      const result = await tool.run(this.pipelines, parsed.data.arguments ?? {});
      this.logger.info({ tool: name, durationMs: result.durationMs }, 'Tool call finished');
      return { content: [{ type: 'text', text: `# ${tool.heading}\n\n${result.output}` }] };
    } catch (error) {
      this.logger.error({ tool: name, error: errorMessage(error) }, 'Tool call failed');
      return { content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }], isError: true };
    }
  }
}
