// This module interprets JSON-RPC methods, runs tool handlers, and routes responses to session queues.

import { randomUUID } from 'node:crypto';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import {
  JSON_RPC_INVALID_PARAMS,
  JSON_RPC_METHOD_NOT_FOUND,
  type CallToolResult,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse
} from '../types/mcp.js';
import { errorMessage } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { JSON_RPC_VERSION, MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import type { SessionDirectory } from './session-directory.js';
import type { ToolRegistry } from './tool-registry.js';

export interface DispatcherDeps {
  registry: ToolRegistry;
  sessions: SessionDirectory;
  logger: FastifyBaseLogger;
}

// This type reports how one response left the dispatcher, mainly for logs and tests.
export type DeliveryOutcome = 'delivered' | 'session_not_found' | 'queue_full' | 'queue_closed' | 'serialization_failed';

// This schema validates tools/call params before any handler lookup happens.
const callToolParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).nullable().optional()
});

function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: JSON_RPC_VERSION,
    id,
    result
  };
}

// This helper creates a canonical JSON-RPC error payload.
function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: JSON_RPC_VERSION,
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

// This helper turns a failed handler into an in-band tool failure rather than a protocol fault.
export function toolErrorResult(error: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: errorMessage(error) }],
    isError: true
  };
}

function isNotification(method: string): boolean {
  return method.startsWith('notifications/');
}

export class Dispatcher {
  private readonly registry: ToolRegistry;
  private readonly sessions: SessionDirectory;
  private readonly logger: FastifyBaseLogger;
  private readonly inFlight = new Set<Promise<void>>();

  public constructor(deps: DispatcherDeps) {
    this.registry = deps.registry;
    this.sessions = deps.sessions;
    this.logger = deps.logger.child({
      component: 'mcp_dispatcher'
    });
  }

  public get pending(): number {
    return this.inFlight.size;
  }

  // This method handles one JSON-RPC request and returns either a response or null for notifications.
  public async handle(request: JsonRpcRequest, logger: FastifyBaseLogger = this.logger): Promise<JsonRpcResponse | null> {
    const requestId = request.id ?? null;
    const startedAt = Date.now();
    const rpcTraceId = randomUUID();

    logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method
      },
      'mcp_rpc_request_received'
    );

    try {
      switch (request.method) {
        case 'initialize':
          return rpcResult(requestId, {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: {
              tools: {
                listChanged: false
              }
            },
            serverInfo: {
              name: MCP_SERVER_NAME,
              version: MCP_SERVER_VERSION
            }
          });

        case 'ping':
          return rpcResult(requestId, {});

        case 'tools/list':
          return rpcResult(requestId, {
            tools: this.registry.list()
          });

        case 'tools/call':
          return await this.callTool(requestId, request.params, rpcTraceId, logger);

        default:
          if (isNotification(request.method)) {
            logger.debug(
              {
                event: 'mcp_notification_received',
                rpcTraceId,
                method: request.method
              },
              'mcp_notification_received'
            );
            return null;
          }

          return rpcError(requestId, JSON_RPC_METHOD_NOT_FOUND, `Method not found: ${request.method}`);
      }
    } finally {
      logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: request.method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  // This method validates tools/call params, resolves the handler, and wraps handler failures in-band.
  private async callTool(
    requestId: JsonRpcId,
    params: unknown,
    rpcTraceId: string,
    logger: FastifyBaseLogger
  ): Promise<JsonRpcResponse> {
    const parsed = callToolParamsSchema.safeParse(params);
    if (!parsed.success) {
      logger.warn(
        {
          event: 'mcp_tool_call_invalid_params',
          rpcTraceId,
          rpcRequestId: requestId,
          params: sanitizeForLog(params)
        },
        'mcp_tool_call_invalid_params'
      );
      return rpcError(requestId, JSON_RPC_INVALID_PARAMS, 'Invalid params', parsed.error.flatten());
    }

    const { name } = parsed.data;
    const args = parsed.data.arguments ?? {};
    const entry = this.registry.get(name);
    if (!entry) {
      logger.warn(
        {
          event: 'mcp_tool_not_found',
          rpcTraceId,
          rpcRequestId: requestId,
          toolName: name
        },
        'mcp_tool_not_found'
      );
      return rpcError(requestId, JSON_RPC_METHOD_NOT_FOUND, `Unknown tool: ${name}`);
    }

    const startedAt = Date.now();
    logger.info(
      {
        event: 'mcp_tool_execution_started',
        rpcTraceId,
        rpcRequestId: requestId,
        toolName: name,
        arguments: sanitizeForLog(args)
      },
      'mcp_tool_execution_started'
    );

    try {
      const result = await entry.handler(args);
      logger.info(
        {
          event: 'mcp_tool_execution_completed',
          rpcTraceId,
          toolName: name,
          isError: result.isError === true,
          contentBlocks: result.content.length,
          durationMs: Date.now() - startedAt
        },
        'mcp_tool_execution_completed'
      );
      return rpcResult(requestId, result);
    } catch (error) {
      logger.warn(
        {
          event: 'mcp_tool_execution_failed',
          rpcTraceId,
          toolName: name,
          durationMs: Date.now() - startedAt,
          error: errorForLog(error)
        },
        'mcp_tool_execution_failed'
      );
      return rpcResult(requestId, toolErrorResult(error));
    }
  }

  // This method serializes a response and pushes it onto the session queue looked up at delivery time.
  public deliver(sessionId: string, response: JsonRpcResponse, logger: FastifyBaseLogger = this.logger): DeliveryOutcome {
    const session = this.sessions.lookup(sessionId);
    if (!session) {
      logger.info(
        {
          event: 'mcp_response_dropped_session_gone',
          rpcRequestId: response.id
        },
        'mcp_response_dropped_session_gone'
      );
      return 'session_not_found';
    }

    let serialized: string;
    try {
      serialized = JSON.stringify(response);
    } catch (error) {
      logger.error(
        {
          event: 'mcp_response_serialization_failed',
          rpcRequestId: response.id,
          error: errorForLog(error)
        },
        'mcp_response_serialization_failed'
      );
      return 'serialization_failed';
    }

    const outcome = session.queue.push(serialized);
    if (outcome === 'full') {
      logger.warn(
        {
          event: 'mcp_session_queue_overflow',
          rpcRequestId: response.id,
          capacity: session.queue.capacity
        },
        'mcp_session_queue_overflow'
      );
      return 'queue_full';
    }

    if (outcome === 'closed') {
      logger.info(
        {
          event: 'mcp_response_dropped_queue_closed',
          rpcRequestId: response.id
        },
        'mcp_response_dropped_queue_closed'
      );
      return 'queue_closed';
    }

    return 'delivered';
  }

  // This method spawns one dispatch task; the returned promise never rejects and settles once delivery was attempted.
  public submit(sessionId: string, request: JsonRpcRequest): Promise<void> {
    const logger = this.logger.child({
      sessionId
    });

    const task = this.run(sessionId, request, logger);
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
    });

    return task;
  }

  private async run(sessionId: string, request: JsonRpcRequest, logger: FastifyBaseLogger): Promise<void> {
    try {
      // The POST acknowledgement is written before any protocol work starts.
      await yieldToEventLoop();

      const response = await this.handle(request, logger);
      if (response) {
        this.deliver(sessionId, response, logger);
      }
    } catch (error) {
      logger.error(
        {
          event: 'mcp_dispatch_task_failed',
          method: request.method,
          rpcRequestId: request.id ?? null,
          error: errorForLog(error)
        },
        'mcp_dispatch_task_failed'
      );
    }
  }

  // This method waits for every in-flight dispatch task, used during graceful shutdown.
  public async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }
}
