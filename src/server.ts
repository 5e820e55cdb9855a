// This module wires all HTTP routes, middleware behavior, and lifecycle resources.

import Fastify, { type FastifyInstance } from 'fastify';
import { Dispatcher } from './mcp/dispatcher.js';
import { SessionDirectory } from './mcp/session-directory.js';
import type { ToolRegistry } from './mcp/tool-registry.js';
import { MESSAGE_PATH, SSE_PATH, registerMcpRoutes } from './mcp/transport.js';
import type { TransportSettings } from './types/domain.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface ServerOptions {
  registry: ToolRegistry;
  transport: TransportSettings;
  logLevel?: string;
  // Tests pass false to keep output quiet.
  logger?: boolean;
}

export interface ServerResources {
  app: FastifyInstance;
  sessions: SessionDirectory;
  dispatcher: Dispatcher;
}

// This function builds and configures the full HTTP application.
export function createServer(options: ServerOptions): ServerResources {
  const app = Fastify({
    logger: options.logger === false ? false : buildLoggerOptions(options.logLevel),
    bodyLimit: 1024 * 1024,
    // SSE streams never go idle on their own, so shutdown must cut them.
    forceCloseConnections: true
  });

  const sessions = new SessionDirectory({
    queueCapacity: options.transport.sessionQueueCapacity,
    logger: app.log
  });
  const dispatcher = new Dispatcher({
    registry: options.registry,
    sessions,
    logger: app.log
  });

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        query: sanitizeForLog(request.query ?? null)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs: reply.elapsedTime
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    return {
      ok: true,
      status: 'alive',
      ts: new Date().toISOString()
    };
  });

  app.get('/', async () => {
    return {
      ok: true,
      service: MCP_SERVER_NAME,
      sseEndpoint: SSE_PATH,
      messageEndpoint: MESSAGE_PATH
    };
  });

  // This endpoint exposes server and protocol version metadata plus the live session count.
  app.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: MCP_PROTOCOL_VERSION,
      sessions: sessions.size
    };
  });

  registerMcpRoutes(app, {
    sessions,
    dispatcher,
    keepAliveMs: options.transport.keepAliveMs
  });

  // This hook ends every open stream before the listener stops accepting connections.
  app.addHook('preClose', async () => {
    app.log.info({ event: 'mcp_sessions_closing', activeSessions: sessions.size }, 'mcp_sessions_closing');
    sessions.closeAll();
  });

  // This hook lets in-flight dispatch tasks settle so shutdown stays deterministic.
  app.addHook('onClose', async () => {
    await dispatcher.drain();
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status = normalized.statusCode;
    const logPayload = {
      event: 'http_request_failed',
      requestId: request.id,
      statusCode: status,
      code: normalized.code,
      details: sanitizeForLog(normalized.details),
      error: errorForLog(error)
    };

    if (status >= 500) {
      request.log.error(logPayload, 'http_request_failed');
    } else {
      request.log.warn(logPayload, 'http_request_failed');
    }

    reply.status(status).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    sessions,
    dispatcher
  };
}
