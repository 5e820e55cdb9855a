// This module implements the two-channel MCP transport: one SSE stream per session plus a POST submission path.

import { once } from 'node:events';
import type { ServerResponse } from 'node:http';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppError, errorMessage } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import type { Dispatcher } from './dispatcher.js';
import type { Session, SessionDirectory } from './session-directory.js';

export const SSE_PATH = '/sse';
export const MESSAGE_PATH = '/message';

export interface McpRouteDeps {
  sessions: SessionDirectory;
  dispatcher: Dispatcher;
  keepAliveMs: number;
}

interface MessageRoute {
  Querystring: {
    sessionId?: string | string[];
  };
}

const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'Access-Control-Allow-Origin': '*'
} as const;

// This schema accepts one JSON-RPC request object; batches and non-2.0 envelopes are rejected.
const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional()
});

// This helper formats one SSE event and prefixes every data line as the wire format requires.
export function formatSseEvent(event: string, data: string): string {
  const dataLines = data
    .split(/\r?\n/)
    .map((line) => `data: ${line}`)
    .join('\n');
  return `event: ${event}\n${dataLines}\n\n`;
}

export function buildEndpointPath(sessionId: string): string {
  return `${MESSAGE_PATH}?sessionId=${encodeURIComponent(sessionId)}`;
}

// This helper reads one non-empty sessionId query value; repeated parameters count as malformed.
function readSessionId(request: FastifyRequest<MessageRoute>): string {
  const value = request.query.sessionId;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new AppError(400, 'missing_session_id', 'Missing sessionId query parameter.');
  }

  return value;
}

// This helper waits for socket backpressure to clear, returning early when the stream is cancelled.
async function waitForDrain(raw: ServerResponse, signal: AbortSignal): Promise<void> {
  try {
    await once(raw, 'drain', { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

// This helper writes one SSE comment unless the socket is gone or still draining earlier writes.
export function writeKeepAlive(raw: Pick<ServerResponse, 'destroyed' | 'writableNeedDrain' | 'write'>): boolean {
  if (raw.destroyed || raw.writableNeedDrain) {
    return false;
  }

  raw.write(': ping\n\n');
  return true;
}

// This function forwards queued messages as SSE events until the queue closes or the client goes away.
async function pumpSession(session: Session, raw: ServerResponse, signal: AbortSignal): Promise<number> {
  let forwarded = 0;

  while (!signal.aborted) {
    const message = await session.queue.next(signal);
    if (message === null) {
      break;
    }

    forwarded += 1;
    if (!raw.write(formatSseEvent('message', message))) {
      await waitForDrain(raw, signal);
    }
  }

  return forwarded;
}

// This function serves one SSE connection for its whole lifetime and deregisters the session afterwards.
async function serveSseSession(
  request: FastifyRequest,
  reply: FastifyReply,
  deps: McpRouteDeps
): Promise<void> {
  reply.hijack();
  const raw = reply.raw;
  const session = deps.sessions.create();
  const abortController = new AbortController();
  const log: FastifyBaseLogger = request.log.child({
    component: 'mcp_sse',
    sessionId: session.id
  });

  const cancel = (): void => {
    abortController.abort();
  };

  raw.on('close', cancel);
  raw.on('error', (error) => {
    log.warn(
      {
        event: 'mcp_sse_stream_error',
        error: errorForLog(error)
      },
      'mcp_sse_stream_error'
    );
    cancel();
  });

  raw.writeHead(200, SSE_HEADERS);
  raw.flushHeaders();
  raw.write(formatSseEvent('endpoint', buildEndpointPath(session.id)));

  log.info(
    {
      event: 'mcp_sse_session_opened',
      activeSessions: deps.sessions.size
    },
    'mcp_sse_session_opened'
  );

  const keepAliveTimer =
    deps.keepAliveMs > 0
      ? setInterval(() => {
          writeKeepAlive(raw);
        }, deps.keepAliveMs)
      : null;

  let forwarded = 0;
  try {
    forwarded = await pumpSession(session, raw, abortController.signal);
  } catch (error) {
    log.error(
      {
        event: 'mcp_sse_stream_failed',
        error: errorForLog(error)
      },
      'mcp_sse_stream_failed'
    );
  } finally {
    if (keepAliveTimer) {
      clearInterval(keepAliveTimer);
    }

    raw.off('close', cancel);
    deps.sessions.remove(session.id);

    if (!raw.writableEnded) {
      raw.end();
    }

    log.info(
      {
        event: 'mcp_sse_session_closed',
        forwardedMessages: forwarded,
        clientDisconnected: abortController.signal.aborted,
        activeSessions: deps.sessions.size
      },
      'mcp_sse_session_closed'
    );
  }
}

// This helper builds one hook that rejects unsupported verbs on a transport path.
function methodNotAllowed(allowed: string) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    reply.header('Allow', allowed);
    throw new AppError(405, 'method_not_allowed', `Method ${request.method} is not allowed on ${request.url.split('?')[0]}.`);
  };
}

// This parser decodes every message body as JSON whatever content type the client declared.
function registerJsonBodyParser(scope: FastifyInstance): void {
  scope.removeAllContentTypeParsers();
  scope.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    try {
      done(null, JSON.parse(String(body)));
    } catch (error) {
      done(new AppError(400, 'invalid_json', 'Request body is not valid JSON.', { originalMessage: errorMessage(error) }), undefined);
    }
  });
}

// This function registers the SSE stream and message submission routes.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  fastify.route({
    method: 'GET',
    url: SSE_PATH,
    exposeHeadRoute: false,
    handler: async (request, reply) => {
      await serveSseSession(request, reply, deps);
    }
  });

  // Guards reject in onRequest so no body is parsed for a verb that is refused anyway.
  const rejectOnSse = methodNotAllowed('GET');
  fastify.route({
    method: ['HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    url: SSE_PATH,
    onRequest: rejectOnSse,
    handler: rejectOnSse
  });

  const rejectOnMessage = methodNotAllowed('POST');
  fastify.route({
    method: ['GET', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    url: MESSAGE_PATH,
    onRequest: rejectOnMessage,
    handler: rejectOnMessage
  });

  // The message route lives in its own encapsulated scope so its catch-all parser leaves other routes alone.
  void fastify.register(async (scope) => {
    registerJsonBodyParser(scope);

    scope.route<MessageRoute>({
      method: 'POST',
      url: MESSAGE_PATH,
      // This hook resolves the session before the body is parsed so unknown sessions never reach decoding.
      onRequest: async (request) => {
        const sessionId = readSessionId(request);
        if (!deps.sessions.lookup(sessionId)) {
          request.log.warn(
            {
              event: 'mcp_message_unknown_session',
              sessionId
            },
            'mcp_message_unknown_session'
          );
          throw new AppError(404, 'session_not_found', 'Session not found.');
        }
      },
      handler: async (request, reply) => {
        const sessionId = readSessionId(request);
        const parsed = jsonRpcRequestSchema.safeParse(request.body);
        if (!parsed.success) {
          throw new AppError(400, 'invalid_request', 'Invalid JSON-RPC request object.', parsed.error.flatten());
        }

        const rpcRequest = parsed.data;
        request.log.info(
          {
            event: 'mcp_message_accepted',
            sessionId,
            method: rpcRequest.method,
            rpcRequestId: rpcRequest.id ?? null
          },
          'mcp_message_accepted'
        );

        reply.code(202).send();
        void deps.dispatcher.submit(sessionId, rpcRequest);
      }
    });
  });
}
