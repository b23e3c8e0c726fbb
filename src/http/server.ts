/**
 * HTTP surface of the gate.
 *
 * `POST /mcp/tools?tool=<name>&namespace=<ns>` runs one tool call through the
 * security gate. Arguments come from an optional JSON object body plus the
 * `namespace` and `name` query parameters; query values win.
 */

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import { z } from 'zod';

import {
  AUTHENTICATION_FAILED,
  AuthFailedError,
  AuthzDeniedError,
  ExecutionError,
} from '../gate/errors.js';
import type { SecurityGate } from '../gate/orchestrator.js';
import type { Logger } from '../logging/logger.js';

export type HttpServerOptions = Readonly<{
  gate: SecurityGate;
  logger: Logger;
  now?: () => Date;
}>;

const ToolQuery = z.object({
  tool: z.string().optional(),
  namespace: z.string().optional(),
  name: z.string().optional(),
});

type ToolQuery = z.infer<typeof ToolQuery>;

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const argumentsFromQuery = (query: ToolQuery): Record<string, unknown> => {
  const args: Record<string, unknown> = {};
  if (query.namespace) args.namespace = query.namespace;
  if (query.name) args.name = query.name;
  return args;
};

const sendGateError = (reply: FastifyReply, error: unknown, logger: Logger): FastifyReply => {
  if (error instanceof AuthFailedError) {
    return reply.code(401).send({ error: AUTHENTICATION_FAILED });
  }
  if (error instanceof AuthzDeniedError) {
    return reply
      .code(403)
      .send({ error: 'access denied', permission: error.permission, namespace: error.namespace });
  }
  if (error instanceof ExecutionError) {
    return reply.code(500).send({ error: error.message });
  }
  logger.error({ err: error }, 'Unexpected error while handling tool call');
  return reply.code(500).send({ error: 'internal error' });
};

export const createHttpServer = (options: HttpServerOptions): FastifyInstance => {
  const { gate, logger } = options;
  const now = options.now ?? (() => new Date());
  const app = Fastify({ logger: false });

  app.get('/health', async () => ({ status: 'ok', timestamp: now().toISOString() }));

  app.post('/mcp/tools', async (request, reply) => {
    const query = ToolQuery.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'invalid query parameters' });
    }
    const tool = query.data.tool?.trim();
    if (!tool) {
      return reply.code(400).send({ error: 'missing tool parameter' });
    }

    const body: unknown = request.body;
    if (body !== undefined && body !== null && !isJsonObject(body)) {
      return reply.code(400).send({ error: 'request body must be a JSON object' });
    }
    const bodyArgs: Record<string, unknown> = isJsonObject(body) ? body : {};
    // the namespace authorized must be the one the tool receives
    if (bodyArgs.namespace !== undefined && typeof bodyArgs.namespace !== 'string') {
      return reply.code(400).send({ error: 'namespace must be a string' });
    }

    // cancel the tool when the client goes away before the reply is written
    const controller = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    try {
      const response = await gate.handleToolCall({
        headers: request.headers,
        tool,
        args: { ...bodyArgs, ...argumentsFromQuery(query.data) },
        signal: controller.signal,
        remoteAddress: request.ip,
        userAgent: request.headers['user-agent'],
      });
      return reply.send({ success: true, message: response.message, result: response.data ?? null });
    } catch (error) {
      return sendGateError(reply, error, logger);
    }
  });

  return app;
};
