// Dashboard HTTP server: page, vendored widget scripts, view and event API

import { promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import * as E from 'fp-ts/lib/Either.js';
import type { Graph, GraphError, MalformedGraphError } from '@/pure/graph';
import { createMalformedGraphError } from '@/pure/graph/errors';
import { getAttributeValues } from '@/pure/graph/graph-operations/getAttributeValues';
import { getGraphInfo } from '@/pure/graph/graph-operations/getGraphInfo';
import { parseGraphDocument } from '@/pure/graph/graph-document/parseGraphDocument';
import { formatIssue } from '@/pure/graph/graph-document/graphDocumentSchema';
import { handleDashboardEvent, type DashboardEvent, type DashboardSession } from '@/pure/session';
import { createLogger, type Logger } from '@/shell/edge/logging/logger';
import { buildDashboardView } from './dashboardView';
import { dashboardEventSchema, type DashboardEventMessage } from './dashboardEventSchema';
import { findVendorScript, type VendorScript } from './vendorScripts';

const logger: Logger = createLogger('Server');

const DEFAULT_PORT: number = 8050;
const DEFAULT_HOST: string = '127.0.0.1';

const INDEX_HTML_PATH: string = fileURLToPath(new URL('../../../../static/index.html', import.meta.url));

export interface DashboardServerOptions {
  /** Log every accepted and rejected event at debug level */
  readonly debug?: boolean;
}

/** Holds the one live session; each event swaps in the next one. */
export interface DashboardSessionStore {
  readonly get: () => DashboardSession;
  readonly set: (session: DashboardSession) => void;
}

export function createSessionStore(initial: DashboardSession): DashboardSessionStore {
  let current: DashboardSession = initial;
  return {
    get: () => current,
    set: (session: DashboardSession) => {
      current = session;
    },
  };
}

function statusFor(error: GraphError): number {
  switch (error._tag) {
    case 'UnknownNodeError':
      return 404;
    case 'InvalidParameterError':
    case 'MalformedGraphError':
      return 400;
  }
}

function toDashboardEvent(message: DashboardEventMessage): E.Either<MalformedGraphError, DashboardEvent> {
  if (message.type !== 'GraphLoaded') {
    return E.right(message);
  }
  const graph: E.Either<MalformedGraphError, Graph> = parseGraphDocument(message.document);
  if (E.isLeft(graph)) {
    return graph;
  }
  return E.right({ type: 'GraphLoaded', graph: graph.right });
}

/**
 * Creates and configures the dashboard server around a session store
 */
export function createDashboardServer(
  store: DashboardSessionStore,
  options: DashboardServerOptions = {}
): FastifyInstance {
  const server: FastifyInstance = fastify({
    logger: false,
  });

  server.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    const html: string = await fs.readFile(INDEX_HTML_PATH, 'utf-8');
    return reply.type('text/html; charset=utf-8').send(html);
  });

  server.get<{ Params: { file: string } }>('/vendor/:file', async (request, reply: FastifyReply) => {
    const vendorScript: VendorScript | undefined = findVendorScript(request.params.file);
    if (vendorScript === undefined) {
      return reply.code(404).send({ error: 'NotFound', message: `No vendored script "${request.params.file}"` });
    }
    const script: string = await fs.readFile(vendorScript.resolvePath(), 'utf-8');
    return reply.type('application/javascript; charset=utf-8').send(script);
  });

  server.get('/api/view', async () => buildDashboardView(store.get()));

  server.get<{ Params: { name: string } }>('/api/attributes/:name/values', async (request) => {
    const { name } = request.params;
    return { attribute: name, values: [...getAttributeValues(store.get().graph, name)] };
  });

  server.post('/api/events', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed: ReturnType<typeof dashboardEventSchema.safeParse> = dashboardEventSchema.safeParse(request.body);
    const event: E.Either<GraphError, DashboardEvent> = parsed.success
      ? toDashboardEvent(parsed.data)
      : E.left(createMalformedGraphError(parsed.error.issues.map(formatIssue)));

    const next: E.Either<GraphError, DashboardSession> = E.isLeft(event)
      ? event
      : handleDashboardEvent(store.get(), event.right);

    if (E.isLeft(next)) {
      if (options.debug === true) {
        logger.debug(`Rejected event: ${next.left.message}`);
      }
      return reply.code(statusFor(next.left)).send({ error: next.left._tag, message: next.left.message });
    }

    store.set(next.right);
    if (E.isRight(event) && options.debug === true) {
      logger.debug(`Applied ${event.right.type}`);
    }
    if (E.isRight(event) && event.right.type === 'GraphLoaded') {
      logger.info(`Graph replaced: ${getGraphInfo(next.right.graph)}`);
    }
    return buildDashboardView(next.right);
  });

  // Health check endpoint
  server.get('/health', async () => ({ status: 'healthy' }));

  return server;
}

/**
 * Starts the dashboard server
 */
export async function startDashboardServer(
  store: DashboardSessionStore,
  port: number = DEFAULT_PORT,
  host: string = DEFAULT_HOST,
  options: DashboardServerOptions = {}
): Promise<FastifyInstance> {
  const server: FastifyInstance = createDashboardServer(store, options);

  try {
    await server.listen({ port, host });
    logger.info(`Dashboard listening on http://${host}:${port}/`);
    return server;
  } catch (error) {
    logger.error('Failed to start server:', error);
    throw error;
  }
}
