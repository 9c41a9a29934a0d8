import type { FastifyInstance } from 'fastify'
import * as E from 'fp-ts/lib/Either.js'
import type { Graph } from '@/pure/graph'
import { isLayoutName } from '@/pure/layouts'
import type { NeighborhoodPolicy } from '@/pure/selection'
import { createDashboardSession, type DashboardSession } from '@/pure/session'
import { readGraphFile, type GraphFileError } from '@/shell/edge/graph-file/graphFileIO'
import { createLogger, type Logger } from '@/shell/edge/logging/logger'
import { createSessionStore, startDashboardServer } from '@/shell/edge/server/dashboardServer'

const logger: Logger = createLogger('Dashboard')

export interface RunDashboardOptions {
    readonly input: string
    readonly layout: string
    readonly colorBy: string | null
    readonly neighborhoodPolicy: NeighborhoodPolicy
    readonly port: number
    readonly host: string
    readonly debug: boolean
}

export async function loadDashboardSession(options: RunDashboardOptions): Promise<E.Either<GraphFileError, DashboardSession>> {
    const graph: E.Either<GraphFileError, Graph> = await readGraphFile(options.input)
    if (E.isLeft(graph)) {
        return graph
    }

    if (!isLayoutName(options.layout)) {
        logger.warn(`Unknown layout "${options.layout}", falling back to circle`)
    }
    const session: DashboardSession = createDashboardSession(graph.right, {
        layout: options.layout,
        colorBy: options.colorBy,
        neighborhoodPolicy: options.neighborhoodPolicy
    })

    logger.info(`Found potential categorical attributes: ${[...session.categoricalAttributes.keys()].join(', ') || '(none)'}`)
    if (options.colorBy !== null && session.colorAttribute !== options.colorBy) {
        logger.warn(`"${options.colorBy}" is not a categorical attribute, colouring by ${session.colorAttribute ?? 'nothing'}`)
    }
    return E.right(session)
}

/** Load the graph and serve it until the process is stopped. */
export async function runDashboardCommand(options: RunDashboardOptions): Promise<E.Either<GraphFileError, FastifyInstance>> {
    const session: E.Either<GraphFileError, DashboardSession> = await loadDashboardSession(options)
    if (E.isLeft(session)) {
        return session
    }

    const server: FastifyInstance = await startDashboardServer(
        createSessionStore(session.right),
        options.port,
        options.host,
        { debug: options.debug }
    )
    return E.right(server)
}
