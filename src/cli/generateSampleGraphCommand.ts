import * as E from 'fp-ts/lib/Either.js'
import type { Graph, InvalidParameterError } from '@/pure/graph'
import { getGraphInfo } from '@/pure/graph/graph-operations/getGraphInfo'
import { generateSampleGraph } from '@/pure/graph/generator/generateSampleGraph'
import { drawEntropySeed } from '@/pure/graph/generator/seededRandom'
import { writeGraphFile } from '@/shell/edge/graph-file/graphFileIO'
import { createLogger, type Logger } from '@/shell/edge/logging/logger'

const logger: Logger = createLogger('Generator')

export interface GenerateSampleGraphOptions {
    readonly output: string
    readonly nodes: number
    readonly maxEdges: number
    readonly directed: boolean
    readonly seed?: number
}

/**
 * Generate a graph and write it as node-link JSON. Without a seed one is
 * drawn and logged so the run can be repeated.
 */
export async function generateSampleGraphCommand(options: GenerateSampleGraphOptions): Promise<E.Either<InvalidParameterError, Graph>> {
    const seed: number = options.seed ?? drawEntropySeed()
    if (options.seed === undefined) {
        logger.info(`No seed given, using ${seed}`)
    }

    logger.info(`Generating graph with ${options.nodes} nodes, max out-degree ${options.maxEdges}, ${options.directed ? 'directed' : 'undirected'}`)
    const graph: E.Either<InvalidParameterError, Graph> = generateSampleGraph(options.nodes, options.maxEdges, options.directed, seed)
    if (E.isLeft(graph)) {
        return graph
    }

    logger.info(`Generated ${getGraphInfo(graph.right)}`)
    await writeGraphFile(options.output, graph.right)
    return graph
}
