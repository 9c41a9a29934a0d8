/**
 * Random graph generation for demos and tests.
 *
 * - Node ids "0".."nodeCount-1" in generation order
 * - Each node draws an out-degree uniformly in [0, min(maxOutDegree, nodeCount - 1)]
 *   and then that many distinct targets among the other nodes (no self-loops)
 * - Undirected: a draw whose unordered pair already exists is dropped
 * - Cosmetic attributes (label, size, importance, category on nodes; label,
 *   weight, type on edges) come from the same random stream, so a seed fixes
 *   the whole document
 */

import * as E from 'fp-ts/lib/Either.js'
import type { AttributeValue, Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import { createGraph, edgeKey } from '@/pure/graph/createGraph'
import { createInvalidParameterError, type InvalidParameterError, type MalformedGraphError } from '@/pure/graph/errors'
import {
    randomChoice,
    randomInt,
    randomSample,
    randomUniform,
    seededRandom,
    type RandomSource
} from './seededRandom'

export const NODE_CATEGORIES: readonly ['A', 'B', 'C'] = ['A', 'B', 'C'] as const
export const EDGE_TYPES: readonly ['solid', 'dashed', 'dotted'] = ['solid', 'dashed', 'dotted'] as const

function validateParameters(
    nodeCount: number,
    maxOutDegree: number,
    seed: number | undefined
): E.Either<InvalidParameterError, void> {
    if (!Number.isInteger(nodeCount) || nodeCount < 1) {
        return E.left(createInvalidParameterError('nodeCount', `expected a positive integer, got ${nodeCount}`))
    }
    if (!Number.isInteger(maxOutDegree) || maxOutDegree < 0) {
        return E.left(createInvalidParameterError('maxOutDegree', `expected a non-negative integer, got ${maxOutDegree}`))
    }
    if (seed !== undefined && !Number.isSafeInteger(seed)) {
        return E.left(createInvalidParameterError('seed', `expected an integer, got ${seed}`))
    }
    return E.right(undefined)
}

function generateNode(rng: RandomSource, index: number): GraphNode {
    return {
        id: String(index),
        attributes: new Map<string, AttributeValue>([
            ['label', `Node ${index}`],
            ['size', randomInt(rng, 1, 10)],
            ['importance', randomUniform(rng, 0, 1)],
            ['category', randomChoice(rng, NODE_CATEGORIES)]
        ])
    }
}

function generateEdge(rng: RandomSource, source: NodeId, target: NodeId): GraphEdge {
    return {
        source,
        target,
        attributes: new Map<string, AttributeValue>([
            ['label', `e${source}-${target}`],
            ['weight', randomUniform(rng, 0.1, 5.0)],
            ['type', randomChoice(rng, EDGE_TYPES)]
        ])
    }
}

/**
 * Generate a random graph under a node-count and max-out-degree constraint.
 *
 * @param seed - integer seed; when given, two calls with the same arguments
 *   produce identical graphs (same nodes, edges, attributes and order).
 *   When absent, draws come from Math.random.
 *
 * @example
 * generateSampleGraph(20, 5, true, 42)
 * // Right(DiGraph with 20 nodes, every out-degree <= 5)
 */
export function generateSampleGraph(
    nodeCount: number,
    maxOutDegree: number,
    directed: boolean,
    seed?: number
): E.Either<InvalidParameterError, Graph> {
    const validation: E.Either<InvalidParameterError, void> = validateParameters(nodeCount, maxOutDegree, seed)
    if (E.isLeft(validation)) {
        return E.left(validation.left)
    }

    const rng: RandomSource = seed === undefined ? Math.random : seededRandom(seed)

    const nodes: readonly GraphNode[] = Array.from({ length: nodeCount }, (_: unknown, i: number) => generateNode(rng, i))
    const nodeIds: readonly NodeId[] = nodes.map((node: GraphNode) => node.id)

    const edges: GraphEdge[] = []
    const seenPairs: Set<string> = new Set()
    for (const source of nodeIds) {
        const outDegree: number = randomInt(rng, 0, Math.min(maxOutDegree, nodeCount - 1))
        if (outDegree === 0) {
            continue
        }

        const candidates: readonly NodeId[] = nodeIds.filter((id: NodeId) => id !== source)
        for (const target of randomSample(rng, candidates, outDegree)) {
            const key: string = edgeKey(directed, source, target)
            if (seenPairs.has(key)) {
                continue
            }
            seenPairs.add(key)
            edges.push(generateEdge(rng, source, target))
        }
    }

    const graph: E.Either<MalformedGraphError, Graph> = createGraph(directed, nodes, edges)
    // Ids are dense and every pair is deduplicated above
    if (E.isLeft(graph)) {
        throw new Error(`generated graph failed validation: ${graph.left.message}`)
    }
    return E.right(graph.right)
}
