import * as E from 'fp-ts/lib/Either.js'
import type { Direction, Graph, NodeId } from '@/pure/graph'
import { createUnknownNodeError, type UnknownNodeError } from '@/pure/graph/errors'

/**
 * Adjacent node ids of nodeId, in edge insertion order.
 *
 * Directed graphs distinguish 'out' (successors) from 'in' (predecessors);
 * 'both' is their union. Undirected graphs return the same set for all three.
 */
export function getNeighbors(graph: Graph, nodeId: NodeId, direction: Direction): E.Either<UnknownNodeError, ReadonlySet<NodeId>> {
    if (!graph.nodes.has(nodeId)) {
        return E.left(createUnknownNodeError(nodeId))
    }

    const successors: readonly NodeId[] = graph.successors.get(nodeId) ?? []
    const predecessors: readonly NodeId[] = graph.predecessors.get(nodeId) ?? []

    switch (direction) {
        case 'out':
            return E.right(new Set(successors))
        case 'in':
            return E.right(new Set(predecessors))
        case 'both':
            return E.right(new Set([...successors, ...predecessors]))
    }
}
