import * as E from 'fp-ts/lib/Either.js'
import type { Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import { createGraph } from '@/pure/graph/createGraph'
import { createUnknownNodeError, type MalformedGraphError, type UnknownNodeError } from '@/pure/graph/errors'

/**
 * Returns a graph without nodeId and without every edge incident to it.
 * The input graph is not modified.
 */
export function removeNode(graph: Graph, nodeId: NodeId): E.Either<UnknownNodeError, Graph> {
    if (!graph.nodes.has(nodeId)) {
        return E.left(createUnknownNodeError(nodeId))
    }

    const nodes: readonly GraphNode[] = [...graph.nodes.values()].filter((node: GraphNode) => node.id !== nodeId)
    const edges: readonly GraphEdge[] = graph.edges.filter(
        (edge: GraphEdge) => edge.source !== nodeId && edge.target !== nodeId
    )

    const remaining: E.Either<MalformedGraphError, Graph> = createGraph(graph.directed, nodes, edges, graph.graphAttributes)
    // A subgraph of a valid graph is valid
    if (E.isLeft(remaining)) {
        throw new Error(`node removal produced an invalid graph: ${remaining.left.message}`)
    }
    return E.right(remaining.right)
}
