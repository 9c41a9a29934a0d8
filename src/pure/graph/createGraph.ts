/**
 * Graph creation utilities that ensure all indexes are properly initialized.
 */

import * as E from 'fp-ts/lib/Either.js'
import type { Attributes, Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import { createMalformedGraphError, type MalformedGraphError } from '@/pure/graph/errors'

/**
 * Identity of an edge for duplicate detection. Undirected edges are keyed by
 * their sorted endpoint pair so (a, b) and (b, a) collide.
 */
export function edgeKey(directed: boolean, source: NodeId, target: NodeId): string {
    if (directed) {
        return JSON.stringify([source, target])
    }
    return source <= target ? JSON.stringify([source, target]) : JSON.stringify([target, source])
}

/**
 * Create an empty graph with initialized (empty) indexes.
 */
export function createEmptyGraph(directed: boolean): Graph {
    return {
        directed,
        graphAttributes: new Map(),
        nodes: new Map(),
        edges: [],
        successors: new Map(),
        predecessors: new Map()
    }
}

function collectIssues(
    directed: boolean,
    nodes: readonly GraphNode[],
    edges: readonly GraphEdge[]
): readonly string[] {
    const issues: string[] = []
    const seenNodeIds: Set<NodeId> = new Set()
    for (const node of nodes) {
        if (seenNodeIds.has(node.id)) {
            issues.push(`duplicate node id "${node.id}"`)
        }
        if (node.attributes.has('id')) {
            issues.push(`node "${node.id}" uses the reserved attribute name "id"`)
        }
        seenNodeIds.add(node.id)
    }

    const seenEdges: Set<string> = new Set()
    edges.forEach((edge: GraphEdge, index: number) => {
        if (!seenNodeIds.has(edge.source)) {
            issues.push(`edge ${index} references unknown source "${edge.source}"`)
        }
        if (!seenNodeIds.has(edge.target)) {
            issues.push(`edge ${index} references unknown target "${edge.target}"`)
        }
        if (edge.attributes.has('source') || edge.attributes.has('target')) {
            issues.push(`edge ${index} uses a reserved attribute name ("source" or "target")`)
        }
        const key: string = edgeKey(directed, edge.source, edge.target)
        if (seenEdges.has(key)) {
            issues.push(`edge ${index} duplicates the pair ("${edge.source}", "${edge.target}")`)
        }
        seenEdges.add(key)
    })
    return issues
}

function buildAdjacency(
    directed: boolean,
    nodes: readonly GraphNode[],
    edges: readonly GraphEdge[]
): { readonly successors: Map<NodeId, NodeId[]>; readonly predecessors: Map<NodeId, NodeId[]> } {
    const successors: Map<NodeId, NodeId[]> = new Map(nodes.map((node: GraphNode): [NodeId, NodeId[]] => [node.id, []]))
    const predecessors: Map<NodeId, NodeId[]> = new Map(nodes.map((node: GraphNode): [NodeId, NodeId[]] => [node.id, []]))

    const link: (index: Map<NodeId, NodeId[]>, from: NodeId, to: NodeId) => void = (index, from, to) => {
        const list: NodeId[] | undefined = index.get(from)
        if (list && !list.includes(to)) {
            list.push(to)
        }
    }

    for (const edge of edges) {
        link(successors, edge.source, edge.target)
        link(predecessors, edge.target, edge.source)
        if (!directed) {
            link(successors, edge.target, edge.source)
            link(predecessors, edge.source, edge.target)
        }
    }
    return { successors, predecessors }
}

/**
 * Create a graph from nodes and edges, validating ids and building the
 * adjacency indexes.
 *
 * Fails with MalformedGraphError listing every problem found: duplicate node
 * ids, edges with unknown endpoints, repeated edge pairs.
 */
export function createGraph(
    directed: boolean,
    nodes: readonly GraphNode[],
    edges: readonly GraphEdge[],
    graphAttributes: Attributes = new Map()
): E.Either<MalformedGraphError, Graph> {
    const issues: readonly string[] = collectIssues(directed, nodes, edges)
    if (issues.length > 0) {
        return E.left(createMalformedGraphError(issues))
    }

    const { successors, predecessors } = buildAdjacency(directed, nodes, edges)
    return E.right({
        directed,
        graphAttributes,
        nodes: new Map(nodes.map((node: GraphNode): [NodeId, GraphNode] => [node.id, node])),
        edges: [...edges],
        successors,
        predecessors
    })
}
