import type {
    Graph,
    GraphDocument,
    GraphDocumentEdge,
    GraphDocumentNode,
    GraphEdge,
    GraphNode
} from '@/pure/graph'

/**
 * Inverse of parseGraphDocument. Node and edge order, and attribute order
 * within each entry, follow the graph's insertion order, except that
 * integer-like attribute names lead in ascending order as object keys do.
 */
export function serializeGraphDocument(graph: Graph): GraphDocument {
    const nodes: readonly GraphDocumentNode[] = [...graph.nodes.values()].map((node: GraphNode) => ({
        id: node.id,
        ...Object.fromEntries(node.attributes)
    }))
    const edges: readonly GraphDocumentEdge[] = graph.edges.map((edge: GraphEdge) => ({
        source: edge.source,
        target: edge.target,
        ...Object.fromEntries(edge.attributes)
    }))

    return {
        directed: graph.directed,
        multigraph: false,
        graph: Object.fromEntries(graph.graphAttributes),
        nodes,
        edges
    }
}
