import type { Attributes, AttributeValue, Graph, GraphEdge, GraphNode } from '@/pure/graph'
import { edgeKey } from '@/pure/graph/createGraph'

function attributesAreEqual(a: Attributes, b: Attributes): boolean {
    if (a.size !== b.size) {
        return false
    }
    return [...a.entries()].every(([name, value]: readonly [string, AttributeValue]) => b.has(name) && b.get(name) === value)
}

function edgesByKey(graph: Graph): ReadonlyMap<string, GraphEdge> {
    return new Map(graph.edges.map((edge: GraphEdge): [string, GraphEdge] => [edgeKey(graph.directed, edge.source, edge.target), edge]))
}

/**
 * Structural equality: same directedness, same node ids with the same
 * attributes, same edge set with the same attributes. Undirected edges compare
 * as unordered pairs. Ordering is ignored.
 */
export function graphsAreEqual(a: Graph, b: Graph): boolean {
    if (a.directed !== b.directed || a.nodes.size !== b.nodes.size || a.edges.length !== b.edges.length) {
        return false
    }

    const nodesMatch: boolean = [...a.nodes.values()].every((node: GraphNode) => {
        const other: GraphNode | undefined = b.nodes.get(node.id)
        return other !== undefined && attributesAreEqual(node.attributes, other.attributes)
    })
    if (!nodesMatch) {
        return false
    }

    const otherEdges: ReadonlyMap<string, GraphEdge> = edgesByKey(b)
    return [...edgesByKey(a).entries()].every(([key, edge]: readonly [string, GraphEdge]) => {
        const other: GraphEdge | undefined = otherEdges.get(key)
        return other !== undefined && attributesAreEqual(edge.attributes, other.attributes)
    })
}
