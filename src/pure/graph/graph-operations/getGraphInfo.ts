import type { Graph } from '@/pure/graph'

/** One-line summary for logs, e.g. "Type: DiGraph, Nodes: 10, Edges: 14" */
export function getGraphInfo(graph: Graph): string {
    const typeName: string = graph.directed ? 'DiGraph' : 'Graph'
    return `Type: ${typeName}, Nodes: ${graph.nodes.size}, Edges: ${graph.edges.length}`
}
