import type { AttributeValue, Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import type { FilterState, Visibility } from './types'

export function clearFilter(): FilterState {
    return { _tag: 'NoFilter' }
}

export function setFilter(attribute: string, value?: AttributeValue): FilterState {
    if (value === undefined) {
        return { _tag: 'AttributeChosen', attribute }
    }
    return { _tag: 'ValueFilter', attribute, value }
}

/**
 * Strict equality: the number 1 does not match the string "1".
 */
export function getNodeVisibility(filter: FilterState, node: GraphNode): Visibility {
    if (filter._tag !== 'ValueFilter') {
        return 'visible'
    }
    return node.attributes.get(filter.attribute) === filter.value ? 'visible' : 'dimmed'
}

function nodeIdVisibility(filter: FilterState, graph: Graph, nodeId: NodeId): Visibility {
    const node: GraphNode | undefined = graph.nodes.get(nodeId)
    return node === undefined ? 'dimmed' : getNodeVisibility(filter, node)
}

export function getEdgeVisibility(filter: FilterState, graph: Graph, edge: GraphEdge): Visibility {
    const bothVisible: boolean = nodeIdVisibility(filter, graph, edge.source) === 'visible'
        && nodeIdVisibility(filter, graph, edge.target) === 'visible'
    return bothVisible ? 'visible' : 'dimmed'
}

/** Ids of visible nodes in graph order. */
export function getVisibleNodeIds(filter: FilterState, graph: Graph): readonly NodeId[] {
    return [...graph.nodes.values()]
        .filter((node: GraphNode) => getNodeVisibility(filter, node) === 'visible')
        .map((node: GraphNode) => node.id)
}
