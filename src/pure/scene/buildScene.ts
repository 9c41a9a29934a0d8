import type { Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import { getLegend, type ColorMapping } from '@/pure/categorical'
import { getEdgeVisibility, getNodeVisibility, type FilterState } from '@/pure/filter'
import type { LayoutName } from '@/pure/layouts'
import { getHighlightedSet, getNodeLabel, isEdgeHighlighted, type SelectionState } from '@/pure/selection'
import type { EdgeVisualSpec, NodeVisualSpec, Scene, SceneOptions } from './types'

/** Stable edge id: position in the graph's edge list. */
export function edgeSpecId(index: number): string {
    return `e${index}`
}

function edgeLabel(edge: GraphEdge): string | null {
    const label: unknown = edge.attributes.get('label')
    return typeof label === 'string' || typeof label === 'number' ? String(label) : null
}

/**
 * Combine graph, selection, filter, layout and colour attribute into one scene.
 * Pure; called once per interaction event.
 */
export function buildScene(
    graph: Graph,
    selection: SelectionState,
    filter: FilterState,
    layout: LayoutName,
    colorAttribute: string | null,
    options: SceneOptions
): Scene {
    const highlighted: ReadonlySet<NodeId> = getHighlightedSet(graph, selection, options.neighborhoodPolicy)
    const mapping: ColorMapping | undefined = colorAttribute === null ? undefined : options.colorMappings.get(colorAttribute)

    const nodes: readonly NodeVisualSpec[] = [...graph.nodes.values()].map((node: GraphNode) => {
        const value: unknown = colorAttribute === null ? undefined : node.attributes.get(colorAttribute)
        const colorCategory: string | null = value === undefined ? null : String(value)
        return {
            id: node.id,
            label: getNodeLabel(node),
            colorCategory,
            color: colorCategory === null ? null : mapping?.get(colorCategory) ?? null,
            selected: selection.selected.has(node.id),
            highlighted: highlighted.has(node.id),
            visibility: getNodeVisibility(filter, node)
        }
    })

    const edges: readonly EdgeVisualSpec[] = graph.edges.map((edge: GraphEdge, index: number) => ({
        id: edgeSpecId(index),
        source: edge.source,
        target: edge.target,
        label: edgeLabel(edge),
        highlighted: isEdgeHighlighted(graph, selection, options.neighborhoodPolicy, edge),
        visibility: getEdgeVisibility(filter, graph, edge)
    }))

    return {
        layout,
        colorAttribute,
        nodes,
        edges,
        legend: getLegend(options.colorMappings, colorAttribute)
    }
}
