import * as E from 'fp-ts/lib/Either.js'
import type { Direction, Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import { createUnknownNodeError, type UnknownNodeError } from '@/pure/graph/errors'
import { getNeighbors } from '@/pure/graph/graph-operations/getNeighbors'
import {
    formatAttributeValue,
    type NeighborhoodPolicy,
    type SelectedNodeDetails,
    type SelectionState
} from './types'

export function createEmptySelection(): SelectionState {
    return { selected: new Set() }
}

export function clearSelection(): SelectionState {
    return createEmptySelection()
}

/**
 * Add nodeId if absent, remove it if present. Toggling twice restores the
 * previous selection, order included.
 */
export function toggleSelection(
    graph: Graph,
    selection: SelectionState,
    nodeId: NodeId
): E.Either<UnknownNodeError, SelectionState> {
    if (!graph.nodes.has(nodeId)) {
        return E.left(createUnknownNodeError(nodeId))
    }
    if (selection.selected.has(nodeId)) {
        return E.right({ selected: new Set([...selection.selected].filter((id: NodeId) => id !== nodeId)) })
    }
    return E.right({ selected: new Set([...selection.selected, nodeId]) })
}

/**
 * Select exactly nodeIds. Every id is checked before anything changes; the
 * first unknown id fails the whole call.
 */
export function replaceSelection(
    graph: Graph,
    nodeIds: Iterable<NodeId>
): E.Either<UnknownNodeError, SelectionState> {
    const ids: readonly NodeId[] = [...nodeIds]
    const unknown: NodeId | undefined = ids.find((id: NodeId) => !graph.nodes.has(id))
    if (unknown !== undefined) {
        return E.left(createUnknownNodeError(unknown))
    }
    return E.right({ selected: new Set(ids) })
}

function policyDirection(policy: NeighborhoodPolicy): Direction {
    switch (policy) {
        case 'successors':
            return 'out'
        case 'predecessors':
            return 'in'
        case 'both':
            return 'both'
    }
}

/**
 * Selected ids plus their direct neighbours under the policy.
 * Ids no longer in the graph are ignored.
 */
export function getHighlightedSet(
    graph: Graph,
    selection: SelectionState,
    policy: NeighborhoodPolicy
): ReadonlySet<NodeId> {
    const direction: Direction = policyDirection(policy)
    const highlighted: Set<NodeId> = new Set()
    for (const id of selection.selected) {
        const neighbors: E.Either<UnknownNodeError, ReadonlySet<NodeId>> = getNeighbors(graph, id, direction)
        if (E.isLeft(neighbors)) {
            continue
        }
        highlighted.add(id)
        neighbors.right.forEach((neighbor: NodeId) => highlighted.add(neighbor))
    }
    return highlighted
}

/**
 * True when the edge joins a selected node to one of the neighbours the
 * policy follows from it.
 */
export function isEdgeHighlighted(
    graph: Graph,
    selection: SelectionState,
    policy: NeighborhoodPolicy,
    edge: GraphEdge
): boolean {
    const { selected } = selection
    if (!graph.directed) {
        return selected.has(edge.source) || selected.has(edge.target)
    }
    switch (policy) {
        case 'successors':
            return selected.has(edge.source)
        case 'predecessors':
            return selected.has(edge.target)
        case 'both':
            return selected.has(edge.source) || selected.has(edge.target)
    }
}

export function getNodeLabel(node: GraphNode): string {
    const label: unknown = node.attributes.get('label')
    return typeof label === 'string' || typeof label === 'number' ? String(label) : node.id
}

export function describeSelection(graph: Graph, selection: SelectionState): readonly SelectedNodeDetails[] {
    return [...selection.selected].flatMap((id: NodeId) => {
        const node: GraphNode | undefined = graph.nodes.get(id)
        if (node === undefined) {
            return []
        }
        const properties: readonly string[] = [...node.attributes]
            .map(([key, value]) => `${key}: ${formatAttributeValue(value)}`)
        return [{ id, label: getNodeLabel(node), properties }]
    })
}
