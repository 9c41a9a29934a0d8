/**
 * Selection types for the dashboard.
 */

import type { AttributeValue, NodeId } from '@/pure/graph'

/** Selected node ids in selection order. Empty means nothing selected. */
export interface SelectionState {
    readonly selected: ReadonlySet<NodeId>
}

/**
 * Which neighbours of a selected node are highlighted on a directed graph.
 * Undirected graphs give the same result under every policy.
 */
export type NeighborhoodPolicy = 'successors' | 'predecessors' | 'both'

export const NEIGHBORHOOD_POLICIES: readonly NeighborhoodPolicy[] = ['successors', 'predecessors', 'both']

export function isNeighborhoodPolicy(value: string): value is NeighborhoodPolicy {
    return value === 'successors' || value === 'predecessors' || value === 'both'
}

// ============================================================
// SELECTION DETAILS (node info panel)
// ============================================================

export interface SelectedNodeDetails {
    readonly id: NodeId
    readonly label: string
    /** One "key: value" line per attribute, in attribute order */
    readonly properties: readonly string[]
}

export function formatAttributeValue(value: AttributeValue): string {
    return String(value)
}
