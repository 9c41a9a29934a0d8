import type { AttributeValue, Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import type { FilterState, Visibility } from './types'
import { clearFilter, getEdgeVisibility, getNodeVisibility, getVisibleNodeIds, setFilter } from './filterState'


// CONTAINS TYPES AND FUNCTION TYPES

export type { FilterState, Visibility } from './types'

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export type ClearFilter = () => FilterState

export type SetFilter = (attribute: string, value?: AttributeValue) => FilterState

export type GetNodeVisibility = (filter: FilterState, node: GraphNode) => Visibility

export type GetEdgeVisibility = (filter: FilterState, graph: Graph, edge: GraphEdge) => Visibility

export type GetVisibleNodeIds = (filter: FilterState, graph: Graph) => readonly NodeId[]

export { clearFilter } from './filterState'
void (clearFilter satisfies ClearFilter)

export { setFilter } from './filterState'
void (setFilter satisfies SetFilter)

export { getNodeVisibility } from './filterState'
void (getNodeVisibility satisfies GetNodeVisibility)

export { getEdgeVisibility } from './filterState'
void (getEdgeVisibility satisfies GetEdgeVisibility)

export { getVisibleNodeIds } from './filterState'
void (getVisibleNodeIds satisfies GetVisibleNodeIds)
