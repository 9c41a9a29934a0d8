import type * as E from 'fp-ts/lib/Either.js'
import type { Graph, GraphEdge, GraphNode, NodeId } from '@/pure/graph'
import type { UnknownNodeError } from '@/pure/graph/errors'
import type { NeighborhoodPolicy, SelectedNodeDetails, SelectionState } from './types'
import {
    clearSelection,
    createEmptySelection,
    describeSelection,
    getHighlightedSet,
    getNodeLabel,
    isEdgeHighlighted,
    replaceSelection,
    toggleSelection,
} from './selectionState'


// CONTAINS TYPES AND FUNCTION TYPES

export type { SelectionState, NeighborhoodPolicy, SelectedNodeDetails } from './types'
export { NEIGHBORHOOD_POLICIES, isNeighborhoodPolicy } from './types'

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export type CreateEmptySelection = () => SelectionState

export type ToggleSelection = (
    graph: Graph,
    selection: SelectionState,
    nodeId: NodeId
) => E.Either<UnknownNodeError, SelectionState>

export type ReplaceSelection = (graph: Graph, nodeIds: Iterable<NodeId>) => E.Either<UnknownNodeError, SelectionState>

export type GetHighlightedSet = (graph: Graph, selection: SelectionState, policy: NeighborhoodPolicy) => ReadonlySet<NodeId>

export type IsEdgeHighlighted = (
    graph: Graph,
    selection: SelectionState,
    policy: NeighborhoodPolicy,
    edge: GraphEdge
) => boolean

export type GetNodeLabel = (node: GraphNode) => string

export type DescribeSelection = (graph: Graph, selection: SelectionState) => readonly SelectedNodeDetails[]

export { createEmptySelection, clearSelection } from './selectionState'
void (createEmptySelection satisfies CreateEmptySelection)
void (clearSelection satisfies CreateEmptySelection)

export { toggleSelection } from './selectionState'
void (toggleSelection satisfies ToggleSelection)

export { replaceSelection } from './selectionState'
void (replaceSelection satisfies ReplaceSelection)

export { getHighlightedSet } from './selectionState'
void (getHighlightedSet satisfies GetHighlightedSet)

export { isEdgeHighlighted } from './selectionState'
void (isEdgeHighlighted satisfies IsEdgeHighlighted)

export { getNodeLabel } from './selectionState'
void (getNodeLabel satisfies GetNodeLabel)

export { describeSelection } from './selectionState'
void (describeSelection satisfies DescribeSelection)
