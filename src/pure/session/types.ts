import type { AttributeValue, Graph, NodeId } from '@/pure/graph'
import type { CategoricalAttributes, ColorMappings } from '@/pure/categorical'
import type { FilterState } from '@/pure/filter'
import type { LayoutName } from '@/pure/layouts'
import type { NeighborhoodPolicy, SelectedNodeDetails, SelectionState } from '@/pure/selection'
import type { Scene } from '@/pure/scene'

/**
 * Everything one dashboard view depends on. Handlers take a session and
 * return the next one; nothing is mutated in place.
 */
export interface DashboardSession {
    readonly graph: Graph
    readonly selection: SelectionState
    readonly filter: FilterState
    readonly layout: LayoutName
    readonly colorAttribute: string | null
    readonly neighborhoodPolicy: NeighborhoodPolicy
    /** Derived from graph; recomputed on GraphLoaded */
    readonly categoricalAttributes: CategoricalAttributes
    readonly colorMappings: ColorMappings
}

export interface DashboardSessionOptions {
    /** Unknown names fall back to circle */
    readonly layout?: string
    /** Used only when categorical; otherwise the first categorical attribute */
    readonly colorBy?: string | null
    readonly neighborhoodPolicy?: NeighborhoodPolicy
}

// ============================================================
// EVENTS (one per widget interaction)
// ============================================================

export type DashboardEvent =
    | { readonly type: 'NodeClicked'; readonly nodeId: NodeId }
    | { readonly type: 'SelectionReplaced'; readonly nodeIds: readonly NodeId[] }
    | { readonly type: 'SelectionCleared' }
    | { readonly type: 'SelectMatchingFilter' }
    | { readonly type: 'FilterSet'; readonly attribute: string; readonly value?: AttributeValue }
    | { readonly type: 'FilterCleared' }
    | { readonly type: 'LayoutChanged'; readonly layout: string }
    | { readonly type: 'ColorAttributeChanged'; readonly attribute: string | null }
    | { readonly type: 'NeighborhoodPolicyChanged'; readonly policy: string }
    | { readonly type: 'GraphLoaded'; readonly graph: Graph }

export interface SessionView {
    readonly scene: Scene
    readonly selectionDetails: readonly SelectedNodeDetails[]
}
