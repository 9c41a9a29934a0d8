import type { NodeId } from '@/pure/graph'
import type { ColorMappings, LegendEntry } from '@/pure/categorical'
import type { Visibility } from '@/pure/filter'
import type { LayoutName } from '@/pure/layouts'
import type { NeighborhoodPolicy } from '@/pure/selection'

// ============================================================================
// SCENE (renderer-agnostic description handed to the widget)
// ============================================================================

export interface NodeVisualSpec {
    readonly id: NodeId
    readonly label: string
    /** Stringified value of the colour attribute, null when absent or no colour attribute */
    readonly colorCategory: string | null
    readonly color: string | null
    readonly selected: boolean
    readonly highlighted: boolean
    readonly visibility: Visibility
}

export interface EdgeVisualSpec {
    readonly id: string
    readonly source: NodeId
    readonly target: NodeId
    readonly label: string | null
    readonly highlighted: boolean
    readonly visibility: Visibility
}

export interface Scene {
    readonly layout: LayoutName
    readonly colorAttribute: string | null
    readonly nodes: readonly NodeVisualSpec[]
    readonly edges: readonly EdgeVisualSpec[]
    readonly legend: readonly LegendEntry[]
}

export interface SceneOptions {
    readonly neighborhoodPolicy: NeighborhoodPolicy
    readonly colorMappings: ColorMappings
}
