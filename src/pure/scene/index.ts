import type { Graph } from '@/pure/graph'
import type { FilterState } from '@/pure/filter'
import type { LayoutName } from '@/pure/layouts'
import type { SelectionState } from '@/pure/selection'
import type { Scene, SceneOptions } from './types'
import { buildScene, edgeSpecId } from './buildScene'


// CONTAINS TYPES AND FUNCTION TYPES

export type { Scene, SceneOptions, NodeVisualSpec, EdgeVisualSpec } from './types'

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export type BuildScene = (
    graph: Graph,
    selection: SelectionState,
    filter: FilterState,
    layout: LayoutName,
    colorAttribute: string | null,
    options: SceneOptions
) => Scene

export type EdgeSpecId = (index: number) => string

export { buildScene } from './buildScene'
void (buildScene satisfies BuildScene)

export { edgeSpecId } from './buildScene'
void (edgeSpecId satisfies EdgeSpecId)
