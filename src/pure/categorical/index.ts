import type { Graph } from '@/pure/graph'
import type { CategoricalAttributes, ColorMappings, LegendEntry, LegendView } from './types'
import { generateColorPalette } from './colorPalette'
import {
    describeLegend,
    extractCategoricalAttributes,
    generateColorMappings,
    getLegend,
    resolveInitialColorAttribute,
} from './categoricalAttributes'


// CONTAINS TYPES AND FUNCTION TYPES

export type { CategoricalAttributes, ColorMapping, ColorMappings, LegendEntry, LegendView } from './types'

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export type GenerateColorPalette = (n: number) => readonly string[]

export type ExtractCategoricalAttributes = (graph: Graph) => CategoricalAttributes

export type GenerateColorMappings = (categorical: CategoricalAttributes) => ColorMappings

export type GetLegend = (mappings: ColorMappings, attribute: string | null) => readonly LegendEntry[]

export type DescribeLegend = (mappings: ColorMappings, attribute: string | null) => LegendView

export type ResolveInitialColorAttribute = (categorical: CategoricalAttributes, requested: string | null) => string | null

export { generateColorPalette } from './colorPalette'
void (generateColorPalette satisfies GenerateColorPalette)

export { extractCategoricalAttributes } from './categoricalAttributes'
void (extractCategoricalAttributes satisfies ExtractCategoricalAttributes)

export { generateColorMappings } from './categoricalAttributes'
void (generateColorMappings satisfies GenerateColorMappings)

export { getLegend } from './categoricalAttributes'
void (getLegend satisfies GetLegend)

export { describeLegend } from './categoricalAttributes'
void (describeLegend satisfies DescribeLegend)

export { resolveInitialColorAttribute } from './categoricalAttributes'
void (resolveInitialColorAttribute satisfies ResolveInitialColorAttribute)
