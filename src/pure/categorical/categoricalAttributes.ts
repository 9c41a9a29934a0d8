import type { Graph, GraphNode } from '@/pure/graph'
import type { CategoricalAttributes, ColorMapping, ColorMappings, LegendEntry, LegendView } from './types'
import { generateColorPalette } from './colorPalette'

// Identity, geometry and display attributes are never treated as categories
const NON_CATEGORICAL_ATTRIBUTES: ReadonlySet<string> = new Set([
    'id', 'name', 'label', 'x', 'y', 'z', 'size', 'width', 'height'
])

const MIN_CATEGORIES: number = 2
const MAX_CATEGORIES: number = 10

/**
 * Node attributes usable for colouring and filtering: between 2 and 10
 * distinct values once stringified. More than that is likely numeric.
 */
export function extractCategoricalAttributes(graph: Graph): CategoricalAttributes {
    const values: Map<string, Set<string>> = new Map()
    graph.nodes.forEach((node: GraphNode) => {
        node.attributes.forEach((value, attribute: string) => {
            if (NON_CATEGORICAL_ATTRIBUTES.has(attribute)) {
                return
            }
            const seen: Set<string> = values.get(attribute) ?? new Set()
            seen.add(String(value))
            values.set(attribute, seen)
        })
    })

    return new Map(
        [...values]
            .filter(([, seen]) => seen.size >= MIN_CATEGORIES && seen.size <= MAX_CATEGORIES)
            .map(([attribute, seen]): [string, readonly string[]] => [attribute, [...seen]])
    )
}

export function generateColorMappings(categorical: CategoricalAttributes): ColorMappings {
    return new Map([...categorical].map(([attribute, values]): [string, ColorMapping] => {
        const palette: readonly string[] = generateColorPalette(values.length)
        const mapping: ColorMapping = new Map(values.map((value: string, i: number): [string, string] => [value, palette[i]]))
        return [attribute, mapping]
    }))
}

/** Empty when the attribute has no colour mapping. */
export function getLegend(mappings: ColorMappings, attribute: string | null): readonly LegendEntry[] {
    if (attribute === null) {
        return []
    }
    const mapping: ColorMapping | undefined = mappings.get(attribute)
    if (mapping === undefined) {
        return []
    }
    return [...mapping].map(([value, color]) => ({ value, color }))
}

export function describeLegend(mappings: ColorMappings, attribute: string | null): LegendView {
    if (attribute === null) {
        return { _tag: 'NoColorAttribute' }
    }
    if (!mappings.has(attribute)) {
        return { _tag: 'LegendUnavailable', message: 'No legend available for this attribute' }
    }
    return { _tag: 'Legend', title: `Legend: ${attribute}`, entries: getLegend(mappings, attribute) }
}

/**
 * The requested attribute when it is categorical, otherwise the first
 * categorical attribute, otherwise none.
 */
export function resolveInitialColorAttribute(
    categorical: CategoricalAttributes,
    requested: string | null
): string | null {
    if (requested !== null && categorical.has(requested)) {
        return requested
    }
    const names: readonly string[] = [...categorical.keys()]
    return names.length > 0 ? names[0] : null
}
