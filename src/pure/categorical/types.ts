/** Attribute name to its distinct stringified values, first-seen order. */
export type CategoricalAttributes = ReadonlyMap<string, readonly string[]>

/** Value string to `#rrggbb`. */
export type ColorMapping = ReadonlyMap<string, string>

export type ColorMappings = ReadonlyMap<string, ColorMapping>

export interface LegendEntry {
    readonly value: string
    readonly color: string
}

/** What the legend panel shows for the current colour attribute. */
export type LegendView =
    | { readonly _tag: 'NoColorAttribute' }
    | { readonly _tag: 'LegendUnavailable'; readonly message: string }
    | { readonly _tag: 'Legend'; readonly title: string; readonly entries: readonly LegendEntry[] }
