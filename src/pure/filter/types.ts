import type { AttributeValue } from '@/pure/graph'

/**
 * Active categorical filter.
 * - NoFilter: everything visible
 * - AttributeChosen: an attribute is picked but no value yet, everything visible
 * - ValueFilter: nodes whose attribute equals value are visible, the rest dimmed
 */
export type FilterState =
    | { readonly _tag: 'NoFilter' }
    | { readonly _tag: 'AttributeChosen'; readonly attribute: string }
    | { readonly _tag: 'ValueFilter'; readonly attribute: string; readonly value: AttributeValue }

/** Dimmed elements stay in the scene. */
export type Visibility = 'visible' | 'dimmed'
