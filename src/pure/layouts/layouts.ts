import * as E from 'fp-ts/lib/Either.js'
import { createInvalidParameterError, type InvalidParameterError } from '@/pure/graph/errors'

/** Ship with Cytoscape.js itself. */
export const BUILT_IN_LAYOUTS = ['circle', 'grid', 'random', 'concentric', 'breadthfirst', 'cose', 'null'] as const

/** Registered in the page with `cytoscape.use` from their vendored bundles. */
export const EXTENSION_LAYOUTS = ['dagre', 'klay', 'euler', 'spread', 'cose-bilkent'] as const

export const AVAILABLE_LAYOUTS = [...BUILT_IN_LAYOUTS, ...EXTENSION_LAYOUTS] as const

export type LayoutName = typeof AVAILABLE_LAYOUTS[number]

export const DEFAULT_LAYOUT: LayoutName = 'circle'

export function isLayoutName(name: string): name is LayoutName {
    return AVAILABLE_LAYOUTS.some((layout: LayoutName) => layout === name)
}

/** Start-up lookup: an unknown name falls back to the default layout. */
export function resolveLayout(requested: string): LayoutName {
    return isLayoutName(requested) ? requested : DEFAULT_LAYOUT
}

/** Event lookup: an unknown name is an error. */
export function parseLayout(name: string): E.Either<InvalidParameterError, LayoutName> {
    if (isLayoutName(name)) {
        return E.right(name)
    }
    return E.left(createInvalidParameterError('layout', `unknown layout "${name}", expected one of ${AVAILABLE_LAYOUTS.join(', ')}`))
}
