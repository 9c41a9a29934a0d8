import type * as E from 'fp-ts/lib/Either.js'
import type { InvalidParameterError } from '@/pure/graph/errors'
import { isLayoutName, parseLayout, resolveLayout, type LayoutName } from './layouts'


// CONTAINS TYPES AND FUNCTION TYPES

export type { LayoutName } from './layouts'
export { AVAILABLE_LAYOUTS, BUILT_IN_LAYOUTS, EXTENSION_LAYOUTS, DEFAULT_LAYOUT } from './layouts'

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export type IsLayoutName = (name: string) => name is LayoutName

export type ResolveLayout = (requested: string) => LayoutName

export type ParseLayout = (name: string) => E.Either<InvalidParameterError, LayoutName>

export { isLayoutName } from './layouts'
void (isLayoutName satisfies IsLayoutName)

export { resolveLayout } from './layouts'
void (resolveLayout satisfies ResolveLayout)

export { parseLayout } from './layouts'
void (parseLayout satisfies ParseLayout)
