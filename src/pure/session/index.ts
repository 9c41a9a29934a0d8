import type * as E from 'fp-ts/lib/Either.js'
import type { Graph, GraphError } from '@/pure/graph'
import type { DashboardEvent, DashboardSession, DashboardSessionOptions, SessionView } from './types'
import { createDashboardSession, handleDashboardEvent, renderSession } from './dashboardSession'


// CONTAINS TYPES AND FUNCTION TYPES

export type { DashboardSession, DashboardSessionOptions, DashboardEvent, SessionView } from './types'

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export type CreateDashboardSession = (graph: Graph, options?: DashboardSessionOptions) => DashboardSession

/** Left leaves the caller's session untouched; there is no partial update. */
export type HandleDashboardEvent = (session: DashboardSession, event: DashboardEvent) => E.Either<GraphError, DashboardSession>

export type RenderSession = (session: DashboardSession) => SessionView

export { createDashboardSession } from './dashboardSession'
void (createDashboardSession satisfies CreateDashboardSession)

export { handleDashboardEvent } from './dashboardSession'
void (handleDashboardEvent satisfies HandleDashboardEvent)

export { renderSession } from './dashboardSession'
void (renderSession satisfies RenderSession)
