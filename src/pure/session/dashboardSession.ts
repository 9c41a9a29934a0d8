import * as E from 'fp-ts/lib/Either.js'
import type { Graph, GraphError, NodeId } from '@/pure/graph'
import { createInvalidParameterError, type InvalidParameterError } from '@/pure/graph/errors'
import { getAttributeValues } from '@/pure/graph/graph-operations/getAttributeValues'
import {
    extractCategoricalAttributes,
    generateColorMappings,
    resolveInitialColorAttribute,
    type CategoricalAttributes
} from '@/pure/categorical'
import { clearFilter, getVisibleNodeIds, setFilter } from '@/pure/filter'
import { DEFAULT_LAYOUT, parseLayout, resolveLayout } from '@/pure/layouts'
import {
    clearSelection,
    createEmptySelection,
    describeSelection,
    isNeighborhoodPolicy,
    replaceSelection,
    toggleSelection,
    type SelectionState
} from '@/pure/selection'
import { buildScene } from '@/pure/scene'
import type { DashboardEvent, DashboardSession, DashboardSessionOptions, SessionView } from './types'

export function createDashboardSession(graph: Graph, options: DashboardSessionOptions = {}): DashboardSession {
    const categoricalAttributes: CategoricalAttributes = extractCategoricalAttributes(graph)
    return {
        graph,
        selection: createEmptySelection(),
        filter: clearFilter(),
        layout: options.layout === undefined ? DEFAULT_LAYOUT : resolveLayout(options.layout),
        colorAttribute: resolveInitialColorAttribute(categoricalAttributes, options.colorBy ?? null),
        neighborhoodPolicy: options.neighborhoodPolicy ?? 'both',
        categoricalAttributes,
        colorMappings: generateColorMappings(categoricalAttributes)
    }
}

function requireNodeAttribute(graph: Graph, parameter: string, attribute: string): E.Either<InvalidParameterError, string> {
    if (getAttributeValues(graph, attribute).size === 0) {
        return E.left(createInvalidParameterError(parameter, `no node defines the attribute "${attribute}"`))
    }
    return E.right(attribute)
}

function withSelection(session: DashboardSession, result: E.Either<GraphError, SelectionState>): E.Either<GraphError, DashboardSession> {
    return E.map((selection: SelectionState): DashboardSession => ({ ...session, selection }))(result)
}

/**
 * Apply one interaction event. A Left leaves the caller's session as it was;
 * no event partially applies.
 */
export function handleDashboardEvent(
    session: DashboardSession,
    event: DashboardEvent
): E.Either<GraphError, DashboardSession> {
    switch (event.type) {
        case 'NodeClicked':
            return withSelection(session, toggleSelection(session.graph, session.selection, event.nodeId))

        case 'SelectionReplaced':
            return withSelection(session, replaceSelection(session.graph, event.nodeIds))

        case 'SelectionCleared':
            return E.right({ ...session, selection: clearSelection() })

        case 'SelectMatchingFilter': {
            const matching: readonly NodeId[] = getVisibleNodeIds(session.filter, session.graph)
            return withSelection(session, replaceSelection(session.graph, matching))
        }

        case 'FilterSet': {
            const attribute: E.Either<InvalidParameterError, string> = requireNodeAttribute(session.graph, 'filter attribute', event.attribute)
            if (E.isLeft(attribute)) {
                return attribute
            }
            return E.right({ ...session, filter: setFilter(attribute.right, event.value) })
        }

        case 'FilterCleared':
            return E.right({ ...session, filter: clearFilter() })

        case 'LayoutChanged':
            return E.map((layout: DashboardSession['layout']): DashboardSession => ({ ...session, layout }))(parseLayout(event.layout))

        case 'ColorAttributeChanged': {
            if (event.attribute === null) {
                return E.right({ ...session, colorAttribute: null })
            }
            const attribute: E.Either<InvalidParameterError, string> = requireNodeAttribute(session.graph, 'colour attribute', event.attribute)
            if (E.isLeft(attribute)) {
                return attribute
            }
            return E.right({ ...session, colorAttribute: attribute.right })
        }

        case 'NeighborhoodPolicyChanged': {
            const { policy } = event
            if (!isNeighborhoodPolicy(policy)) {
                return E.left(createInvalidParameterError('neighbourhood policy', `expected successors, predecessors or both, got "${policy}"`))
            }
            return E.right({ ...session, neighborhoodPolicy: policy })
        }

        case 'GraphLoaded':
            // Selection and filter refer to the old graph's ids and values
            return E.right(createDashboardSession(event.graph, {
                layout: session.layout,
                colorBy: session.colorAttribute,
                neighborhoodPolicy: session.neighborhoodPolicy
            }))
    }
}

/** One scene pass plus the node info panel contents. */
export function renderSession(session: DashboardSession): SessionView {
    return {
        scene: buildScene(session.graph, session.selection, session.filter, session.layout, session.colorAttribute, {
            neighborhoodPolicy: session.neighborhoodPolicy,
            colorMappings: session.colorMappings
        }),
        selectionDetails: describeSelection(session.graph, session.selection)
    }
}
