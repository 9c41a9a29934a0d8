import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import type { Graph, GraphEdge, MalformedGraphError, NodeId, UnknownNodeError } from '@/pure/graph'
import { parseGraphDocument } from '@/pure/graph/graph-document/parseGraphDocument'
import type { SelectionState } from './types'
import {
    clearSelection,
    createEmptySelection,
    describeSelection,
    getHighlightedSet,
    isEdgeHighlighted,
    replaceSelection,
    toggleSelection
} from './selectionState'

function loadGraph(doc: unknown): Graph {
    const result: E.Either<MalformedGraphError, Graph> = parseGraphDocument(doc)
    if (E.isLeft(result)) {
        throw new Error(result.left.message)
    }
    return result.right
}

function selectionOf(graph: Graph, ids: readonly NodeId[]): SelectionState {
    const result: E.Either<UnknownNodeError, SelectionState> = replaceSelection(graph, ids)
    if (E.isLeft(result)) {
        throw new Error(result.left.message)
    }
    return result.right
}

function toggled(graph: Graph, selection: SelectionState, id: NodeId): SelectionState {
    const result: E.Either<UnknownNodeError, SelectionState> = toggleSelection(graph, selection, id)
    if (E.isLeft(result)) {
        throw new Error(result.left.message)
    }
    return result.right
}

// A -> B -> C
const chain: Graph = loadGraph({
    directed: true,
    nodes: [
        { id: 'A', label: 'Alpha', group: 'x' },
        { id: 'B', label: 'Beta', group: 'y', size: 3 },
        { id: 'C' }
    ],
    edges: [
        { source: 'A', target: 'B' },
        { source: 'B', target: 'C' }
    ]
})

const edgeAB: GraphEdge = chain.edges[0]
const edgeBC: GraphEdge = chain.edges[1]

describe('toggleSelection', () => {
    it('should add an absent node and remove a present one', () => {
        const once: SelectionState = toggled(chain, createEmptySelection(), 'B')
        expect([...once.selected]).toEqual(['B'])

        const twice: SelectionState = toggled(chain, once, 'B')
        expect([...twice.selected]).toEqual([])
    })

    it('should restore the prior selection exactly when toggled twice', () => {
        const prior: SelectionState = selectionOf(chain, ['C', 'A'])

        expect([...toggled(chain, toggled(chain, prior, 'B'), 'B').selected]).toEqual(['C', 'A'])
        expect([...toggled(chain, toggled(chain, prior, 'A'), 'A').selected]).toEqual(['C', 'A'])
    })

    it('should fail for an id not in the graph and leave the selection as it was', () => {
        const prior: SelectionState = selectionOf(chain, ['A'])
        const result: E.Either<UnknownNodeError, SelectionState> = toggleSelection(chain, prior, 'Z')

        expect(E.isLeft(result) && result.left).toEqual({
            _tag: 'UnknownNodeError',
            nodeId: 'Z',
            message: 'Unknown node id: Z'
        })
        expect([...prior.selected]).toEqual(['A'])
    })
})

describe('replaceSelection', () => {
    it('should select exactly the given ids', () => {
        expect([...selectionOf(chain, ['B', 'C']).selected]).toEqual(['B', 'C'])
    })

    it('should reject the whole call when any id is unknown', () => {
        const result: E.Either<UnknownNodeError, SelectionState> = replaceSelection(chain, ['A', 'missing', 'B'])
        expect(E.isLeft(result) && result.left.nodeId).toBe('missing')
    })
})

describe('clearSelection', () => {
    it('should return an empty selection', () => {
        expect(clearSelection().selected.size).toBe(0)
    })
})

describe('getHighlightedSet', () => {
    const selectedB: SelectionState = selectionOf(chain, ['B'])

    it('should include predecessors and successors under both', () => {
        expect(getHighlightedSet(chain, selectedB, 'both')).toEqual(new Set(['A', 'B', 'C']))
    })

    it('should include only successors under successors', () => {
        expect(getHighlightedSet(chain, selectedB, 'successors')).toEqual(new Set(['B', 'C']))
    })

    it('should include only predecessors under predecessors', () => {
        expect(getHighlightedSet(chain, selectedB, 'predecessors')).toEqual(new Set(['A', 'B']))
    })

    it('should be empty for an empty selection', () => {
        expect(getHighlightedSet(chain, createEmptySelection(), 'both').size).toBe(0)
    })

    it('should ignore every policy difference on an undirected graph', () => {
        const undirected: Graph = loadGraph({
            directed: false,
            nodes: [{ id: 'A' }, { id: 'B' }, { id: 'C' }],
            edges: [{ source: 'A', target: 'B' }, { source: 'B', target: 'C' }]
        })
        const selection: SelectionState = selectionOf(undirected, ['B'])

        expect(getHighlightedSet(undirected, selection, 'successors')).toEqual(new Set(['A', 'B', 'C']))
        expect(getHighlightedSet(undirected, selection, 'predecessors')).toEqual(new Set(['A', 'B', 'C']))
    })
})

describe('isEdgeHighlighted', () => {
    const selectedB: SelectionState = selectionOf(chain, ['B'])

    it('should follow the policy on a directed graph', () => {
        expect([isEdgeHighlighted(chain, selectedB, 'both', edgeAB), isEdgeHighlighted(chain, selectedB, 'both', edgeBC)])
            .toEqual([true, true])
        expect([isEdgeHighlighted(chain, selectedB, 'successors', edgeAB), isEdgeHighlighted(chain, selectedB, 'successors', edgeBC)])
            .toEqual([false, true])
        expect([isEdgeHighlighted(chain, selectedB, 'predecessors', edgeAB), isEdgeHighlighted(chain, selectedB, 'predecessors', edgeBC)])
            .toEqual([true, false])
    })

    it('should not highlight edges away from the selection', () => {
        expect(isEdgeHighlighted(chain, selectionOf(chain, ['C']), 'both', edgeAB)).toBe(false)
    })
})

describe('describeSelection', () => {
    it('should list label and key: value properties per selected node', () => {
        expect(describeSelection(chain, selectionOf(chain, ['B', 'C']))).toEqual([
            { id: 'B', label: 'Beta', properties: ['label: Beta', 'group: y', 'size: 3'] },
            { id: 'C', label: 'C', properties: [] }
        ])
    })
})
