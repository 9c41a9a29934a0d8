import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import type { Graph, MalformedGraphError, UnknownNodeError } from '@/pure/graph'
import { parseGraphDocument } from '@/pure/graph/graph-document/parseGraphDocument'
import { extractCategoricalAttributes, generateColorMappings, type ColorMappings } from '@/pure/categorical'
import { clearFilter, setFilter } from '@/pure/filter'
import { createEmptySelection, replaceSelection, type SelectionState } from '@/pure/selection'
import type { Scene } from './types'
import { buildScene } from './buildScene'

function loadGraph(doc: unknown): Graph {
    const result: E.Either<MalformedGraphError, Graph> = parseGraphDocument(doc)
    if (E.isLeft(result)) {
        throw new Error(result.left.message)
    }
    return result.right
}

function selectionOf(graph: Graph, ids: readonly string[]): SelectionState {
    const result: E.Either<UnknownNodeError, SelectionState> = replaceSelection(graph, ids)
    if (E.isLeft(result)) {
        throw new Error(result.left.message)
    }
    return result.right
}

// a -> b -> c, with a group attribute
const graph: Graph = loadGraph({
    directed: true,
    nodes: [
        { id: 'a', label: 'Alpha', group: 'x' },
        { id: 'b', group: 'y' },
        { id: 'c', label: 7 }
    ],
    edges: [
        { source: 'a', target: 'b', label: 'ab' },
        { source: 'b', target: 'c' }
    ]
})
const colorMappings: ColorMappings = generateColorMappings(extractCategoricalAttributes(graph))

describe('buildScene', () => {
    it('should describe an untouched graph with everything visible and nothing highlighted', () => {
        const scene: Scene = buildScene(graph, createEmptySelection(), clearFilter(), 'circle', null, {
            neighborhoodPolicy: 'both',
            colorMappings
        })

        expect(scene).toEqual({
            layout: 'circle',
            colorAttribute: null,
            nodes: [
                { id: 'a', label: 'Alpha', colorCategory: null, color: null, selected: false, highlighted: false, visibility: 'visible' },
                { id: 'b', label: 'b', colorCategory: null, color: null, selected: false, highlighted: false, visibility: 'visible' },
                { id: 'c', label: '7', colorCategory: null, color: null, selected: false, highlighted: false, visibility: 'visible' }
            ],
            edges: [
                { id: 'e0', source: 'a', target: 'b', label: 'ab', highlighted: false, visibility: 'visible' },
                { id: 'e1', source: 'b', target: 'c', label: null, highlighted: false, visibility: 'visible' }
            ],
            legend: []
        })
    })

    it('should colour nodes by the chosen attribute and build the legend', () => {
        const scene: Scene = buildScene(graph, createEmptySelection(), clearFilter(), 'grid', 'group', {
            neighborhoodPolicy: 'both',
            colorMappings
        })

        expect(scene.nodes.map(node => [node.colorCategory, node.color])).toEqual([
            ['x', '#e54444'],
            ['y', '#44e5e5'],
            [null, null]
        ])
        expect(scene.legend).toEqual([
            { value: 'x', color: '#e54444' },
            { value: 'y', color: '#44e5e5' }
        ])
        expect(scene.layout).toBe('grid')
    })

    it('should mark the selection and its successors under the successors policy', () => {
        const scene: Scene = buildScene(graph, selectionOf(graph, ['b']), clearFilter(), 'circle', null, {
            neighborhoodPolicy: 'successors',
            colorMappings
        })

        expect(scene.nodes.map(node => [node.id, node.selected, node.highlighted])).toEqual([
            ['a', false, false],
            ['b', true, true],
            ['c', false, true]
        ])
        expect(scene.edges.map(edge => edge.highlighted)).toEqual([false, true])
    })

    it('should dim nodes and edges outside the filter', () => {
        const scene: Scene = buildScene(graph, createEmptySelection(), setFilter('group', 'x'), 'circle', null, {
            neighborhoodPolicy: 'both',
            colorMappings
        })

        expect(scene.nodes.map(node => node.visibility)).toEqual(['visible', 'dimmed', 'dimmed'])
        expect(scene.edges.map(edge => edge.visibility)).toEqual(['dimmed', 'dimmed'])
    })
})
