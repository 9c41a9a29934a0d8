import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import type { Graph, GraphEdge, GraphNode, MalformedGraphError } from '@/pure/graph'
import { createGraph, createEmptyGraph, edgeKey } from '@/pure/graph/createGraph'

describe('createGraph', () => {
    const node: (id: string) => GraphNode = (id: string) => ({ id, attributes: new Map() })
    const edge: (source: string, target: string) => GraphEdge = (source: string, target: string) => ({
        source,
        target,
        attributes: new Map()
    })

    const expectIssues: (result: E.Either<MalformedGraphError, Graph>) => readonly string[] = (result) => {
        if (E.isRight(result)) {
            throw new Error('expected a MalformedGraphError')
        }
        return result.left.issues
    }

    it('should build successor and predecessor indexes for a directed graph', () => {
        const result: E.Either<MalformedGraphError, Graph> = createGraph(
            true,
            [node('A'), node('B'), node('C')],
            [edge('A', 'B'), edge('B', 'C')]
        )

        expect(E.isRight(result)).toBe(true)
        if (E.isRight(result)) {
            expect(result.right.successors.get('A')).toEqual(['B'])
            expect(result.right.successors.get('C')).toEqual([])
            expect(result.right.predecessors.get('C')).toEqual(['B'])
            expect(result.right.predecessors.get('A')).toEqual([])
        }
    })

    it('should index undirected edges in both directions', () => {
        const result: E.Either<MalformedGraphError, Graph> = createGraph(false, [node('A'), node('B')], [edge('A', 'B')])

        expect(E.isRight(result)).toBe(true)
        if (E.isRight(result)) {
            expect(result.right.successors.get('B')).toEqual(['A'])
            expect(result.right.predecessors.get('A')).toEqual(['B'])
        }
    })

    it('should reject duplicate node ids', () => {
        const issues: readonly string[] = expectIssues(createGraph(true, [node('A'), node('A')], []))
        expect(issues).toEqual(['duplicate node id "A"'])
    })

    it('should reject edges with unknown endpoints', () => {
        const issues: readonly string[] = expectIssues(createGraph(true, [node('A')], [edge('A', 'Z')]))
        expect(issues).toEqual(['edge 0 references unknown target "Z"'])
    })

    it('should reject the reverse pair in an undirected graph', () => {
        const issues: readonly string[] = expectIssues(
            createGraph(false, [node('A'), node('B')], [edge('A', 'B'), edge('B', 'A')])
        )
        expect(issues).toEqual(['edge 1 duplicates the pair ("B", "A")'])
    })

    it('should accept both orientations of a pair in a directed graph', () => {
        const result: E.Either<MalformedGraphError, Graph> = createGraph(
            true,
            [node('A'), node('B')],
            [edge('A', 'B'), edge('B', 'A')]
        )
        expect(E.isRight(result)).toBe(true)
    })

    it('should reject reserved attribute names', () => {
        const issues: readonly string[] = expectIssues(
            createGraph(true, [{ id: 'A', attributes: new Map([['id', 'other']]) }], [])
        )
        expect(issues).toEqual(['node "A" uses the reserved attribute name "id"'])
    })

    it('should create an empty graph with the requested directedness', () => {
        const graph: Graph = createEmptyGraph(false)
        expect(graph.directed).toBe(false)
        expect(graph.nodes.size).toBe(0)
        expect(graph.edges).toEqual([])
    })
})

describe('edgeKey', () => {
    it('should ignore orientation only for undirected graphs', () => {
        expect(edgeKey(false, 'b', 'a')).toBe(edgeKey(false, 'a', 'b'))
        expect(edgeKey(true, 'b', 'a')).not.toBe(edgeKey(true, 'a', 'b'))
    })
})
