import { describe, it, expect } from 'vitest'
import * as E from 'fp-ts/lib/Either.js'
import type { Graph, GraphEdge, InvalidParameterError } from '@/pure/graph'
import { serializeGraphDocument } from '@/pure/graph/graph-document/serializeGraphDocument'
import { generateSampleGraph, NODE_CATEGORIES } from './generateSampleGraph'
import { randomSample, seededRandom, type RandomSource } from './seededRandom'

function generateOrThrow(nodeCount: number, maxOutDegree: number, directed: boolean, seed?: number): Graph {
    const result: E.Either<InvalidParameterError, Graph> = generateSampleGraph(nodeCount, maxOutDegree, directed, seed)
    if (E.isLeft(result)) {
        throw new Error(result.left.message)
    }
    return result.right
}

function outDegrees(graph: Graph): ReadonlyMap<string, number> {
    return graph.edges.reduce<Map<string, number>>(
        (counts: Map<string, number>, edge: GraphEdge) => counts.set(edge.source, (counts.get(edge.source) ?? 0) + 1),
        new Map()
    )
}

function edgePairs(graph: Graph): readonly string[] {
    return graph.edges.map((edge: GraphEdge) => `${edge.source}->${edge.target}`)
}

describe('generateSampleGraph', () => {
    describe('parameter validation', () => {
        it('should reject a non-positive node count', () => {
            const result: E.Either<InvalidParameterError, Graph> = generateSampleGraph(0, 3, true)
            expect(E.isLeft(result) && result.left).toEqual({
                _tag: 'InvalidParameterError',
                parameter: 'nodeCount',
                message: 'Invalid value for nodeCount: expected a positive integer, got 0'
            })
        })

        it('should reject a fractional node count', () => {
            const result: E.Either<InvalidParameterError, Graph> = generateSampleGraph(2.5, 3, true)
            expect(E.isLeft(result) && result.left._tag).toBe('InvalidParameterError')
        })

        it('should reject a negative max out-degree', () => {
            const result: E.Either<InvalidParameterError, Graph> = generateSampleGraph(5, -1, true)
            expect(E.isLeft(result) && result.left.parameter).toBe('maxOutDegree')
        })

        it('should reject a fractional seed', () => {
            const result: E.Either<InvalidParameterError, Graph> = generateSampleGraph(5, 1, true, 0.5)
            expect(E.isLeft(result) && result.left.parameter).toBe('seed')
        })
    })

    describe('structural constraints', () => {
        const cases: readonly { readonly nodes: number; readonly maxOut: number; readonly directed: boolean; readonly seed: number }[] = [
            { nodes: 1, maxOut: 3, directed: true, seed: 1 },
            { nodes: 2, maxOut: 1, directed: false, seed: 2 },
            { nodes: 10, maxOut: 3, directed: true, seed: 3 },
            { nodes: 25, maxOut: 8, directed: false, seed: 4 },
            { nodes: 40, maxOut: 0, directed: true, seed: 5 }
        ]

        it.each(cases)('should honour the constraints for $nodes nodes, max $maxOut, directed=$directed', ({ nodes, maxOut, directed, seed }) => {
            const graph: Graph = generateOrThrow(nodes, maxOut, directed, seed)

            expect(graph.nodes.size).toBe(nodes)
            expect([...graph.nodes.keys()]).toEqual(Array.from({ length: nodes }, (_: unknown, i: number) => String(i)))
            for (const degree of outDegrees(graph).values()) {
                expect(degree).toBeLessThanOrEqual(maxOut)
            }
            expect(graph.edges.every((edge: GraphEdge) => edge.source !== edge.target)).toBe(true)

            const keys: readonly string[] = graph.edges.map((edge: GraphEdge) =>
                directed ? `${edge.source}->${edge.target}` : [edge.source, edge.target].sort().join('--'))
            expect(new Set(keys).size).toBe(keys.length)
        })

        it('should produce no edges when the max out-degree is zero', () => {
            expect(generateOrThrow(12, 0, true, 9).edges).toEqual([])
        })

        it('should attach the cosmetic node and edge attributes', () => {
            const graph: Graph = generateOrThrow(6, 3, true, 11)

            for (const node of graph.nodes.values()) {
                expect(node.attributes.get('label')).toBe(`Node ${node.id}`)
                const size: unknown = node.attributes.get('size')
                expect(typeof size === 'number' && Number.isInteger(size) && size >= 1 && size <= 10).toBe(true)
                const importance: unknown = node.attributes.get('importance')
                expect(typeof importance === 'number' && importance >= 0 && importance < 1).toBe(true)
                expect(NODE_CATEGORIES).toContain(node.attributes.get('category'))
            }
            for (const edge of graph.edges) {
                expect(edge.attributes.get('label')).toBe(`e${edge.source}-${edge.target}`)
                expect(['solid', 'dashed', 'dotted']).toContain(edge.attributes.get('type'))
            }
        })
    })

    describe('determinism', () => {
        it('should produce identical documents for the same seed', () => {
            const first: Graph = generateOrThrow(20, 5, true, 42)
            const second: Graph = generateOrThrow(20, 5, true, 42)

            expect(serializeGraphDocument(second)).toEqual(serializeGraphDocument(first))
            expect(JSON.stringify(serializeGraphDocument(second))).toBe(JSON.stringify(serializeGraphDocument(first)))
        })

        it('should produce different edge sets for different seeds', () => {
            expect(edgePairs(generateOrThrow(20, 5, true, 1))).not.toEqual(edgePairs(generateOrThrow(20, 5, true, 2)))
        })
    })
})

describe('randomSample', () => {
    it('should return k distinct items from the pool', () => {
        const rng: RandomSource = seededRandom(7)
        const sample: readonly number[] = randomSample(rng, [1, 2, 3, 4, 5, 6], 4)

        expect(sample).toHaveLength(4)
        expect(new Set(sample).size).toBe(4)
        sample.forEach((item: number) => expect([1, 2, 3, 4, 5, 6]).toContain(item))
    })

    it('should cap k at the pool size', () => {
        expect(randomSample(seededRandom(7), ['a', 'b'], 5)).toHaveLength(2)
    })
})

describe('seededRandom', () => {
    it('should repeat its sequence for the same seed and stay in [0, 1)', () => {
        const a: RandomSource = seededRandom(123)
        const b: RandomSource = seededRandom(123)
        const draws: readonly number[] = Array.from({ length: 50 }, () => a())

        expect(Array.from({ length: 50 }, () => b())).toEqual(draws)
        expect(draws.every((x: number) => x >= 0 && x < 1)).toBe(true)
    })
})
