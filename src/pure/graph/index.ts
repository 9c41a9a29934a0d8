import type * as E from 'fp-ts/lib/Either.js'
import type { MalformedGraphError, UnknownNodeError } from './errors'
import { createGraph } from './createGraph'
import { parseGraphDocument } from './graph-document/parseGraphDocument'
import { serializeGraphDocument } from './graph-document/serializeGraphDocument'
import { getNeighbors } from './graph-operations/getNeighbors'
import { getAttributeValues } from './graph-operations/getAttributeValues'
import { graphsAreEqual } from './graph-operations/graphsAreEqual'
import { removeNode } from './graph-operations/removeNode'
import { getGraphInfo } from './graph-operations/getGraphInfo'


// CONTAINS TYPES AND FUNCTION TYPES

export type NodeId = string

/** Scalar attribute slot. Attribute names are freeform, values are not. */
export type AttributeValue = string | number | boolean

export type Attributes = ReadonlyMap<string, AttributeValue>

export interface GraphNode {
    readonly id: NodeId
    readonly attributes: Attributes
}

export interface GraphEdge {
    readonly source: NodeId
    readonly target: NodeId
    readonly attributes: Attributes
}

/**
 * Immutable graph. Node and edge order is insertion order and survives
 * serialization.
 *
 * For undirected graphs both adjacency indexes hold the same symmetric lists,
 * so every direction query returns the same neighbours.
 */
export interface Graph {
    readonly directed: boolean
    readonly graphAttributes: Attributes
    readonly nodes: ReadonlyMap<NodeId, GraphNode>
    readonly edges: readonly GraphEdge[]
    readonly successors: ReadonlyMap<NodeId, readonly NodeId[]>
    readonly predecessors: ReadonlyMap<NodeId, readonly NodeId[]>
}

export type Direction = 'out' | 'in' | 'both'

// ============================================================================
// DOCUMENT (node-link JSON)
// ============================================================================

export interface GraphDocumentNode {
    readonly id: NodeId
    readonly [attribute: string]: AttributeValue
}

export interface GraphDocumentEdge {
    readonly source: NodeId
    readonly target: NodeId
    readonly [attribute: string]: AttributeValue
}

export interface GraphDocument {
    readonly directed: boolean
    readonly multigraph: false
    readonly graph: Readonly<Record<string, AttributeValue>>
    readonly nodes: readonly GraphDocumentNode[]
    readonly edges: readonly GraphDocumentEdge[]
}

// ============================================================================
// CORE FUNCTION TYPES
// ============================================================================

export type CreateGraph = (
    directed: boolean,
    nodes: readonly GraphNode[],
    edges: readonly GraphEdge[],
    graphAttributes?: Attributes
) => E.Either<MalformedGraphError, Graph>

export type ParseGraphDocument = (doc: unknown) => E.Either<MalformedGraphError, Graph>

export type SerializeGraphDocument = (graph: Graph) => GraphDocument

export type GetNeighbors = (graph: Graph, nodeId: NodeId, direction: Direction) => E.Either<UnknownNodeError, ReadonlySet<NodeId>>

export type GetAttributeValues = (graph: Graph, attribute: string) => ReadonlySet<AttributeValue>

export type GraphsAreEqual = (a: Graph, b: Graph) => boolean

export type RemoveNode = (graph: Graph, nodeId: NodeId) => E.Either<UnknownNodeError, Graph>

export type GetGraphInfo = (graph: Graph) => string

export { createGraph, createEmptyGraph, edgeKey } from './createGraph'
void (createGraph satisfies CreateGraph)

export { parseGraphDocument } from './graph-document/parseGraphDocument'
void (parseGraphDocument satisfies ParseGraphDocument)

export { serializeGraphDocument } from './graph-document/serializeGraphDocument'
void (serializeGraphDocument satisfies SerializeGraphDocument)

export { getNeighbors } from './graph-operations/getNeighbors'
void (getNeighbors satisfies GetNeighbors)

export { getAttributeValues } from './graph-operations/getAttributeValues'
void (getAttributeValues satisfies GetAttributeValues)

export { graphsAreEqual } from './graph-operations/graphsAreEqual'
void (graphsAreEqual satisfies GraphsAreEqual)

export { removeNode } from './graph-operations/removeNode'
void (removeNode satisfies RemoveNode)

export { getGraphInfo } from './graph-operations/getGraphInfo'
void (getGraphInfo satisfies GetGraphInfo)

export type { GraphError, InvalidParameterError, MalformedGraphError, UnknownNodeError } from './errors'
export { createInvalidParameterError, createMalformedGraphError, createUnknownNodeError } from './errors'
