import * as E from 'fp-ts/lib/Either.js'
import type { AttributeValue, Graph, GraphEdge, GraphNode } from '@/pure/graph'
import { createGraph } from '@/pure/graph/createGraph'
import { createMalformedGraphError, type MalformedGraphError } from '@/pure/graph/errors'
import {
    formatIssue,
    graphDocumentSchema,
    type ParsedGraphDocument,
    type ParsedGraphDocumentEdge
} from './graphDocumentSchema'

function structuralIssues(doc: ParsedGraphDocument): readonly string[] {
    const issues: string[] = []
    if (doc.multigraph === true) {
        issues.push('multigraph: multi-edge documents are not supported')
    }
    if (doc.edges !== undefined && doc.links !== undefined) {
        issues.push('edges: document has both "edges" and "links"')
    }
    if (doc.edges === undefined && doc.links === undefined) {
        issues.push('edges: Required')
    }
    return issues
}

function toGraphEdge(entry: ParsedGraphDocumentEdge): GraphEdge {
    const { source, target, ...attributes } = entry
    return {
        source,
        target,
        attributes: new Map<string, AttributeValue>(Object.entries(attributes))
    }
}

/**
 * Parse a node-link JSON document into a Graph.
 *
 * Either the whole document is accepted or a MalformedGraphError lists what is
 * wrong with it: schema violations first, then structural problems (duplicate
 * ids, dangling edge endpoints, repeated pairs).
 *
 * @example
 * parseGraphDocument({ directed: true, nodes: [{ id: 'a' }, { id: 'b' }], edges: [{ source: 'a', target: 'b' }] })
 * // Right(graph with a -> b)
 */
export function parseGraphDocument(doc: unknown): E.Either<MalformedGraphError, Graph> {
    const parsed: ReturnType<typeof graphDocumentSchema.safeParse> = graphDocumentSchema.safeParse(doc)
    if (!parsed.success) {
        return E.left(createMalformedGraphError(parsed.error.issues.map(formatIssue)))
    }

    const issues: readonly string[] = structuralIssues(parsed.data)
    if (issues.length > 0) {
        return E.left(createMalformedGraphError(issues))
    }

    const nodes: readonly GraphNode[] = parsed.data.nodes.map((entry) => {
        const { id, ...attributes } = entry
        return { id, attributes: new Map<string, AttributeValue>(Object.entries(attributes)) }
    })
    const edgeEntries: readonly ParsedGraphDocumentEdge[] = parsed.data.edges ?? parsed.data.links ?? []

    return createGraph(
        parsed.data.directed,
        nodes,
        edgeEntries.map(toGraphEdge),
        new Map<string, AttributeValue>(Object.entries(parsed.data.graph ?? {}))
    )
}
