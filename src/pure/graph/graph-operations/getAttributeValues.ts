import type { AttributeValue, Graph, GraphNode } from '@/pure/graph'

/**
 * Distinct values of an attribute across the nodes that define it, in the
 * order they are first seen. Feeds the filter value choices.
 */
export function getAttributeValues(graph: Graph, attribute: string): ReadonlySet<AttributeValue> {
    return [...graph.nodes.values()].reduce<Set<AttributeValue>>(
        (values: Set<AttributeValue>, node: GraphNode) => {
            const value: AttributeValue | undefined = node.attributes.get(attribute)
            return value === undefined ? values : values.add(value)
        },
        new Set()
    )
}
