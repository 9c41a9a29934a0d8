import { z } from 'zod'

export const attributeValueSchema = z.union([z.string(), z.number(), z.boolean()])

// NetworkX writes integer ids by default; they are read as their decimal string.
const nodeIdSchema = z.union([z.string(), z.number().int()]).transform((id: string | number) => String(id))

export const graphDocumentNodeSchema = z.object({ id: nodeIdSchema }).catchall(attributeValueSchema)

export const graphDocumentEdgeSchema = z.object({
    source: nodeIdSchema,
    target: nodeIdSchema
}).catchall(attributeValueSchema)

/**
 * Node-link document as written by this project and by NetworkX's
 * node_link_data (which names the edge list "links").
 */
export const graphDocumentSchema = z.object({
    directed: z.boolean(),
    multigraph: z.boolean().optional(),
    graph: z.record(attributeValueSchema).optional(),
    nodes: z.array(graphDocumentNodeSchema),
    edges: z.array(graphDocumentEdgeSchema).optional(),
    links: z.array(graphDocumentEdgeSchema).optional()
})

export type ParsedGraphDocument = z.infer<typeof graphDocumentSchema>

export type ParsedGraphDocumentEdge = z.infer<typeof graphDocumentEdgeSchema>

export function formatIssue(issue: z.ZodIssue): string {
    const location: string = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${location}: ${issue.message}`
}
