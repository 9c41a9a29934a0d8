import { z } from 'zod';
import { attributeValueSchema } from '@/pure/graph/graph-document/graphDocumentSchema';

/**
 * Wire form of a dashboard event. GraphLoaded carries a node-link document
 * instead of a parsed graph.
 */
export const dashboardEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('NodeClicked'), nodeId: z.string() }),
  z.object({ type: z.literal('SelectionReplaced'), nodeIds: z.array(z.string()) }),
  z.object({ type: z.literal('SelectionCleared') }),
  z.object({ type: z.literal('SelectMatchingFilter') }),
  z.object({ type: z.literal('FilterSet'), attribute: z.string(), value: attributeValueSchema.optional() }),
  z.object({ type: z.literal('FilterCleared') }),
  z.object({ type: z.literal('LayoutChanged'), layout: z.string() }),
  z.object({ type: z.literal('ColorAttributeChanged'), attribute: z.string().nullable() }),
  z.object({ type: z.literal('NeighborhoodPolicyChanged'), policy: z.string() }),
  z.object({ type: z.literal('GraphLoaded'), document: z.unknown() }),
]);

export type DashboardEventMessage = z.infer<typeof dashboardEventSchema>;
