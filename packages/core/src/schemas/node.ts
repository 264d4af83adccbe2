import { z } from 'zod';

/*
 * Node schema - plain object form of a tree node
 */
export const nodeIdentifier = z.string().min(1, 'Identifier cannot be empty');

export const serializedNodeSchema = z.object({
  identifier: nodeIdentifier,
  keyed: z.boolean().default(true),
  acceptsChildren: z.boolean().default(true),
  repr: z.string().optional(),
  data: z.unknown().optional(),
});

export type SerializedNode = z.infer<typeof serializedNodeSchema>;
