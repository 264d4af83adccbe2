import { z } from 'zod';
import { nodeIdentifier, serializedNodeSchema } from './node.js';

/**
 * Record keyed by arbitrary strings. `z.record` drops "__proto__" entries,
 * which are legal keys and identifiers here, so entries are checked one by
 * one and rebuilt as own properties.
 */
function ownRecord<T extends z.ZodTypeAny>(valueSchema: T) {
  return z.unknown().transform((value, ctx): Record<string, z.output<T>> => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected object' });
      return z.NEVER;
    }
    const entries: Array<[string, z.output<T>]> = [];
    for (const [key, raw] of Object.entries(value)) {
      const parsed = valueSchema.safeParse(raw);
      if (parsed.success) {
        entries.push([key, parsed.data]);
        continue;
      }
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key, ...issue.path], message: issue.message });
      }
    }
    return Object.fromEntries(entries);
  });
}

/*
 * Serialized tree schema - identifier-based dictionary form of a tree
 */
export const serializedTreeSchema = z.object({
  root: nodeIdentifier.nullable(),
  nodes: ownRecord(serializedNodeSchema),
  parentOf: ownRecord(nodeIdentifier.nullable()),
  // keyed nodes map key -> child id, list nodes hold ordered child ids
  childrenOf: ownRecord(z.union([z.array(nodeIdentifier), ownRecord(nodeIdentifier)])),
});

export type SerializedTree = z.output<typeof serializedTreeSchema>;
