import { z } from "zod";

export const domainValueSchema = z.union([
  z.string(),
  z.number().finite(),
  z.boolean(),
]);

export const cptEntrySchema = z.object({
  value: domainValueSchema,
  parentStates: z.record(z.string(), z.union([domainValueSchema, z.null()])),
  probability: z.number(),
});

export const edgeSchema = z.object({
  parent: z.string().min(1),
  child: z.string().min(1),
});

export const networkDocumentSchema = z.object({
  version: z.literal(1),
  variables: z.array(z.string().min(1)),
  edges: z.array(edgeSchema),
  cpts: z.record(z.string(), z.array(cptEntrySchema)),
});

export type NetworkDocument = z.infer<typeof networkDocumentSchema>;
