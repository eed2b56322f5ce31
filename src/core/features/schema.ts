/**
 * Structured (YAML / JSON) feature descriptor schema.
 */
import { z } from 'zod';

/** Either `{ name: type }` or `["name:type"]` */
export const FieldsSchema = z.union([z.record(z.string(), z.string()), z.array(z.string())]);

export const FeatureEntrySchema = z.object({
  entity: z.string().min(1),
  description: z.string().optional(),
  operations: z.union([z.string(), z.array(z.string())]).optional(),
  fields: FieldsSchema.optional(),
});

export const FeatureDescriptorSchema = z.union([
  z.object({ features: z.array(FeatureEntrySchema) }),
  z.array(FeatureEntrySchema),
]);

export type FeatureEntry = z.infer<typeof FeatureEntrySchema>;
export type FeatureDescriptor = z.infer<typeof FeatureDescriptorSchema>;
