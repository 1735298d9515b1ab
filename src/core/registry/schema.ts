/**
 * Schema for registry documents (`<snake>_registry.yml`).
 */
import { z } from 'zod';

/** A JSON-compatible attribute value. */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(AttributeValueSchema),
    z.record(z.string(), AttributeValueSchema),
  ])
);

/** Hand-edited documents may carry numeric versions. */
const VersionSchema = z.union([z.string(), z.number()]).transform(String);

/** Fields every item record carries; anything else is an attribute. */
export const RESERVED_ITEM_FIELDS = ['name', 'version', 'created_at', 'updated_at'] as const;

export const RegistryItemRecordSchema = z
  .object({
    name: z.string().min(1),
    version: VersionSchema.default('1.0.0'),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
  })
  .catchall(AttributeValueSchema);

export const RegistryDocumentSchema = z.object({
  registry_version: VersionSchema.default('1.0.0'),
  registry_type: z.string(),
  target: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  items: z.preprocess((val) => val ?? {}, z.record(z.string(), RegistryItemRecordSchema)),
  metadata: z.preprocess((val) => val ?? {}, z.record(z.string(), AttributeValueSchema)),
});

/** An item as stored in a document: fixed fields plus flattened attributes. */
export interface RegistryItemRecord {
  name: string;
  version: string;
  created_at?: string;
  updated_at?: string;
  [attribute: string]: AttributeValue | undefined;
}

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>;
