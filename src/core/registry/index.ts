/**
 * Registry exports barrel file.
 */
export { RegistryStore } from './store.js';
export type { RegistryStoreOptions } from './store.js';
export { RegistryItem } from './item.js';
export type { RegistryItemInit, Clock } from './item.js';
export {
  RegistryDocumentSchema,
  RegistryItemRecordSchema,
  AttributeValueSchema,
  RESERVED_ITEM_FIELDS,
} from './schema.js';
export type { AttributeValue, RegistryItemRecord, RegistryDocument } from './schema.js';
