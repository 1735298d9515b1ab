/**
 * Persisted, versioned collection of named registry items.
 */
import { fileExists } from '../../utils/file-system.js';
import { ErrorCodes } from '../../utils/errors.js';
import { loadYamlWithSchema, writeYaml } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';
import { RegistryItem, type Clock } from './item.js';
import {
  RegistryDocumentSchema,
  type AttributeValue,
  type RegistryItemRecord,
} from './schema.js';

const log = logger.child('registry');

export interface RegistryStoreOptions {
  /** Path of the YAML document */
  path: string;
  /** Type tag written as `registry_type`, e.g. `useraccount` */
  registryType: string;
  version?: string;
  /** Package the registry belongs to */
  target?: string;
  metadata?: Record<string, AttributeValue>;
  createdAt?: Date;
  clock?: Clock;
}

export class RegistryStore {
  readonly path: string;
  private registryType: string;
  private version: string;
  private target: string | undefined;
  private created: Date;
  private metadata: Record<string, AttributeValue>;
  private items = new Map<string, RegistryItem>();
  private readonly clock: Clock;

  constructor(options: RegistryStoreOptions) {
    this.path = options.path;
    this.clock = options.clock ?? (() => new Date());
    this.registryType = options.registryType;
    this.version = options.version ?? '1.0.0';
    this.target = options.target;
    this.created = options.createdAt ?? this.clock();
    this.metadata = { ...options.metadata };
  }

  get registryVersion(): string {
    return this.version;
  }

  get type(): string {
    return this.registryType;
  }

  get createdAt(): Date {
    return new Date(this.created.getTime());
  }

  getMetadata(): Readonly<Record<string, AttributeValue>> {
    return { ...this.metadata };
  }

  get size(): number {
    return this.items.size;
  }

  /**
   * Add an item. Returns false, leaving the registry unchanged, when an item
   * with the same name is already present.
   */
  add(item: RegistryItem): boolean {
    if (this.items.has(item.name)) {
      log.debug(`${item.name} already exists in registry`, { path: this.path });
      return false;
    }
    this.items.set(item.name, item);
    return true;
  }

  get(name: string): RegistryItem | undefined {
    return this.items.get(name);
  }

  list(): string[] {
    return [...this.items.keys()];
  }

  remove(name: string): boolean {
    return this.items.delete(name);
  }

  /**
   * Write the whole registry to its document, replacing what was there.
   */
  async save(): Promise<void> {
    await writeYaml(this.path, this.toDocument(this.clock()));
  }

  /**
   * Replace in-memory state with the document's contents.
   * Returns false when the document does not exist yet.
   * @throws SystemError when the document is unreadable or malformed
   */
  async load(): Promise<boolean> {
    if (!(await fileExists(this.path))) {
      return false;
    }

    const doc = await loadYamlWithSchema(this.path, RegistryDocumentSchema, ErrorCodes.INVALID_REGISTRY);

    this.version = doc.registry_version;
    this.registryType = doc.registry_type;
    this.target = doc.target ?? this.target;
    if (doc.created_at) {
      const created = new Date(doc.created_at);
      if (!Number.isNaN(created.getTime())) {
        this.created = created;
      }
    }
    this.metadata = { ...doc.metadata };

    this.items = new Map();
    for (const record of Object.values(doc.items)) {
      const item = RegistryItem.fromRecord(record, this.clock);
      this.items.set(item.name, item);
    }
    return true;
  }

  /**
   * Build the document written by `save()`.
   */
  toDocument(updatedAt: Date = this.clock()): Record<string, unknown> {
    const items: Record<string, RegistryItemRecord> = {};
    for (const [name, item] of this.items) {
      items[name] = item.toRecord();
    }

    return {
      registry_version: this.version,
      registry_type: this.registryType,
      ...(this.target !== undefined ? { target: this.target } : {}),
      created_at: this.created.toISOString(),
      updated_at: updatedAt.toISOString(),
      items,
      metadata: this.metadata,
    };
  }
}
