/**
 * A named, versioned record held by a registry.
 */
import { NamingError, ErrorCodes } from '../../utils/errors.js';
import {
  RESERVED_ITEM_FIELDS,
  type AttributeValue,
  type RegistryItemRecord,
} from './schema.js';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export interface RegistryItemInit {
  name: string;
  version?: string;
  createdAt?: Date;
  updatedAt?: Date;
  /** Extra attributes, in insertion order */
  attributes?: Map<string, AttributeValue> | Record<string, AttributeValue>;
  clock?: Clock;
}

const RESERVED_KEYS: ReadonlySet<string> = new Set(RESERVED_ITEM_FIELDS);

function isReserved(key: string): boolean {
  return RESERVED_KEYS.has(key);
}

function toEntries(attributes: RegistryItemInit['attributes']): Array<[string, AttributeValue]> {
  if (!attributes) {
    return [];
  }
  if (attributes instanceof Map) {
    return [...attributes.entries()];
  }
  return Object.entries(attributes);
}

/**
 * `createdAt` is fixed at construction. `updatedAt` never moves backwards:
 * every modification stamps it with the later of the clock and its previous
 * value.
 */
export class RegistryItem {
  readonly name: string;
  readonly createdAt: Date;
  private _version: string;
  private _updatedAt: Date;
  private readonly _attributes = new Map<string, AttributeValue>();
  private readonly clock: Clock;

  constructor(init: RegistryItemInit) {
    if (!init.name) {
      throw new NamingError(ErrorCodes.INVALID_NAME, 'Registry item name must not be empty');
    }
    this.clock = init.clock ?? systemClock;
    this.name = init.name;
    this._version = init.version ?? '1.0.0';
    this.createdAt = new Date((init.createdAt ?? this.clock()).getTime());
    this._updatedAt = new Date((init.updatedAt ?? this.createdAt).getTime());
    for (const [key, value] of toEntries(init.attributes)) {
      this.assertAttributeKey(key);
      this._attributes.set(key, value);
    }
  }

  get version(): string {
    return this._version;
  }

  get updatedAt(): Date {
    return new Date(this._updatedAt.getTime());
  }

  /** A read-only view of the attributes, in insertion order. */
  get attributes(): ReadonlyMap<string, AttributeValue> {
    return this._attributes;
  }

  getAttribute(key: string): AttributeValue | undefined {
    return this._attributes.get(key);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.assertAttributeKey(key);
    this._attributes.set(key, value);
    this.touch();
  }

  deleteAttribute(key: string): boolean {
    const removed = this._attributes.delete(key);
    if (removed) {
      this.touch();
    }
    return removed;
  }

  setVersion(version: string): void {
    this._version = version;
    this.touch();
  }

  /**
   * Serialize to a document record: the fixed fields first, then attributes.
   */
  toRecord(): RegistryItemRecord {
    const record: RegistryItemRecord = {
      name: this.name,
      version: this._version,
      created_at: this.createdAt.toISOString(),
      updated_at: this._updatedAt.toISOString(),
    };
    for (const [key, value] of this._attributes) {
      record[key] = value;
    }
    return record;
  }

  static fromRecord(record: RegistryItemRecord, clock?: Clock): RegistryItem {
    const attributes = new Map<string, AttributeValue>();
    for (const [key, value] of Object.entries(record)) {
      if (isReserved(key) || value === undefined) {
        continue;
      }
      attributes.set(key, value);
    }
    return new RegistryItem({
      name: record.name,
      version: record.version,
      createdAt: parseTimestamp(record.created_at),
      updatedAt: parseTimestamp(record.updated_at),
      attributes,
      clock,
    });
  }

  private touch(): void {
    const now = this.clock().getTime();
    this._updatedAt = new Date(Math.max(now, this._updatedAt.getTime()));
  }

  private assertAttributeKey(key: string): void {
    if (isReserved(key)) {
      throw new NamingError(
        ErrorCodes.INVALID_NAME,
        `'${key}' is a reserved registry item field and cannot be used as an attribute`,
        { key }
      );
    }
  }
}

function parseTimestamp(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
