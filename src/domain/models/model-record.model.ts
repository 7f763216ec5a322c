/**
 * Domain model for persisted records.
 *
 * A record is a mutable attribute map plus the definition of the model it
 * belongs to. Values are held in their stored representation; casting to the
 * read representation happens through ModelService.getAttribute().
 */

/** Values an attribute may hold in its stored form. */
export type AttributeValue = string | number | boolean | Buffer | null;

export type Attributes = Record<string, AttributeValue>;

/** Storage/read directive for a single attribute. */
export type AttributeCast = 'binary' | 'string' | 'integer' | 'boolean' | 'json' | 'date';

export interface ModelDefinition {
  /** Table (or collection) the records are stored in. */
  table: string;
  casts?: Readonly<Record<string, AttributeCast>>;
  /**
   * UUID version policy: 'uuid1', 'uuid3', 'uuid4' or 'uuid5'.
   * Any other value falls back to 'uuid4'.
   */
  uuidVersion?: string;
  /** Namespace UUID for the name-based versions (uuid3, uuid5). */
  uuidNamespace?: string;
  /** Name source for the name-based versions (uuid3, uuid5). */
  uuidName?: (attributes: Readonly<Attributes>) => string;
}

export interface ModelRecord {
  readonly model: ModelDefinition;
  attributes: Attributes;
  /** False until the record has been inserted. */
  exists: boolean;
}

/** True when the model declares a cast for `field`, and that cast is `binary`. */
export function hasBinaryCast(model: ModelDefinition, field: string): boolean {
  return model.casts?.[field] === 'binary';
}
