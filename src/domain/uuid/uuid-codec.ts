/**
 * UUID generation and string ⇄ byte conversion.
 *
 * Generation algorithms come from the `uuid` package; this module only maps
 * the closed set of supported versions onto its generators and converts
 * between the canonical string and the 16-byte storage form.
 */
import { parse, v1, v3, v4, v5 } from 'uuid';
import { isValidUuid } from './uuid-guard';

export const UUID_VERSIONS = ['uuid1', 'uuid3', 'uuid4', 'uuid5'] as const;

export type UuidVersion = (typeof UUID_VERSIONS)[number];

export const DEFAULT_UUID_VERSION: UuidVersion = 'uuid4';

/** RFC 4122 URL namespace; default namespace for uuid3 / uuid5. */
export const DEFAULT_UUID_NAMESPACE: string = v5.URL;

export const UUID_BYTE_LENGTH = 16;

/** Namespace + name pair consumed by the name-based versions. */
export interface NameBasedInput {
  namespace: string;
  name: string;
}

export class UuidDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UuidDecodeError';
  }
}

export function isUuidVersion(value: unknown): value is UuidVersion {
  return typeof value === 'string' && (UUID_VERSIONS as readonly string[]).includes(value);
}

const GENERATORS: Record<UuidVersion, (input: () => NameBasedInput) => string> = {
  uuid1: () => v1(),
  uuid3: (input) => {
    const { name, namespace } = input();
    return v3(name, namespace);
  },
  uuid4: () => v4(),
  uuid5: (input) => {
    const { name, namespace } = input();
    return v5(name, namespace);
  },
};

/**
 * Generate a canonical (lowercase) UUID string of the given version.
 *
 * `nameInput` is only called for uuid3 / uuid5.
 */
export function generateUuid(version: UuidVersion, nameInput: () => NameBasedInput): string {
  return GENERATORS[version](nameInput);
}

/**
 * Parse a UUID string (any case) into its 16-byte form.
 * Throws the `uuid` package's `TypeError('Invalid UUID')` on malformed input.
 */
export function uuidToBytes(value: string): Buffer {
  return Buffer.from(parse(value));
}

/**
 * Format 16 bytes as the lowercase 8-4-4-4-12 string. Any 16 bytes decode,
 * whatever their version or variant bits.
 */
export function uuidFromBytes(bytes: Uint8Array): string {
  if (bytes.length !== UUID_BYTE_LENGTH) {
    throw new UuidDecodeError(`Expected ${UUID_BYTE_LENGTH} bytes, got ${bytes.length}`);
  }
  const hex = Buffer.from(bytes).toString('hex');
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
}

/**
 * Canonical lowercase form of a supplied uuid. Only RFC 4122 v1-v5 values are
 * accepted, the same family `isValidUuid` lets through to look-ups; anything
 * else (the nil uuid included) throws `TypeError('Invalid UUID')`.
 */
export function normalizeUuid(value: string): string {
  if (!isValidUuid(value)) {
    throw new TypeError('Invalid UUID');
  }
  return value.toLowerCase();
}
