/**
 * Archive record types.
 *
 * An ArchiveRecord is one identity entity as it travels inside a `.k7`
 * archive: a login-like key, an opaque credential hash, scalar profile
 * attributes and an open metadata map. Records are built once (from a parsed
 * archive on import, from the store on export) and never mutated afterwards.
 */

/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Scalar profile fields carried next to the key. All optional. */
export type RecordAttributes = {
  email?: string;
  url?: string;
  /** URL-safe variant of the key */
  niceKey?: string;
  displayName?: string;
  firstName?: string;
  lastName?: string;
  description?: string;
  /** Registration timestamp, `YYYY-MM-DD HH:mm:ss` in UTC */
  registeredAt?: string;
  /**
   * Unknown top-level fields found in the archive object.
   * Kept verbatim so newer archives survive a pass through this version.
   */
  extra: JsonObject;
};

export type AttributeName = Exclude<keyof RecordAttributes, 'extra'>;

export const ATTRIBUTE_NAMES: readonly AttributeName[] = [
  'email',
  'url',
  'niceKey',
  'displayName',
  'firstName',
  'lastName',
  'description',
  'registeredAt',
];

/** Metadata map. Values are scalars or structured values (e.g. a role set). */
export type RecordMetadata = JsonObject;

export type ArchiveRecord = {
  /** Absent or empty keys are rejected by the reconciler, not by the codec */
  key?: string;
  /** Pre-hashed secret, never a plaintext password */
  credentialHash?: string;
  attributes: RecordAttributes;
  metadata: RecordMetadata;
};

/**
 * Wire shape of one element of the archive's JSON array.
 * Unknown fields are allowed and preserved.
 */
export type ArchiveRecordObject = {
  key?: string;
  credentialHash?: string;
  email?: string;
  url?: string;
  niceKey?: string;
  displayName?: string;
  firstName?: string;
  lastName?: string;
  description?: string;
  registeredAt?: string;
  metadata: RecordMetadata;
  [extra: string]: JsonValue | undefined;
};

/** A problem found while mapping a parsed archive element to an ArchiveRecord. */
export type RecordIssue = {
  /** 0-based position in the archive */
  index: number;
  /** Field name, or `root` for the element itself */
  field: string;
  message: string;
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Adds `key` as an own enumerable property. Unlike `target[key] = value`,
 * a `__proto__` key is stored as data instead of replacing the prototype.
 */
export function setOwnProperty(target: object, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
