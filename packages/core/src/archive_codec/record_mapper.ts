import type { ErrorObject } from "ajv";
import type {
  ArchiveRecord,
  ArchiveRecordObject,
  JsonObject,
  JsonValue,
  RecordAttributes,
  RecordIssue,
} from "../record_types";
import { ATTRIBUTE_NAMES, isJsonObject, setOwnProperty } from "../record_types";
import { SchemaValidationCache, Schemas } from "../record_schemas";

const KNOWN_FIELDS: ReadonlySet<string> = new Set<string>([
  'key',
  'credentialHash',
  'metadata',
  ...ATTRIBUTE_NAMES,
]);

/**
 * Flattens a record into the wire object written to the archive.
 * Unknown fields kept in `attributes.extra` go back to the top level;
 * known fields win on a name clash.
 */
export function toArchiveObject(record: ArchiveRecord): ArchiveRecordObject {
  const object: ArchiveRecordObject = { metadata: record.metadata };
  if (record.key !== undefined) object.key = record.key;
  if (record.credentialHash !== undefined) object.credentialHash = record.credentialHash;

  for (const name of ATTRIBUTE_NAMES) {
    const value = record.attributes[name];
    if (value !== undefined) {
      object[name] = value;
    }
  }

  for (const [name, value] of Object.entries(record.attributes.extra)) {
    if (!KNOWN_FIELDS.has(name)) {
      setOwnProperty(object, name, value);
    }
  }

  return object;
}

/**
 * Builds an ArchiveRecord from one parsed archive element, best-effort.
 *
 * Schema violations are reported as issues, never thrown:
 * - number/boolean values in string fields are stringified
 * - other wrong-typed known fields are dropped
 * - a non-object element yields a record without key
 * - a non-object `metadata` becomes `{}`
 */
export function fromArchiveObject(
  value: unknown,
  index: number
): { record: ArchiveRecord; issues: RecordIssue[] } {
  if (!isJsonObject(value)) {
    return {
      record: { attributes: { extra: {} }, metadata: {} },
      issues: [{ index, field: 'root', message: 'entry is not an object' }],
    };
  }

  const issues = validateArchiveObject(value, index);

  const attributes: RecordAttributes = { extra: {} };
  for (const name of ATTRIBUTE_NAMES) {
    const text = readString(value[name]);
    if (text !== undefined) {
      attributes[name] = text;
    }
  }
  for (const [name, fieldValue] of Object.entries(value)) {
    if (!KNOWN_FIELDS.has(name)) {
      setOwnProperty(attributes.extra, name, fieldValue);
    }
  }

  const record: ArchiveRecord = {
    attributes,
    metadata: readMetadata(value['metadata']),
  };
  const key = readString(value['key']);
  if (key !== undefined) record.key = key;
  const credentialHash = readString(value['credentialHash']);
  if (credentialHash !== undefined) record.credentialHash = credentialHash;

  return { record, issues };
}

/**
 * Runs the ArchiveRecord schema. Empty strings count as absent, so an
 * exported `email: ""` is not reported as a malformed address.
 */
export function validateArchiveObject(value: JsonObject, index: number): RecordIssue[] {
  const validator = SchemaValidationCache.getValidatorFromSchema(Schemas.ArchiveRecord);
  if (validator(withoutEmptyStrings(value))) {
    return [];
  }
  return (validator.errors ?? []).map((error) => toIssue(error, index));
}

function toIssue(error: ErrorObject, index: number): RecordIssue {
  const missing: unknown = error.params['missingProperty'];
  const field = error.instancePath.replace(/^\//, '')
    || (typeof missing === 'string' ? missing : '')
    || 'root';
  return {
    index,
    field,
    message: error.message ?? 'invalid value',
  };
}

function withoutEmptyStrings(value: JsonObject): JsonObject {
  const copy: JsonObject = {};
  for (const [name, fieldValue] of Object.entries(value)) {
    if (fieldValue !== '') {
      setOwnProperty(copy, name, fieldValue);
    }
  }
  return copy;
}

function readString(value: JsonValue | undefined): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function readMetadata(value: JsonValue | undefined): JsonObject {
  return isJsonObject(value) ? { ...value } : {};
}
