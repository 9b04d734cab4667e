export type {
  JsonValue,
  JsonObject,
  RecordAttributes,
  AttributeName,
  RecordMetadata,
  ArchiveRecord,
  ArchiveRecordObject,
  RecordIssue,
} from './archive_record.types';
export { ATTRIBUTE_NAMES, isJsonObject, setOwnProperty } from './archive_record.types';
