import archiveRecordSchema from './archive_record_schema.json';

export { SchemaValidationCache } from './schema_cache';

/**
 * JSON schemas shipped with the core package.
 */
export const Schemas = {
  ArchiveRecord: archiveRecordSchema,
} as const;
