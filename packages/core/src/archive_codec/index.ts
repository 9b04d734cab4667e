export { ArchiveCodec } from './archive_codec';
export type { OpenedArchive } from './archive_codec';
export { ArchiveCodecError } from './errors';
export type { ArchiveCodecErrorCode } from './errors';
export { toArchiveObject, fromArchiveObject, validateArchiveObject } from './record_mapper';
