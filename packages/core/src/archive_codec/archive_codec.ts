import { gunzipSync, gzipSync, constants as zlibConstants } from "zlib";
import { EncryptionService } from "../crypto";
import type { ArchiveRecord, RecordIssue } from "../record_types";
import type { LogSink } from "../operation_log";
import { ArchiveCodecError } from "./errors";
import { fromArchiveObject, toArchiveObject } from "./record_mapper";

/**
 * Result of opening an archive, with the mapping issues found on the way.
 */
export type OpenedArchive = {
  records: ArchiveRecord[];
  issues: RecordIssue[];
};

/**
 * ArchiveCodec - byte-level export/import transform for `.k7` archives
 *
 * seal: records → JSON → gzip (level 9) → EncryptionService → base64 text
 * open: the exact inverse, then best-effort record mapping
 *
 * Stage failures short-circuit. Seal wraps every failure in ArchiveCodecError;
 * open lets CryptoError through unchanged and wraps the later stages.
 * When a log is given, each stage appends its outcome before returning or
 * throwing.
 *
 * @example
 * ```typescript
 * const codec = new ArchiveCodec();
 * const bytes = codec.seal(records, 'test-secret');
 * const restored = codec.open(bytes, 'test-secret');
 * ```
 */
export class ArchiveCodec {
  private readonly encryption: EncryptionService;

  constructor(encryption: EncryptionService = new EncryptionService()) {
    this.encryption = encryption;
  }

  seal(records: readonly ArchiveRecord[], password: string, log?: LogSink): Buffer {
    let json: string;
    try {
      json = JSON.stringify(records.map(toArchiveObject), null, 2);
    } catch (error) {
      log?.append(`Error encoding account data to JSON: ${describe(error)}`, 'ERROR');
      throw new ArchiveCodecError('Could not serialize records to JSON', 'SERIALIZE_FAILED', { cause: error });
    }
    log?.append(`Serialized ${records.length} record(s) to JSON.`, 'INFO');

    let compressed: Buffer;
    try {
      compressed = gzipSync(Buffer.from(json, 'utf8'), { level: zlibConstants.Z_BEST_COMPRESSION });
    } catch (error) {
      log?.append(`Error compressing archive data: ${describe(error)}`, 'ERROR');
      throw new ArchiveCodecError('Could not compress archive data', 'COMPRESS_FAILED', { cause: error });
    }
    log?.append(`Compressed archive data (${json.length} → ${compressed.length} bytes).`, 'INFO');

    let sealed: string;
    try {
      sealed = this.encryption.seal(compressed, password);
    } catch (error) {
      log?.append(`Fatal error during archive encryption: ${describe(error)}`, 'ERROR');
      throw new ArchiveCodecError('Could not encrypt archive data', 'ENCRYPT_FAILED', { cause: error });
    }
    log?.append('Compressed data encrypted.', 'INFO');

    return Buffer.from(sealed, 'ascii');
  }

  open(bytes: Buffer | string, password: string, log?: LogSink): ArchiveRecord[] {
    return this.openWithReport(bytes, password, log).records;
  }

  openWithReport(bytes: Buffer | string, password: string, log?: LogSink): OpenedArchive {
    const text = typeof bytes === 'string' ? bytes : bytes.toString('utf8');

    let compressed: Buffer;
    try {
      compressed = this.encryption.open(text, password);
    } catch (error) {
      log?.append(`Failed to decrypt archive: ${describe(error)}`, 'ERROR');
      throw error;
    }
    log?.append('Archive data decrypted.', 'INFO');

    let json: string;
    try {
      json = gunzipSync(compressed).toString('utf8');
    } catch (error) {
      log?.append('Failed to decompress archive data after decryption.', 'ERROR');
      throw new ArchiveCodecError(
        'Could not decompress archive data. The file may be corrupted or not a K7 archive.',
        'DECOMPRESS_FAILED',
        { cause: error }
      );
    }
    log?.append('Decrypted data decompressed.', 'INFO');

    const parsed = parseJson(json, log);
    if (!Array.isArray(parsed)) {
      log?.append('Archive JSON is not a list of records.', 'ERROR');
      throw new ArchiveCodecError('Archive does not contain a list of records', 'PARSE_FAILED');
    }
    log?.append(`Parsed archive JSON, found ${parsed.length} entr${parsed.length === 1 ? 'y' : 'ies'}.`, 'INFO');

    const records: ArchiveRecord[] = [];
    const issues: RecordIssue[] = [];
    parsed.forEach((element: unknown, index) => {
      const mapped = fromArchiveObject(element, index);
      records.push(mapped.record);
      issues.push(...mapped.issues);
    });

    return { records, issues };
  }
}

function parseJson(json: string, log?: LogSink): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    log?.append(`Failed to parse archive JSON: ${describe(error)}`, 'ERROR');
    throw new ArchiveCodecError('Archive does not contain valid JSON', 'PARSE_FAILED', { cause: error });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
