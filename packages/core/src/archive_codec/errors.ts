/**
 * Pipeline stage that failed while sealing or opening an archive.
 */
export type ArchiveCodecErrorCode =
  | 'SERIALIZE_FAILED'
  | 'COMPRESS_FAILED'
  | 'ENCRYPT_FAILED'
  | 'DECOMPRESS_FAILED'
  | 'PARSE_FAILED';

/**
 * Error thrown by ArchiveCodec. The failing stage's own error is kept as `cause`.
 *
 * Decrypt failures are not wrapped: ArchiveCodec.open lets the CryptoError
 * through so callers can tell "password rejected" from "bytes garbage".
 */
export class ArchiveCodecError extends Error {
  constructor(
    message: string,
    public readonly code: ArchiveCodecErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ArchiveCodecError';
    Object.setPrototypeOf(this, ArchiveCodecError.prototype);
  }
}
