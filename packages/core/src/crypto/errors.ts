/**
 * Error codes for EncryptionService operations.
 */
export type CryptoErrorCode =
  | 'MISSING_PASSWORD'
  | 'MALFORMED_ENCODING'
  | 'TRUNCATED'
  | 'DECRYPT_FAILED';

/**
 * Error thrown when sealing or opening a blob fails.
 *
 * DECRYPT_FAILED covers both a wrong password and a corrupted ciphertext:
 * CBC without an authentication tag gives no way to tell them apart.
 */
export class CryptoError extends Error {
  constructor(
    message: string,
    public readonly code: CryptoErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CryptoError';
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}
