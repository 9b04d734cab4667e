import { createCipheriv, createDecipheriv, randomBytes } from "crypto";
import { CryptoError } from "./errors";

export const CIPHER_ALGORITHM = "aes-256-cbc";
export const IV_LENGTH = 16;
export const BLOCK_SIZE = 16;
export const KEY_LENGTH = 32;

const STRICT_BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * IV and ciphertext as produced by a single seal operation.
 * Externally represented as `base64(iv || ciphertext)`.
 */
export type SealedBlob = {
  iv: Buffer;
  ciphertext: Buffer;
};

/**
 * Password-keyed AES-256-CBC encryption for archive payloads.
 *
 * The key is the UTF-8 password itself, zero-padded or truncated to 32 bytes
 * (the OpenSSL convention earlier archives were written with). There is no
 * key derivation and no authentication tag: a wrong password and a corrupted
 * file both surface as DECRYPT_FAILED, and tampering is not detected.
 * Changing either would change the archive format.
 *
 * Stateless: every call is independent of the previous ones.
 */
export class EncryptionService {
  /**
   * Encrypts `plaintext` under a fresh random IV.
   */
  sealBlob(plaintext: Buffer, password: string): SealedBlob {
    const key = this.deriveKey(password);
    const iv = randomBytes(IV_LENGTH);

    const cipher = createCipheriv(CIPHER_ALGORITHM, key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return { iv, ciphertext };
  }

  /**
   * Encrypts `plaintext` and returns the external base64 framing.
   */
  seal(plaintext: Buffer, password: string): string {
    return EncryptionService.encodeBlob(this.sealBlob(plaintext, password));
  }

  /**
   * Decrypts a blob. Any cipher failure, padding included, is DECRYPT_FAILED.
   */
  openBlob(blob: SealedBlob, password: string): Buffer {
    const key = this.deriveKey(password);

    if (blob.iv.length !== IV_LENGTH || blob.ciphertext.length < BLOCK_SIZE) {
      throw new CryptoError(
        `Sealed data is truncated: expected a ${IV_LENGTH}-byte IV and at least one ${BLOCK_SIZE}-byte block`,
        'TRUNCATED'
      );
    }

    try {
      const decipher = createDecipheriv(CIPHER_ALGORITHM, key, blob.iv);
      return Buffer.concat([decipher.update(blob.ciphertext), decipher.final()]);
    } catch (error) {
      throw new CryptoError(
        'Decryption failed. The password is wrong or the data is corrupted.',
        'DECRYPT_FAILED',
        { cause: error }
      );
    }
  }

  /**
   * Decodes the base64 framing and decrypts.
   */
  open(encoded: string, password: string): Buffer {
    // checked before decoding so a missing password wins over bad input
    this.deriveKey(password);
    return this.openBlob(EncryptionService.decodeBlob(encoded), password);
  }

  /**
   * `base64(iv || ciphertext)`
   */
  static encodeBlob(blob: SealedBlob): string {
    return Buffer.concat([blob.iv, blob.ciphertext]).toString("base64");
  }

  /**
   * Strict inverse of encodeBlob.
   *
   * Surrounding whitespace is ignored; anything else outside the base64
   * alphabet, or a length that is not a multiple of four, is rejected.
   */
  static decodeBlob(encoded: string): SealedBlob {
    const text = encoded.trim();

    if (text.length % 4 !== 0 || !STRICT_BASE64.test(text)) {
      throw new CryptoError('Sealed data is not valid base64', 'MALFORMED_ENCODING');
    }

    const raw = Buffer.from(text, "base64");
    if (raw.length < IV_LENGTH + BLOCK_SIZE) {
      throw new CryptoError(
        `Sealed data is truncated: ${raw.length} bytes, need at least ${IV_LENGTH + BLOCK_SIZE}`,
        'TRUNCATED'
      );
    }

    return {
      iv: raw.subarray(0, IV_LENGTH),
      ciphertext: raw.subarray(IV_LENGTH),
    };
  }

  private deriveKey(password: string): Buffer {
    if (password.length === 0) {
      throw new CryptoError('An encryption password is required', 'MISSING_PASSWORD');
    }

    const key = Buffer.alloc(KEY_LENGTH);
    Buffer.from(password, "utf8").copy(key, 0, 0, KEY_LENGTH);
    return key;
  }
}
