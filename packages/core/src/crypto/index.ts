export { EncryptionService, CIPHER_ALGORITHM, IV_LENGTH, BLOCK_SIZE, KEY_LENGTH } from './encryption_service';
export type { SealedBlob } from './encryption_service';
export { CryptoError } from './errors';
export type { CryptoErrorCode } from './errors';
