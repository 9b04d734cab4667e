/**
 * ConfigManager Types
 */

/**
 * Contents of `.k7/config.json`. Every field is optional; see ConfigManager
 * for the defaults.
 */
export type K7Config = {
  /** Archive password; `K7_ENCRYPTION_PASSWORD` takes precedence */
  encryptionPassword?: string;
  /** Metadata key holding an account's role set */
  roleMetadataKey?: string;
  /** Largest archive accepted by import, in bytes */
  maxArchiveBytes?: number;
  /** Lifetime of the persisted run log, in seconds */
  logRetentionSeconds?: number;
  /** Directory of FsAccountStore, relative to the project root */
  accountsDir?: string;
};

/** K7Config with defaults applied. The password stays optional. */
export type ResolvedK7Config = Required<Omit<K7Config, 'encryptionPassword'>> & {
  encryptionPassword: string | null;
};

/** Environment variables the configuration reads. */
export type K7Environment = {
  K7_ENCRYPTION_PASSWORD?: string | undefined;
};

export interface IConfigManager {
  loadConfig(): Promise<K7Config | null>;
  getEncryptionPassword(): Promise<string | null>;
  getRoleMetadataKey(): Promise<string>;
  getMaxArchiveBytes(): Promise<number>;
  getLogRetentionSeconds(): Promise<number>;
  getAccountsDir(): Promise<string>;
  getResolvedConfig(): Promise<ResolvedK7Config>;
}
