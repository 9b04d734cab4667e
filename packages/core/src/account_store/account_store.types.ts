import type { JsonObject, JsonValue } from '../record_types';

/** Numeric store id, allocated by the store on create. */
export type AccountId = number;

/** Profile columns every stored account has. Absent values are `''`. */
export type AccountProfile = {
  email: string;
  url: string;
  niceKey: string;
  displayName: string;
  firstName: string;
  lastName: string;
  description: string;
  /** `YYYY-MM-DD HH:mm:ss`, UTC */
  registeredAt: string;
};

export type StoredAccount = AccountProfile & {
  id: AccountId;
  key: string;
  /** Opaque pre-hashed secret; `''` when the account has none */
  credentialHash: string;
  metadata: JsonObject;
};

/** Create request: every profile column is given. */
export type AccountInput = AccountProfile & {
  key: string;
  credentialHash?: string;
};

/** Update request: only the given fields change. */
export type AccountPatch = Partial<AccountProfile> & {
  credentialHash?: string;
};

export type AccountStoreOperation =
  | 'findByKey'
  | 'create'
  | 'update'
  | 'setMetadata'
  | 'clearRoles'
  | 'list';

/** One call as recorded by MemoryAccountStore's journal. */
export type AccountStoreCall =
  | { operation: 'findByKey'; key: string }
  | { operation: 'create'; key: string }
  | { operation: 'update'; id: AccountId }
  | { operation: 'setMetadata'; id: AccountId; metaKey: string; value: JsonValue }
  | { operation: 'clearRoles'; id: AccountId }
  | { operation: 'list' };

export const DEFAULT_ROLE_METADATA_KEY = 'capabilities';

export type AccountStoreOptions = {
  /** Metadata key holding the role set, default `capabilities` */
  roleMetadataKey?: string;
};
