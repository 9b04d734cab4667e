import type { AccountId, AccountInput, AccountPatch, StoredAccount } from './account_store.types';

export function buildStoredAccount(id: AccountId, input: AccountInput): StoredAccount {
  return {
    id,
    key: input.key,
    credentialHash: input.credentialHash ?? '',
    email: input.email,
    url: input.url,
    niceKey: input.niceKey,
    displayName: input.displayName,
    firstName: input.firstName,
    lastName: input.lastName,
    description: input.description,
    registeredAt: input.registeredAt,
    metadata: {},
  };
}

/** Returns a new account with the defined fields of `patch` applied. */
export function applyPatch(account: StoredAccount, patch: AccountPatch): StoredAccount {
  const next: StoredAccount = { ...account, metadata: { ...account.metadata } };
  if (patch.credentialHash !== undefined) next.credentialHash = patch.credentialHash;
  if (patch.email !== undefined) next.email = patch.email;
  if (patch.url !== undefined) next.url = patch.url;
  if (patch.niceKey !== undefined) next.niceKey = patch.niceKey;
  if (patch.displayName !== undefined) next.displayName = patch.displayName;
  if (patch.firstName !== undefined) next.firstName = patch.firstName;
  if (patch.lastName !== undefined) next.lastName = patch.lastName;
  if (patch.description !== undefined) next.description = patch.description;
  if (patch.registeredAt !== undefined) next.registeredAt = patch.registeredAt;
  return next;
}
