import type { AccountInput, AccountPatch, AccountProfile } from '../account_store';
import type { ArchiveRecord } from '../record_types';
import { formatDateTime } from '../utils';
import {
  sanitizeEmail,
  sanitizeMultiline,
  sanitizeText,
  sanitizeUrl,
  slugify,
} from './sanitize';

/**
 * Profile columns for a record, with defaults for absent attributes.
 * `registeredAt` is left out: create and update treat it differently.
 */
function buildProfile(record: ArchiveRecord, key: string): Omit<AccountProfile, 'registeredAt'> {
  const { attributes } = record;
  return {
    email: sanitizeEmail(attributes.email ?? ''),
    url: sanitizeUrl(attributes.url ?? ''),
    niceKey: slugify(attributes.niceKey ?? '') || slugify(key),
    displayName: sanitizeText(attributes.displayName ?? '') || key,
    firstName: sanitizeText(attributes.firstName ?? ''),
    lastName: sanitizeText(attributes.lastName ?? ''),
    description: sanitizeMultiline(attributes.description ?? ''),
  };
}

function archivedRegistration(record: ArchiveRecord): string | undefined {
  const registeredAt = sanitizeText(record.attributes.registeredAt ?? '');
  return registeredAt === '' ? undefined : registeredAt;
}

/**
 * Create request. A record without a registration date is registered `now`.
 */
export function buildCreateRequest(record: ArchiveRecord, key: string, now: Date): AccountInput {
  const input: AccountInput = {
    key,
    ...buildProfile(record, key),
    registeredAt: archivedRegistration(record) ?? formatDateTime(now),
  };
  if (record.credentialHash) {
    input.credentialHash = record.credentialHash;
  }
  return input;
}

/**
 * Update request for an existing account. The registration date and the
 * credential hash are only changed when the archive carries them.
 */
export function buildUpdateRequest(record: ArchiveRecord, key: string): AccountPatch {
  const patch: AccountPatch = buildProfile(record, key);
  const registeredAt = archivedRegistration(record);
  if (registeredAt !== undefined) {
    patch.registeredAt = registeredAt;
  }
  if (record.credentialHash) {
    patch.credentialHash = record.credentialHash;
  }
  return patch;
}
