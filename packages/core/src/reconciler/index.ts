export { Reconciler, formatRef } from './reconciler';
export { buildCreateRequest, buildUpdateRequest } from './account_request';
export {
  normalizeKey,
  sanitizeEmail,
  sanitizeUrl,
  sanitizeText,
  sanitizeMultiline,
  slugify,
  stripTags,
} from './sanitize';
export type {
  StoreRef,
  SkipReason,
  MetadataError,
  AppliedDecision,
  SkippedDecision,
  Decision,
  ReconcileSummary,
  ReconcileResult,
  ReconcileOptions,
  ReconcilerDependencies,
} from './reconciler.types';
