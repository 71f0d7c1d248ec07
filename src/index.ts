// src/index.ts

export { AccountTransfer } from './transfer';
export type { TransferOptions, SyncOptions, ListSavedOptions } from './transfer';
export {
  TransferConfigSchema,
  validateConfig,
  validateConfigSafe,
  loadConfigFromEnv,
} from './config/ConfigValidator';
export type { TransferConfig, ResolvedTransferConfig } from './config/ConfigValidator';

// Engine
export { AccountStateFetcher } from './sync/AccountStateFetcher';
export {
  computeSetDiff,
  computeSavedDiff,
  computeSnapshotDiff,
  isEmptySetDiff,
  isEmptySavedDiff,
  isEmptySnapshotDiff,
} from './sync/DiffEngine';
export { ReconciliationExecutor, DEFAULT_ITEM_RETRY } from './sync/ReconciliationExecutor';
export { PreferenceCopier } from './sync/PreferenceCopier';
export { SafetyGuard } from './sync/SafetyGuard';
export { createSyncReport, finalizeReport, summarizeReport } from './sync/SyncReport';
export type {
  AccountSnapshot,
  SetDiff,
  SavedDiff,
  SnapshotDiff,
  SyncReport,
  SyncCategory,
  SyncOutcome,
  CategoryResult,
  FailedItem,
  ProgressEvent,
} from './sync/types';

// Remote side
export { RedditClient, REDDIT_API_BASE_URL } from './connectors/reddit/RedditClient';
export type { RemoteClient, RemoteClientFactory, AccountHandle, Page, CredentialId } from './connectors/types';
export type { SavedItem, SavedItemKind, SavedSubmission, SavedComment } from './core/normalizer/types';
export { toFullname, savedItemKey } from './core/normalizer/types';
export type { AccountLogin, AppCredentials } from './core/auth/types';
export { KeyvCredentialStore } from './core/credentials/KeyvCredentialStore';
export type { CredentialStore, CredentialStoreConfig } from './core/credentials/types';

// Export error classes for error handling
export {
  TransferError,
  FetchError,
  ConfigurationError,
  UnexpectedTypeError,
  PerItemApplyError,
  PreferenceCopyError,
  AuthError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  CircuitBreakerOpenError,
} from './utils/errors';
