// src/core/credentials/types.ts

import type { AppCredentials } from '../auth/types';

/**
 * Read side of the credential store, the only part the sync engine touches.
 */
export interface CredentialStore {
  getCredentials(username: string): Promise<AppCredentials | null>;
}

export interface StoredCredentials extends AppCredentials {
  username: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CredentialStoreConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
  namespace?: string;
  encryption?: {
    key: string;
    previousKeys?: string[];
    algorithm: 'aes-256-gcm';
  };
}
