// src/core/credentials/KeyvCredentialStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import { z } from 'zod';
import type { AppCredentials } from '../auth/types';
import type { CredentialStore, CredentialStoreConfig, StoredCredentials } from './types';
import { SecretEncryption } from './SecretEncryption';
import type { Logger } from '../../observability/Logger';
import { ConfigurationError, errorMessage } from '../../utils/errors';

const StoredCredentialsSchema = z.object({
  username: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

/**
 * App credentials keyed by username, on any keyv backend.
 *
 * Values are stored as JSON strings; with encryption configured the whole
 * record is sealed, so neither the client id nor the secret is readable at rest.
 */
export class KeyvCredentialStore implements CredentialStore {
  private store: Keyv<string>;
  private encryption?: SecretEncryption;

  constructor(
    config: CredentialStoreConfig,
    private logger: Logger
  ) {
    const namespace = config.namespace ?? 'reddit-transfer';

    if (config.backend === 'redis') {
      this.store = new Keyv<string>({ store: new KeyvRedis(this.requireUrl(config)), namespace });
    } else if (config.backend === 'postgres') {
      this.store = new Keyv<string>({
        store: new KeyvPostgres({ uri: this.requireUrl(config) }),
        namespace,
      });
    } else {
      this.store = new Keyv<string>({ namespace });
    }

    this.store.on('error', (error: unknown) => {
      this.logger.error('Credential store backend error', { error: errorMessage(error) });
    });

    if (config.encryption) {
      this.encryption = new SecretEncryption(
        config.encryption.key,
        config.encryption.previousKeys
      );
    }
  }

  async getCredentials(username: string): Promise<AppCredentials | null> {
    const stored = await this.getStoredCredentials(username);
    if (!stored) {
      this.logger.debug('Credentials not found', { username });
      return null;
    }
    return { clientId: stored.clientId, clientSecret: stored.clientSecret };
  }

  async setCredentials(username: string, credentials: AppCredentials): Promise<void> {
    const existing = await this.getStoredCredentials(username);
    const now = new Date();

    const stored: StoredCredentials = {
      username,
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    const serialized = JSON.stringify(stored);
    await this.store.set(
      this.createKey(username),
      this.encryption ? this.encryption.encrypt(serialized) : serialized
    );

    this.logger.info('Credentials saved', { username, encrypted: !!this.encryption });
  }

  async deleteCredentials(username: string): Promise<boolean> {
    const deleted = await this.store.delete(this.createKey(username));
    this.logger.info('Credentials deleted', { username, deleted });
    return deleted;
  }

  private createKey(username: string): string {
    // Reddit usernames are case-insensitive
    return `credentials:${username.toLowerCase()}`;
  }

  private async getStoredCredentials(username: string): Promise<StoredCredentials | null> {
    const raw = await this.store.get(this.createKey(username));
    if (!raw) return null;

    try {
      const json = this.encryption ? this.encryption.decrypt(raw) : raw;
      return StoredCredentialsSchema.parse(JSON.parse(json));
    } catch (error: unknown) {
      throw new ConfigurationError(`Stored credentials for /u/${username} are unreadable`, {
        username,
        cause: errorMessage(error),
      });
    }
  }

  private requireUrl(config: CredentialStoreConfig): string {
    if (!config.url) {
      throw new ConfigurationError(`Credential store backend '${config.backend}' requires a url`);
    }
    return config.url;
  }
}
