// src/sync/PreferenceCopier.ts

import type { AccountHandle } from '../connectors/types';
import type { Logger } from '../observability/Logger';
import { PreferenceCopyError, TransferError, errorMessage } from '../utils/errors';
import type { AccountSnapshot } from './types';

/**
 * Overwrites destination preferences with the source map in one bulk update.
 * Keys the source does not carry are left as they are at the destination.
 */
export class PreferenceCopier {
  constructor(private logger: Logger) {}

  async copyPreferences(
    source: Pick<AccountSnapshot, 'username' | 'preferences'>,
    dst: AccountHandle
  ): Promise<number> {
    const preferences = { ...source.preferences };
    const keyCount = Object.keys(preferences).length;

    this.logger.info('Copying preferences', {
      source: source.username,
      destination: dst.username,
      keyCount,
    });

    try {
      await dst.client.setPreferences(preferences);
    } catch (error: unknown) {
      throw new PreferenceCopyError(`Failed to copy preferences to /u/${dst.username}`, {
        source: source.username,
        destination: dst.username,
        cause: errorMessage(error),
        causeCode: error instanceof TransferError ? error.code : undefined,
      });
    }

    return keyCount;
  }
}
