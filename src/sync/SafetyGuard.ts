// src/sync/SafetyGuard.ts

import type { CredentialId } from '../connectors/types';
import type { Logger } from '../observability/Logger';
import { ConfigurationError } from '../utils/errors';

export interface IdentifiedAccount {
  username: string;
  identity: CredentialId;
}

/**
 * Pre-flight check gating every multi-account operation.
 */
export class SafetyGuard {
  constructor(private logger: Logger) {}

  /**
   * Throws unless source and destination are distinct accounts with distinct
   * app credentials. Must run before the first remote call of a run.
   *
   * @throws {ConfigurationError} On a shared client id or the same username
   */
  assertDistinctIdentity(src: IdentifiedAccount, dst: IdentifiedAccount): void {
    if (src.identity === dst.identity) {
      this.logger.error('Source and destination share app credentials', {
        source: src.username,
        destination: dst.username,
      });
      throw new ConfigurationError('You must generate one set of app credentials per account', {
        source: src.username,
        destination: dst.username,
      });
    }

    if (src.username.toLowerCase() === dst.username.toLowerCase()) {
      this.logger.error('Source and destination are the same account', {
        source: src.username,
        destination: dst.username,
      });
      throw new ConfigurationError('Source and destination must be different accounts', {
        source: src.username,
        destination: dst.username,
      });
    }

    this.logger.debug('Safety check passed', { source: src.username, destination: dst.username });
  }
}
