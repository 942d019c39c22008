import type { IRefreshTokenStorage } from '../storage/interfaces/index.js';
import type { RefreshToken } from '../types/storage.js';
import { constantTimeCompare } from '../crypto/hash.js';
import { generateToken } from '../crypto/random.js';
import { noopLogger, type Logger } from '../utils/logger.js';

export type InvalidRefreshTokenReason = 'mismatch' | 'expired' | 'unused' | 'client_mismatch';

export class InvalidRefreshTokenError extends Error {
  constructor(
    public readonly reason: InvalidRefreshTokenReason,
    refreshTokenId: string
  ) {
    super(`refresh token "${refreshTokenId}": ${describeReason(reason)}`);
    this.name = 'InvalidRefreshTokenError';
  }
}

function describeReason(reason: InvalidRefreshTokenReason): string {
  switch (reason) {
    case 'mismatch':
      return 'presented token does not match';
    case 'expired':
      return 'token has expired';
    case 'unused':
      return 'token expired after a period of inactivity';
    case 'client_mismatch':
      return 'token was issued to another client';
  }
}

/**
 * Refresh token lifetime rules. A zero duration disables that check.
 */
export interface RefreshTokenPolicy {
  rotate: boolean;
  absoluteLifetimeMs: number;
  validIfNotUsedForMs: number;
  reuseIntervalMs: number;
}

export interface RefreshTokenServiceOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Service for refresh token rotation
 */
export class RefreshTokenService {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly storage: IRefreshTokenStorage,
    private readonly policy: RefreshTokenPolicy,
    options: RefreshTokenServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? noopLogger;
  }

  completelyExpired(createdAt: Date, now = this.now()): boolean {
    if (this.policy.absoluteLifetimeMs <= 0) {
      return false;
    }
    return now.getTime() > createdAt.getTime() + this.policy.absoluteLifetimeMs;
  }

  expiredBecauseUnused(lastUsed: Date, now = this.now()): boolean {
    if (this.policy.validIfNotUsedForMs <= 0) {
      return false;
    }
    return now.getTime() > lastUsed.getTime() + this.policy.validIfNotUsedForMs;
  }

  allowedToReuse(lastUsed: Date, now = this.now()): boolean {
    if (this.policy.reuseIntervalMs <= 0) {
      return false;
    }
    return now.getTime() <= lastUsed.getTime() + this.policy.reuseIntervalMs;
  }

  /**
   * Exchange a presented refresh token for its successor.
   *
   * The check and the write happen in one storage update, so two clients
   * racing with the same token serialize: the loser presents what is now
   * the obsolete token and, inside the reuse interval, receives the
   * winner's token.
   */
  async rotate(id: string, presentedToken: string, clientId?: string): Promise<RefreshToken> {
    const now = this.now();

    const updated = await this.storage.update(id, (old) => {
      if (clientId !== undefined && old.clientId !== clientId) {
        throw new InvalidRefreshTokenError('client_mismatch', id);
      }
      if (this.completelyExpired(old.createdAt, now)) {
        throw new InvalidRefreshTokenError('expired', id);
      }
      if (this.expiredBecauseUnused(old.lastUsed, now)) {
        throw new InvalidRefreshTokenError('unused', id);
      }

      if (constantTimeCompare(presentedToken, old.token)) {
        if (!this.policy.rotate) {
          return { ...old, lastUsed: now };
        }
        return {
          ...old,
          obsoleteToken: old.token,
          token: generateToken(),
          lastUsed: now,
        };
      }

      if (
        old.obsoleteToken !== '' &&
        constantTimeCompare(presentedToken, old.obsoleteToken) &&
        this.allowedToReuse(old.lastUsed, now)
      ) {
        return old;
      }

      throw new InvalidRefreshTokenError('mismatch', id);
    });

    this.logger.debug('refresh token used', {
      refreshTokenId: id,
      clientId: updated.clientId,
      rotated: updated.token !== presentedToken,
    });

    return updated;
  }
}
