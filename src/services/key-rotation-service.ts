import type { IKeyStorage } from '../storage/interfaces/index.js';
import type { Keys } from '../types/storage.js';
import type { SigningKeyPair } from '../crypto/jwt.js';
import { generateRsaKeyPair } from '../crypto/jwt.js';
import { isNotFound } from '../errors/storage-error.js';
import { STATIC_KEY_LIFETIME_MS } from '../config/constants.js';
import { noopLogger, type Logger } from '../utils/logger.js';

/**
 * Another instance rotated the keys between our read and our write
 */
export class KeysAlreadyRotatedError extends Error {
  constructor(nextRotation: Date) {
    super(`keys already rotated by another server instance, next rotation at ${nextRotation.toISOString()}`);
    this.name = 'KeysAlreadyRotatedError';
  }
}

/**
 * How often keys rotate and how long a demoted key keeps verifying tokens
 */
export interface RotationStrategy {
  rotationFrequencyMs: number;
  idTokenValidForMs: number;
  key: () => Promise<SigningKeyPair>;
}

export function defaultRotationStrategy(
  rotationFrequencyMs: number,
  idTokenValidForMs: number
): RotationStrategy {
  return {
    rotationFrequencyMs,
    idTokenValidForMs,
    key: generateRsaKeyPair,
  };
}

/**
 * Never rotates in practice. The same key pair is installed every time.
 */
export function staticRotationStrategy(keyPair: SigningKeyPair): RotationStrategy {
  return {
    rotationFrequencyMs: STATIC_KEY_LIFETIME_MS,
    idTokenValidForMs: STATIC_KEY_LIFETIME_MS,
    key: async () => keyPair,
  };
}

export interface KeyRotatorOptions {
  now?: () => Date;
  logger?: Logger;
}

export class KeyRotator {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly storage: IKeyStorage,
    private readonly strategy: RotationStrategy,
    options: KeyRotatorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Rotate the signing key when due. Returns the stored keys after
   * rotation, or undefined when rotation was not due yet.
   */
  async rotate(): Promise<Keys | undefined> {
    const now = this.now();

    const current = await this.currentKeys();
    if (current && now < current.nextRotation) {
      return undefined;
    }

    // Key generation is slow; keep it out of the storage transaction
    const keyPair = await this.strategy.key();
    if (!keyPair.signingKeyPub.kid) {
      throw new Error('rotate keys: generated key has no key id');
    }

    const updated = await this.storage.update((keys) => {
      if (now < keys.nextRotation) {
        throw new KeysAlreadyRotatedError(keys.nextRotation);
      }

      const verificationKeys = keys.verificationKeys.filter((key) => key.expiry >= now);

      if (keys.signingKeyPub) {
        verificationKeys.push({
          publicKey: keys.signingKeyPub,
          expiry: new Date(now.getTime() + this.strategy.idTokenValidForMs),
        });
      }

      return {
        signingKey: keyPair.signingKey,
        signingKeyPub: keyPair.signingKeyPub,
        verificationKeys,
        nextRotation: new Date(now.getTime() + this.strategy.rotationFrequencyMs),
      };
    });

    this.logger.info('keys rotated', {
      kid: keyPair.signingKeyPub.kid,
      nextRotation: updated.nextRotation.toISOString(),
      verificationKeys: updated.verificationKeys.length,
    });

    return updated;
  }

  private async currentKeys(): Promise<Keys | undefined> {
    try {
      return await this.storage.get();
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw err;
    }
  }
}

export interface KeyRotationSchedule {
  /** How often to check whether rotation is due */
  checkIntervalMs: number;
  logger?: Logger;
}

/**
 * Rotate once, then keep checking on a timer. The first rotation must
 * succeed so the server never starts without a signing key.
 */
export async function startKeyRotation(
  rotator: KeyRotator,
  schedule: KeyRotationSchedule
): Promise<() => void> {
  const logger = schedule.logger ?? noopLogger;

  const tick = async (): Promise<void> => {
    try {
      await rotator.rotate();
    } catch (err) {
      if (err instanceof KeysAlreadyRotatedError) {
        logger.info('key rotation skipped', { reason: err.message });
        return;
      }
      throw err;
    }
  };

  await tick();

  const timer = setInterval(() => {
    tick().catch((err: unknown) => {
      logger.error('failed to rotate keys', { error: err });
    });
  }, schedule.checkIntervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
