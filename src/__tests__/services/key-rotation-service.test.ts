import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { IStorage } from '../../storage/interfaces/index.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import type { SigningKeyPair } from '../../crypto/jwt.js';
import {
  KeyRotator,
  KeysAlreadyRotatedError,
  staticRotationStrategy,
  startKeyRotation,
  type RotationStrategy,
} from '../../services/key-rotation-service.js';
import { STATIC_KEY_LIFETIME_MS } from '../../config/constants.js';

const HOUR = 60 * 60 * 1000;
const T0 = new Date('2026-05-01T00:00:00.000Z');

function fakeKeyPair(kid: string): SigningKeyPair {
  return {
    signingKey: { kty: 'RSA', kid, n: `n-${kid}`, e: 'AQAB', d: `d-${kid}` },
    signingKeyPub: { kty: 'RSA', kid, n: `n-${kid}`, e: 'AQAB' },
  };
}

/**
 * Strategy rotating hourly with a half-hour verification window. Keys are
 * numbered in generation order.
 */
function countingStrategy(): RotationStrategy & { generated: number } {
  const strategy = {
    rotationFrequencyMs: HOUR,
    idTokenValidForMs: HOUR / 2,
    generated: 0,
    key: async () => {
      strategy.generated++;
      return fakeKeyPair(`kid-${strategy.generated}`);
    },
  };
  return strategy;
}

describe('KeyRotator', () => {
  let storage: IStorage;
  let now: Date;

  beforeEach(() => {
    storage = createMemoryStorage();
    now = T0;
  });

  it('installs the first key pair', async () => {
    const rotator = new KeyRotator(storage.keys, countingStrategy(), { now: () => now });

    const keys = await rotator.rotate();

    expect(keys).toEqual({
      ...fakeKeyPair('kid-1'),
      verificationKeys: [],
      nextRotation: new Date(T0.getTime() + HOUR),
    });
    expect(await storage.keys.get()).toEqual(keys);
  });

  it('does nothing before the next rotation is due', async () => {
    const strategy = countingStrategy();
    const rotator = new KeyRotator(storage.keys, strategy, { now: () => now });

    await rotator.rotate();
    now = new Date(T0.getTime() + HOUR - 1);

    expect(await rotator.rotate()).toBeUndefined();
    expect(strategy.generated).toBe(1);
  });

  it('demotes the current public key to a verification key', async () => {
    const rotator = new KeyRotator(storage.keys, countingStrategy(), { now: () => now });

    await rotator.rotate();
    const t1 = new Date(T0.getTime() + HOUR);
    now = t1;
    const keys = await rotator.rotate();

    expect(keys?.signingKeyPub?.kid).toBe('kid-2');
    expect(keys?.verificationKeys).toEqual([
      {
        publicKey: fakeKeyPair('kid-1').signingKeyPub,
        expiry: new Date(t1.getTime() + HOUR / 2),
      },
    ]);
    expect(keys?.nextRotation).toEqual(new Date(t1.getTime() + HOUR));
  });

  it('drops verification keys that have expired', async () => {
    const rotator = new KeyRotator(storage.keys, countingStrategy(), { now: () => now });

    await rotator.rotate();
    now = new Date(T0.getTime() + HOUR);
    await rotator.rotate();
    const t2 = new Date(T0.getTime() + 2 * HOUR);
    now = t2;
    const keys = await rotator.rotate();

    expect(keys?.verificationKeys).toEqual([
      {
        publicKey: fakeKeyPair('kid-2').signingKeyPub,
        expiry: new Date(t2.getTime() + HOUR / 2),
      },
    ]);
  });

  it('detects a rotation by another instance between read and write', async () => {
    const other = new KeyRotator(storage.keys, countingStrategy(), { now: () => now });
    const racing: RotationStrategy = {
      rotationFrequencyMs: HOUR,
      idTokenValidForMs: HOUR,
      key: async () => {
        await other.rotate();
        return fakeKeyPair('loser');
      },
    };
    const rotator = new KeyRotator(storage.keys, racing, { now: () => now });

    await expect(rotator.rotate()).rejects.toBeInstanceOf(KeysAlreadyRotatedError);
    expect((await storage.keys.get()).signingKeyPub?.kid).toBe('kid-1');
  });

  it('keeps a static key for a century', async () => {
    const rotator = new KeyRotator(storage.keys, staticRotationStrategy(fakeKeyPair('static')), {
      now: () => now,
    });

    const keys = await rotator.rotate();

    expect(keys?.signingKeyPub?.kid).toBe('static');
    expect(keys?.nextRotation).toEqual(new Date(T0.getTime() + STATIC_KEY_LIFETIME_MS));
  });
});

describe('startKeyRotation', () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: T0 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('rotates immediately and then whenever rotation falls due', async () => {
    const storage = createMemoryStorage();
    const strategy = countingStrategy();
    const rotator = new KeyRotator(storage.keys, strategy);

    const stop = await startKeyRotation(rotator, { checkIntervalMs: 10 * 60 * 1000 });
    expect(strategy.generated).toBe(1);

    await vi.advanceTimersByTimeAsync(HOUR);
    expect(strategy.generated).toBe(2);
    expect((await storage.keys.get()).signingKeyPub?.kid).toBe('kid-2');

    stop();
    await vi.advanceTimersByTimeAsync(2 * HOUR);
    expect(strategy.generated).toBe(2);
  });

  it('fails when the first rotation fails', async () => {
    const storage = createMemoryStorage();
    const rotator = new KeyRotator(storage.keys, {
      rotationFrequencyMs: HOUR,
      idTokenValidForMs: HOUR,
      key: async () => {
        throw new Error('no entropy');
      },
    });

    await expect(startKeyRotation(rotator, { checkIntervalMs: 1000 })).rejects.toThrow(
      'no entropy'
    );
  });
});
