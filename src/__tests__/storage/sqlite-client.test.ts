import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { AuthCode, AuthRequest, DeviceToken, Password } from '../../types/storage.js';
import { SqliteClient, convertDBError, openSqliteStorage } from '../../storage/sqlite/index.js';
import { AlreadyExistsError, NotFoundError, StorageError } from '../../errors/storage-error.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const PAST = new Date(NOW.getTime() - 60 * 1000);

const password: Password = {
  email: 'jane@example.com',
  hash: '$2a$10$placeholder',
  username: 'jane',
  userId: 'user-1',
};

function capture(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected a driver error');
}

describe('convertDBError', () => {
  let client: SqliteClient;

  beforeEach(() => {
    client = new SqliteClient(':memory:');
  });

  afterEach(() => {
    client.close();
  });

  it('maps a primary key collision to AlreadyExistsError', () => {
    const insert = client.sqlite.prepare(
      'INSERT INTO passwords (email, hash, username, user_id) VALUES (?, ?, ?, ?)'
    );
    insert.run('jane@example.com', 'hash', 'jane', 'user-1');

    const err = convertDBError(
      'password',
      capture(() => insert.run('jane@example.com', 'hash', 'jane', 'user-1')),
      'jane@example.com'
    );

    expect(err).toBeInstanceOf(AlreadyExistsError);
    expect(err.message).toBe('password "jane@example.com": already exists');
  });

  it('keeps other constraint failures as backend errors', () => {
    const driverErr = capture(() =>
      client.sqlite
        .prepare('INSERT INTO passwords (email, username, user_id) VALUES (?, ?, ?)')
        .run('jane@example.com', 'jane', 'user-1')
    );

    const err = convertDBError('password', driverErr, 'jane@example.com');

    expect(err).toBeInstanceOf(StorageError);
    expect(err).not.toBeInstanceOf(AlreadyExistsError);
    expect(err.kind).toBe('backend');
    expect(err.message).toBe('password "jane@example.com": NOT NULL constraint failed: passwords.hash');
    expect(err.cause).toBe(driverErr);
  });

  it('omits the id when there is none', () => {
    const err = convertDBError('gc auth codes', new Error('disk I/O error'));

    expect(err.message).toBe('gc auth codes: disk I/O error');
  });
});

describe('sqlite storage', () => {
  let client: SqliteClient;
  let storage: IStorage;

  beforeEach(() => {
    client = new SqliteClient(':memory:');
    storage = openSqliteStorage(client);
  });

  afterEach(async () => {
    await storage.close();
  });

  it('refuses a second password for the same email', async () => {
    await storage.passwords.create(password);

    await expect(
      storage.passwords.create({ ...password, username: 'someone-else' })
    ).rejects.toBeInstanceOf(AlreadyExistsError);
    expect(await storage.passwords.get(password.email)).toEqual(password);
  });

  it('stops garbage collection at the first failing table', async () => {
    const authRequest: AuthRequest = {
      id: 'req-1',
      clientId: 'web-app',
      responseTypes: ['code'],
      scopes: ['openid'],
      redirectURI: 'https://app.example.com/callback',
      nonce: '',
      state: 'state-1',
      forceApprovalPrompt: false,
      expiry: PAST,
      loggedIn: false,
      connectorId: 'gitlab',
      pkce: { codeChallenge: '', codeChallengeMethod: '' },
    };
    const authCode: AuthCode = {
      id: 'code-1',
      clientId: 'web-app',
      redirectURI: 'https://app.example.com/callback',
      nonce: '',
      scopes: ['openid'],
      connectorId: 'gitlab',
      claims: {
        userId: 'user-1',
        username: 'jane',
        email: 'jane@example.com',
        emailVerified: true,
        groups: [],
      },
      expiry: PAST,
      pkce: { codeChallenge: '', codeChallengeMethod: '' },
    };
    const deviceToken: DeviceToken = {
      deviceCode: 'device-1',
      status: 'pending',
      token: '',
      expiry: PAST,
      lastRequestTime: PAST,
      pollIntervalSeconds: 5,
      pkce: { codeChallenge: '', codeChallengeMethod: '' },
    };
    await storage.authRequests.create(authRequest);
    await storage.authCodes.create(authCode);
    await storage.deviceTokens.create(deviceToken);

    client.sqlite.exec('DROP TABLE device_requests');

    const err = await storage.garbageCollect(NOW).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({
      kind: 'backend',
      message: expect.stringMatching(/^gc device requests: .*no such table: device_requests$/),
    });
    await expect(storage.authRequests.get('req-1')).rejects.toBeInstanceOf(NotFoundError);
    await expect(storage.authCodes.get('code-1')).rejects.toBeInstanceOf(NotFoundError);
    expect(await storage.deviceTokens.get('device-1')).toEqual(deviceToken);
  });
});
