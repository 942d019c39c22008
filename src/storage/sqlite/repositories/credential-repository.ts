import { eq } from 'drizzle-orm';
import type {
  AuthCode,
  AuthRequest,
  DeviceRequest,
  DeviceToken,
  RefreshToken,
} from '../../../types/storage.js';
import type {
  IAuthCodeStorage,
  IAuthRequestStorage,
  IDeviceRequestStorage,
  IDeviceTokenStorage,
  IRefreshTokenStorage,
  Updater,
} from '../../interfaces/index.js';
import { NotFoundError } from '../../../errors/storage-error.js';
import type { SqliteClient } from '../client.js';
import {
  authCodes,
  authRequests,
  deviceRequests,
  deviceTokens,
  refreshTokens,
  type AuthCodeRow,
  type AuthRequestRow,
  type DeviceRequestRow,
  type DeviceTokenRow,
  type RefreshTokenRow,
} from '../schema.js';
import { deleteRow, fromBuffer, insertRow, query, toBuffer } from './helpers.js';

function rowToAuthRequest(row: AuthRequestRow): AuthRequest {
  return {
    id: row.id,
    clientId: row.clientId,
    responseTypes: row.responseTypes,
    scopes: row.scopes,
    redirectURI: row.redirectURI,
    nonce: row.nonce,
    state: row.state,
    forceApprovalPrompt: row.forceApprovalPrompt,
    expiry: row.expiry,
    loggedIn: row.loggedIn,
    claims: row.claims ?? undefined,
    connectorId: row.connectorId,
    connectorData: fromBuffer(row.connectorData),
    pkce: { codeChallenge: row.codeChallenge, codeChallengeMethod: row.codeChallengeMethod },
  };
}

function authRequestToRow(request: AuthRequest): AuthRequestRow {
  return {
    id: request.id,
    clientId: request.clientId,
    responseTypes: request.responseTypes,
    scopes: request.scopes,
    redirectURI: request.redirectURI,
    nonce: request.nonce,
    state: request.state,
    forceApprovalPrompt: request.forceApprovalPrompt,
    loggedIn: request.loggedIn,
    claims: request.claims ?? null,
    connectorId: request.connectorId,
    connectorData: toBuffer(request.connectorData),
    codeChallenge: request.pkce.codeChallenge,
    codeChallengeMethod: request.pkce.codeChallengeMethod,
    expiry: request.expiry,
  };
}

function rowToAuthCode(row: AuthCodeRow): AuthCode {
  return {
    id: row.id,
    clientId: row.clientId,
    redirectURI: row.redirectURI,
    nonce: row.nonce,
    scopes: row.scopes,
    connectorId: row.connectorId,
    connectorData: fromBuffer(row.connectorData),
    claims: row.claims,
    expiry: row.expiry,
    pkce: { codeChallenge: row.codeChallenge, codeChallengeMethod: row.codeChallengeMethod },
  };
}

function rowToRefreshToken(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    token: row.token,
    obsoleteToken: row.obsoleteToken,
    createdAt: row.createdAt,
    lastUsed: row.lastUsed,
    clientId: row.clientId,
    connectorId: row.connectorId,
    connectorData: fromBuffer(row.connectorData),
    claims: row.claims,
    scopes: row.scopes,
    nonce: row.nonce,
  };
}

function refreshTokenToRow(token: RefreshToken): RefreshTokenRow {
  return {
    ...token,
    connectorData: toBuffer(token.connectorData),
  };
}

function rowToDeviceToken(row: DeviceTokenRow): DeviceToken {
  return {
    deviceCode: row.deviceCode,
    status: row.status,
    token: row.token,
    expiry: row.expiry,
    lastRequestTime: row.lastRequestTime,
    pollIntervalSeconds: row.pollIntervalSeconds,
    pkce: { codeChallenge: row.codeChallenge, codeChallengeMethod: row.codeChallengeMethod },
  };
}

function deviceTokenToRow(token: DeviceToken): DeviceTokenRow {
  return {
    deviceCode: token.deviceCode,
    status: token.status,
    token: token.token,
    expiry: token.expiry,
    lastRequestTime: token.lastRequestTime,
    pollIntervalSeconds: token.pollIntervalSeconds,
    codeChallenge: token.pkce.codeChallenge,
    codeChallengeMethod: token.pkce.codeChallengeMethod,
  };
}

function rowToDeviceRequest(row: DeviceRequestRow): DeviceRequest {
  return { ...row };
}

const AUTH_REQUEST = 'auth request';
const AUTH_CODE = 'auth code';
const REFRESH_TOKEN = 'refresh token';
const DEVICE_REQUEST = 'device request';
const DEVICE_TOKEN = 'device token';

/**
 * SQLite auth request storage implementation
 */
export class SqliteAuthRequestStorage implements IAuthRequestStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(request: AuthRequest): Promise<void> {
    insertRow(AUTH_REQUEST, request.id, () =>
      this.client.db.insert(authRequests).values(authRequestToRow(request)).run()
    );
  }

  async get(id: string): Promise<AuthRequest> {
    const row = query(AUTH_REQUEST, () =>
      this.client.db.select().from(authRequests).where(eq(authRequests.id, id)).get()
    );
    if (!row) {
      throw new NotFoundError(AUTH_REQUEST, id);
    }
    return rowToAuthRequest(row);
  }

  async update(id: string, updater: Updater<AuthRequest>): Promise<AuthRequest> {
    return this.client.transaction(`update ${AUTH_REQUEST}`, (db) => {
      const row = db.select().from(authRequests).where(eq(authRequests.id, id)).get();
      if (!row) {
        throw new NotFoundError(AUTH_REQUEST, id);
      }

      const next = updater(rowToAuthRequest(row));
      db.update(authRequests)
        .set({ ...authRequestToRow(next), id })
        .where(eq(authRequests.id, id))
        .run();
      return { ...next, id };
    });
  }

  async delete(id: string): Promise<void> {
    deleteRow(AUTH_REQUEST, id, () =>
      this.client.db.delete(authRequests).where(eq(authRequests.id, id)).run()
    );
  }
}

/**
 * SQLite authorization code storage implementation
 */
export class SqliteAuthCodeStorage implements IAuthCodeStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(code: AuthCode): Promise<void> {
    insertRow(AUTH_CODE, code.id, () =>
      this.client.db
        .insert(authCodes)
        .values({
          id: code.id,
          clientId: code.clientId,
          scopes: code.scopes,
          redirectURI: code.redirectURI,
          nonce: code.nonce,
          claims: code.claims,
          connectorId: code.connectorId,
          connectorData: toBuffer(code.connectorData),
          codeChallenge: code.pkce.codeChallenge,
          codeChallengeMethod: code.pkce.codeChallengeMethod,
          expiry: code.expiry,
        })
        .run()
    );
  }

  async get(id: string): Promise<AuthCode> {
    const row = query(AUTH_CODE, () =>
      this.client.db.select().from(authCodes).where(eq(authCodes.id, id)).get()
    );
    if (!row) {
      throw new NotFoundError(AUTH_CODE, id);
    }
    return rowToAuthCode(row);
  }

  async delete(id: string): Promise<void> {
    deleteRow(AUTH_CODE, id, () =>
      this.client.db.delete(authCodes).where(eq(authCodes.id, id)).run()
    );
  }
}

/**
 * SQLite refresh token storage implementation
 */
export class SqliteRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(token: RefreshToken): Promise<void> {
    insertRow(REFRESH_TOKEN, token.id, () =>
      this.client.db.insert(refreshTokens).values(refreshTokenToRow(token)).run()
    );
  }

  async get(id: string): Promise<RefreshToken> {
    const row = query(REFRESH_TOKEN, () =>
      this.client.db.select().from(refreshTokens).where(eq(refreshTokens.id, id)).get()
    );
    if (!row) {
      throw new NotFoundError(REFRESH_TOKEN, id);
    }
    return rowToRefreshToken(row);
  }

  async list(): Promise<RefreshToken[]> {
    const rows = query(REFRESH_TOKEN, () => this.client.db.select().from(refreshTokens).all());
    return rows.map(rowToRefreshToken);
  }

  async update(id: string, updater: Updater<RefreshToken>): Promise<RefreshToken> {
    return this.client.transaction(`update ${REFRESH_TOKEN}`, (db) => {
      const row = db.select().from(refreshTokens).where(eq(refreshTokens.id, id)).get();
      if (!row) {
        throw new NotFoundError(REFRESH_TOKEN, id);
      }

      const next = updater(rowToRefreshToken(row));
      db.update(refreshTokens)
        .set({ ...refreshTokenToRow(next), id })
        .where(eq(refreshTokens.id, id))
        .run();
      return { ...next, id };
    });
  }

  async delete(id: string): Promise<void> {
    deleteRow(REFRESH_TOKEN, id, () =>
      this.client.db.delete(refreshTokens).where(eq(refreshTokens.id, id)).run()
    );
  }
}

/**
 * SQLite device request storage implementation
 */
export class SqliteDeviceRequestStorage implements IDeviceRequestStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(request: DeviceRequest): Promise<void> {
    insertRow(DEVICE_REQUEST, request.userCode, () =>
      this.client.db.insert(deviceRequests).values(request).run()
    );
  }

  async get(userCode: string): Promise<DeviceRequest> {
    const row = query(DEVICE_REQUEST, () =>
      this.client.db.select().from(deviceRequests).where(eq(deviceRequests.userCode, userCode)).get()
    );
    if (!row) {
      throw new NotFoundError(DEVICE_REQUEST, userCode);
    }
    return rowToDeviceRequest(row);
  }

  async delete(userCode: string): Promise<void> {
    deleteRow(DEVICE_REQUEST, userCode, () =>
      this.client.db.delete(deviceRequests).where(eq(deviceRequests.userCode, userCode)).run()
    );
  }
}

/**
 * SQLite device token storage implementation
 */
export class SqliteDeviceTokenStorage implements IDeviceTokenStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(token: DeviceToken): Promise<void> {
    insertRow(DEVICE_TOKEN, token.deviceCode, () =>
      this.client.db.insert(deviceTokens).values(deviceTokenToRow(token)).run()
    );
  }

  async get(deviceCode: string): Promise<DeviceToken> {
    const row = query(DEVICE_TOKEN, () =>
      this.client.db.select().from(deviceTokens).where(eq(deviceTokens.deviceCode, deviceCode)).get()
    );
    if (!row) {
      throw new NotFoundError(DEVICE_TOKEN, deviceCode);
    }
    return rowToDeviceToken(row);
  }

  async update(deviceCode: string, updater: Updater<DeviceToken>): Promise<DeviceToken> {
    return this.client.transaction(`update ${DEVICE_TOKEN}`, (db) => {
      const row = db.select().from(deviceTokens).where(eq(deviceTokens.deviceCode, deviceCode)).get();
      if (!row) {
        throw new NotFoundError(DEVICE_TOKEN, deviceCode);
      }

      const next = updater(rowToDeviceToken(row));
      db.update(deviceTokens)
        .set({ ...deviceTokenToRow(next), deviceCode })
        .where(eq(deviceTokens.deviceCode, deviceCode))
        .run();
      return { ...next, deviceCode };
    });
  }

  async delete(deviceCode: string): Promise<void> {
    deleteRow(DEVICE_TOKEN, deviceCode, () =>
      this.client.db.delete(deviceTokens).where(eq(deviceTokens.deviceCode, deviceCode)).run()
    );
  }
}
