import { describe, it, expect } from 'vitest';
import { OAuthError } from '../../errors/oauth-error.js';
import { ERROR_STATUS_CODES } from '../../errors/error-codes.js';
import {
  ConfigurationError,
  GroupPolicyViolationError,
  PolicyViolationError,
  UpstreamRejectedError,
  UpstreamUnreachableError,
} from '../../errors/connector-error.js';
import { NotFoundError, StorageError } from '../../errors/storage-error.js';

describe('OAuthError', () => {
  it('covers only the codes the broker responds with', () => {
    expect(ERROR_STATUS_CODES).toEqual({
      invalid_request: 400,
      unauthorized_client: 401,
      access_denied: 403,
      server_error: 500,
      temporarily_unavailable: 503,
      not_found: 404,
    });
  });

  it('serializes state only when present', () => {
    expect(OAuthError.invalidRequest('Unregistered redirect_uri', 'xyz').toJSON()).toEqual({
      error: 'invalid_request',
      error_description: 'Unregistered redirect_uri',
      state: 'xyz',
    });
    expect(OAuthError.unauthorizedClient('Unknown client: cli').toJSON()).toEqual({
      error: 'unauthorized_client',
      error_description: 'Unknown client: cli',
    });
  });

  describe('fromError', () => {
    it('hides the user and groups behind a group policy denial', () => {
      const err = OAuthError.fromError(new GroupPolicyViolationError('gitlab', 'jane'));

      expect(err.statusCode).toBe(403);
      expect(err.toJSON()).toEqual({
        error: 'access_denied',
        error_description: 'You are not a member of any group allowed to use this application.',
      });
    });

    it('passes other policy and upstream denials through', () => {
      expect(OAuthError.fromError(new PolicyViolationError('email not verified')).toJSON()).toEqual({
        error: 'access_denied',
        error_description: 'email not verified',
      });
      expect(
        OAuthError.fromError(new UpstreamRejectedError('access_denied', 'User denied')).toJSON()
      ).toEqual({ error: 'access_denied', error_description: 'access_denied: User denied' });
    });

    it('maps an unreachable provider to 503', () => {
      const cause = new UpstreamUnreachableError('gitlab: fetch failed');
      const err = OAuthError.fromError(cause);

      expect(err.code).toBe('temporarily_unavailable');
      expect(err.statusCode).toBe(503);
      expect(err.cause).toBe(cause);
    });

    it('maps missing storage rows to 404', () => {
      const err = OAuthError.fromError(new NotFoundError('client', 'cli'));

      expect(err.code).toBe('not_found');
      expect(err.statusCode).toBe(404);
    });

    it('falls back to server_error', () => {
      for (const cause of [
        new ConfigurationError('gitlab: clientID is required'),
        new StorageError('disk I/O error'),
        'boom',
      ]) {
        const err = OAuthError.fromError(cause);
        expect(err.code).toBe('server_error');
        expect(err.statusCode).toBe(500);
      }
    });

    it('returns an OAuthError unchanged', () => {
      const original = OAuthError.notFound('Unknown connector: ldap');

      expect(OAuthError.fromError(original)).toBe(original);
    });
  });
});
