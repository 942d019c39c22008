import * as jose from 'jose';
import type { Claims } from '../types/identity.js';
import type { Keys } from '../types/storage.js';
import { SIGNING_ALGORITHM_RS256, RSA_MODULUS_LENGTH } from '../config/constants.js';
import { generateKid } from './random.js';

/**
 * JWT signing and verification utilities using jose library
 */

export interface SigningKeyPair {
  signingKey: jose.JWK;
  signingKeyPub: jose.JWK;
}

/**
 * Generate a new RSA key pair for signing, exported as JWKs sharing a kid
 */
export async function generateRsaKeyPair(): Promise<SigningKeyPair> {
  const { publicKey, privateKey } = await jose.generateKeyPair(SIGNING_ALGORITHM_RS256, {
    modulusLength: RSA_MODULUS_LENGTH,
    extractable: true,
  });

  const kid = generateKid();
  const common = { kid, alg: SIGNING_ALGORITHM_RS256, use: 'sig' };

  return {
    signingKey: { ...(await jose.exportJWK(privateKey)), ...common },
    signingKeyPub: { ...(await jose.exportJWK(publicKey)), ...common },
  };
}

/**
 * Public keys that verify tokens issued by this broker, current key first
 */
export function buildJwks(keys: Keys): jose.JSONWebKeySet {
  const jwks: jose.JWK[] = [];

  if (keys.signingKeyPub) {
    jwks.push(keys.signingKeyPub);
  }

  for (const verificationKey of keys.verificationKeys) {
    jwks.push(verificationKey.publicKey);
  }

  return { keys: jwks };
}

export interface IdTokenOptions {
  issuer: string;
  audience: string;
  nonce?: string;
  connectorId: string;
  expiresInMs: number;
  now?: Date;
}

/**
 * Sign an ID token with the current signing key
 */
export async function signIdToken(
  claims: Claims,
  keys: Keys,
  options: IdTokenOptions
): Promise<string> {
  if (!keys.signingKey) {
    throw new Error('sign id token: no signing key available');
  }

  const privateKey = await jose.importJWK(keys.signingKey, SIGNING_ALGORITHM_RS256);
  const issuedAt = Math.floor((options.now ?? new Date()).getTime() / 1000);

  return new jose.SignJWT({
    name: claims.username,
    preferred_username: claims.preferredUsername,
    email: claims.email,
    email_verified: claims.emailVerified,
    groups: claims.groups,
    nonce: options.nonce,
    federated_claims: {
      connector_id: options.connectorId,
      user_id: claims.userId,
    },
  })
    .setProtectedHeader({
      alg: SIGNING_ALGORITHM_RS256,
      kid: keys.signingKey.kid,
      typ: 'JWT',
    })
    .setIssuer(options.issuer)
    .setAudience(options.audience)
    .setSubject(claims.userId)
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + Math.floor(options.expiresInMs / 1000))
    .sign(privateKey);
}

/**
 * Verify a token against the signing and verification keys
 */
export async function verifyIdToken(
  token: string,
  keys: Keys,
  options: { issuer: string; audience: string; currentDate?: Date }
): Promise<jose.JWTPayload> {
  const jwks = jose.createLocalJWKSet(buildJwks(keys));

  const { payload } = await jose.jwtVerify(token, jwks, {
    issuer: options.issuer,
    audience: options.audience,
    algorithms: [SIGNING_ALGORITHM_RS256],
    currentDate: options.currentDate,
  });

  return payload;
}
