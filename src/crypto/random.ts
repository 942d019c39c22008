import { randomBytes } from 'node:crypto';
import { ID_LENGTH, KEY_ID_LENGTH, TOKEN_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as hex string
 */
export function generateRandomHex(length: number): string {
  return randomBytes(length).toString('hex');
}

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a unique ID for storage records and flow state
 */
export function generateId(): string {
  return generateRandomBase64Url(ID_LENGTH);
}

/**
 * Generate a bearer value for refresh tokens
 */
export function generateToken(): string {
  return generateRandomBase64Url(TOKEN_LENGTH);
}

/**
 * Generate a unique key ID (kid) for signing keys
 */
export function generateKid(): string {
  return generateRandomHex(KEY_ID_LENGTH);
}
