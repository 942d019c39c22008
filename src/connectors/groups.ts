import { GroupPolicyViolationError } from '../errors/connector-error.js';

/**
 * Keep the resolved groups that appear in the allow-list, in resolved order
 */
export function filterGroups(resolved: readonly string[], allowed: readonly string[]): string[] {
  const allow = new Set(allowed);
  return resolved.filter((group) => allow.has(group));
}

/**
 * Apply a connector's group allow-list.
 *
 * With an empty allow-list the resolved groups pass through unchanged.
 * Otherwise the intersection is returned, and an empty intersection
 * rejects the login.
 */
export function applyGroupPolicy(
  connectorType: string,
  username: string,
  resolved: readonly string[],
  allowed: readonly string[]
): string[] {
  if (allowed.length === 0) {
    return [...resolved];
  }

  const groups = filterGroups(resolved, allowed);
  if (groups.length === 0) {
    throw new GroupPolicyViolationError(connectorType, username);
  }

  return groups;
}

