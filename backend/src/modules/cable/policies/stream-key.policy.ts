/**
 * backend/src/modules/cable/policies/stream-key.policy.ts
 *
 * WHY:
 * - Stream keys are derived, never client-supplied.
 * - The direct key sorts the participant pair so both sides derive the same key
 *   whoever subscribes first.
 *
 * RULES:
 * - Pure functions. No IO.
 */

import type { StreamKey } from '../cable.types';

export function teamStreamKey(organizationId: string): StreamKey {
  return `team:${organizationId}`;
}

export function directStreamKey(organizationId: string, userA: string, userB: string): StreamKey {
  const [low, high] = [userA, userB].sort();
  return `dm:${organizationId}:${low}:${high}`;
}
