/**
 * backend/src/shared/security/key-hasher.ts
 *
 * WHY:
 * - Cache keys (rate-limit buckets) must not carry raw PII such as emails.
 *   Keys are built from a one-way digest instead.
 *
 * HOW TO USE:
 * - const hasher = new Sha256KeyHasher()
 * - limiter.hitOrThrow({ key: `login:email:${hasher.hash(email)}`, ... })
 */

import { createHash } from 'node:crypto';

export interface KeyHasher {
  hash(value: string): string;
}

export class Sha256KeyHasher implements KeyHasher {
  hash(value: string): string {
    return createHash('sha256').update(value).digest('hex');
  }
}
