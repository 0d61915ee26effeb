/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Login compares a submitted password against the stored hash.
 * - The login flow depends on this interface, not on bcrypt, so tests can hash cheaply.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
