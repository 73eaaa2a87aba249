import { describe, it, expect } from 'vitest';
import { Argon2CredentialHasher } from '../auth/password-hasher';

describe('Argon2CredentialHasher', () => {
  const hasher = new Argon2CredentialHasher();

  it('hashes a password into an argon2 digest that differs from the plaintext', async () => {
    const digest = await hasher.hash('securePassword123');
    expect(digest).toMatch(/^\$argon2/);
    expect(digest).not.toBe('securePassword123');
  });

  it('verifies a correct password', async () => {
    const digest = await hasher.hash('myPassword');
    expect(await hasher.verify('myPassword', digest)).toBe(true);
  });

  it('rejects an incorrect password', async () => {
    const digest = await hasher.hash('myPassword');
    expect(await hasher.verify('wrongPassword', digest)).toBe(false);
  });

  it('salts every hash, and each digest still verifies', async () => {
    const first = await hasher.hash('samePassword');
    const second = await hasher.hash('samePassword');
    expect(first).not.toBe(second);
    expect(await hasher.verify('samePassword', first)).toBe(true);
    expect(await hasher.verify('samePassword', second)).toBe(true);
  });

  it('returns false for malformed digests instead of throwing', async () => {
    expect(await hasher.verify('password', 'not-a-valid-hash')).toBe(false);
    expect(await hasher.verify('password', '')).toBe(false);
    expect(await hasher.verify('password', '$argon2id$garbage')).toBe(false);
  });
});
