import { describe, it, expect } from 'vitest';
import { Argon2PasswordHasher } from '../auth/password-hasher';

describe('Argon2PasswordHasher', () => {
  const hasher = new Argon2PasswordHasher();

  it('hashes a password into an argon2id string', async () => {
    const hash = await hasher.hash('pw1');
    expect(hash).toMatch(/^\$argon2id\$/);
    expect(hash).not.toContain('pw1');
  });

  it('verifies the original password', async () => {
    const hash = await hasher.hash('correct horse');
    await expect(hasher.verify('correct horse', hash)).resolves.toBe(true);
  });

  it('rejects a mutated password', async () => {
    const hash = await hasher.hash('correct horse');
    await expect(hasher.verify('correct hors', hash)).resolves.toBe(false);
    await expect(hasher.verify('Correct horse', hash)).resolves.toBe(false);
    await expect(hasher.verify('correct horse ', hash)).resolves.toBe(false);
  });

  it('returns false for corrupted hash strings', async () => {
    await expect(hasher.verify('password', 'not-a-valid-hash')).resolves.toBe(false);
    await expect(hasher.verify('password', '$argon2id$v=19$garbage')).resolves.toBe(false);
    await expect(hasher.verify('password', '')).resolves.toBe(false);
  });

  it('salts each hash', async () => {
    const hash1 = await hasher.hash('samePassword');
    const hash2 = await hasher.hash('samePassword');
    expect(hash1).not.toBe(hash2);
  });

  it('verifies hashes made with other cost parameters', async () => {
    const light = new Argon2PasswordHasher({ memoryCost: 1024, timeCost: 1 });
    const hash = await light.hash('pw1');
    expect(hash).toContain('m=1024,t=1');
    await expect(hasher.verify('pw1', hash)).resolves.toBe(true);
  });
});
