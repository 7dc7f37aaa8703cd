import { describe, it, expect } from 'vitest';
import { sanitize } from '../logger';

describe('sanitize', () => {
  it('redacts credential and identity fields regardless of case', () => {
    expect(
      sanitize({ email: 'alice@example.com', Password: 'pw1', passwordHash: '$argon2id$x', userId: 4 }),
    ).toEqual({ email: '[REDACTED]', Password: '[REDACTED]', passwordHash: '[REDACTED]', userId: 4 });
  });

  it('redacts nested objects and objects inside arrays', () => {
    expect(
      sanitize({ request: { headers: { authorization: 'Bearer abc' } }, users: [{ email: 'a@b.c', id: 1 }, 'x'] }),
    ).toEqual({
      request: { headers: { authorization: '[REDACTED]' } },
      users: [{ email: '[REDACTED]', id: 1 }, 'x'],
    });
  });

  it('reduces errors to name and message', () => {
    expect(sanitize({ err: new TypeError('boom') })).toEqual({ err: { name: 'TypeError', message: 'boom' } });
  });
});
