import { describe, expect, it } from 'vitest';
import { DataCorruptionError } from '../src/errors';
import { checkPassword, noteLabel, setPassword, tagLabel, toPrincipal, userLabel } from '../src/models';
import type { User } from '../src/types';
import { PASSWORD_HASH_LENGTH } from '../src/utils';

describe('password hashing', () => {
  it('accepts the password it was set with and nothing else', async () => {
    const user: { passwordHash: string | null } = { passwordHash: null };
    await setPassword(user, 'ExamplePa33word!');

    expect(user.passwordHash).not.toBe('ExamplePa33word!');
    expect(user.passwordHash).toHaveLength(PASSWORD_HASH_LENGTH);
    expect(await checkPassword(user, 'ExamplePa33word!')).toBe(true);
    expect(await checkPassword(user, 'examplePa33word!')).toBe(false);
    expect(await checkPassword(user, 'ExamplePa33word')).toBe(false);
    expect(await checkPassword(user, '')).toBe(false);
  });

  it('salts every hash', async () => {
    const first: { passwordHash: string | null } = { passwordHash: null };
    const second: { passwordHash: string | null } = { passwordHash: null };
    await setPassword(first, 'same-secret-42');
    await setPassword(second, 'same-secret-42');

    expect(first.passwordHash).not.toBe(second.passwordHash);
    expect(await checkPassword(first, 'same-secret-42')).toBe(true);
    expect(await checkPassword(second, 'same-secret-42')).toBe(true);
  });

  it('overwrites the previous hash', async () => {
    const user: { passwordHash: string | null } = { passwordHash: null };
    await setPassword(user, 'first-password-1');
    await setPassword(user, 'second-password-2');

    expect(await checkPassword(user, 'first-password-1')).toBe(false);
    expect(await checkPassword(user, 'second-password-2')).toBe(true);
  });

  it('rejects every password for a user without a hash', async () => {
    expect(await checkPassword({ passwordHash: null }, 'anything-at-all')).toBe(false);
  });

  it('signals corruption for a malformed stored hash', async () => {
    await expect(checkPassword({ passwordHash: 'not-a-hash' }, 'whatever')).rejects.toBeInstanceOf(
      DataCorruptionError
    );
    await expect(
      checkPassword({ passwordHash: `${'a'.repeat(32)}:${'b'.repeat(64)}` }, 'whatever')
    ).rejects.toMatchObject({ status: 500, code: 50001 });
  });
});

describe('entity helpers', () => {
  const user: User = {
    id: 42,
    username: 'exampleusername',
    email: 'exampleuser@example.com',
    creationDate: '2026-03-01T09:00:00.000Z',
    passwordHash: null,
    country: 'United States',
    timeZone: 'America/New_York'
  };

  it('exposes the user as an active principal keyed by its id', () => {
    const principal = toPrincipal(user);
    expect(principal.getId()).toBe('42');
    expect(principal.isActive()).toBe(true);
  });

  it('builds debug labels', () => {
    expect(userLabel(user)).toBe('User: exampleusername');
    expect(tagLabel({ label: 'urgent' })).toBe('Tag: urgent');
    expect(noteLabel({ body: 'buy milk' })).toBe('Note: buy milk');
  });
});
