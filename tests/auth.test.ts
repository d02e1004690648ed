import { beforeEach, describe, expect, it } from 'vitest';
import { DataCorruptionError, UniquenessViolationError } from '../src/errors';
import { AuthService } from '../src/services/authService';
import { InMemoryStore } from '../src/store';

describe('auth service', () => {
  let store = new InMemoryStore();
  let auth = new AuthService(store);

  beforeEach(() => {
    store = new InMemoryStore();
    auth = new AuthService(store);
  });

  it('registers a user with a lowercased email and a hashed password', async () => {
    const user = await auth.register({
      username: 'exampleusername',
      email: 'ExampleUser@Example.com',
      password: 'ExamplePa33word!'
    });

    expect(user.email).toBe('exampleuser@example.com');
    expect(user.passwordHash).not.toBe('ExamplePa33word!');
    expect((await auth.login({ username: 'exampleusername', password: 'ExamplePa33word!' })).id).toBe(
      user.id
    );
  });

  it('refuses a second registration with the same username', async () => {
    await auth.register({
      username: 'exampleusername',
      email: 'exampleuser@example.com',
      password: 'ExamplePa33word!'
    });

    const duplicate = auth.register({
      username: 'exampleusername',
      email: 'someone@example.com',
      password: 'ExamplePa33word!'
    });
    await expect(duplicate).rejects.toBeInstanceOf(UniquenessViolationError);
    await expect(duplicate).rejects.toMatchObject({
      field: 'username',
      message: 'That username is already registered'
    });
  });

  it('enforces the password policy', async () => {
    await expect(
      auth.register({ username: 'shorty', email: 'shorty@example.com', password: 'abc' })
    ).rejects.toMatchObject({ status: 400, code: 40003 });
    await expect(
      auth.register({ username: 'weak', email: 'weak@example.com', password: 'Password1' })
    ).rejects.toMatchObject({ status: 400, code: 40004 });
    expect(store.usersById.size).toBe(0);
  });

  it('rejects a wrong password or unknown user with the same error', async () => {
    await auth.register({
      username: 'exampleusername',
      email: 'exampleuser@example.com',
      password: 'ExamplePa33word!'
    });

    await expect(
      auth.login({ username: 'exampleusername', password: 'wrong-password' })
    ).rejects.toMatchObject({ status: 401, code: 40102, message: 'Invalid username or password' });
    await expect(
      auth.login({ username: 'nobody', password: 'ExamplePa33word!' })
    ).rejects.toMatchObject({ status: 401, code: 40102 });
  });

  it('surfaces a corrupted stored hash instead of treating it as a mismatch', async () => {
    const user = await auth.register({
      username: 'exampleusername',
      email: 'exampleuser@example.com',
      password: 'ExamplePa33word!'
    });
    await store.updateUser({ ...user, passwordHash: 'garbage' });

    await expect(
      auth.login({ username: 'exampleusername', password: 'ExamplePa33word!' })
    ).rejects.toBeInstanceOf(DataCorruptionError);
  });

  it('resolves sessions to users and ignores malformed identifiers', async () => {
    const user = await auth.register({
      username: 'exampleusername',
      email: 'exampleuser@example.com',
      password: 'ExamplePa33word!'
    });

    expect((await auth.resolveSession(String(user.id)))?.username).toBe('exampleusername');
    expect(await auth.resolveSession('abc')).toBeNull();
    expect(await auth.resolveSession('404')).toBeNull();
    expect(await auth.resolveSession(undefined)).toBeNull();
    await expect(auth.requireUser('abc')).rejects.toMatchObject({ status: 401, code: 40103 });
  });

  it('changes the password only with the current one', async () => {
    const user = await auth.register({
      username: 'exampleusername',
      email: 'exampleuser@example.com',
      password: 'ExamplePa33word!'
    });

    await expect(
      auth.changePassword(user.id, { oldPassword: 'not-it-at-all', newPassword: 'NewPa33word!!' })
    ).rejects.toMatchObject({ status: 403, code: 40301 });

    await auth.changePassword(user.id, {
      oldPassword: 'ExamplePa33word!',
      newPassword: 'NewPa33word!!'
    });
    await expect(
      auth.login({ username: 'exampleusername', password: 'ExamplePa33word!' })
    ).rejects.toMatchObject({ code: 40102 });
    expect((await auth.login({ username: 'exampleusername', password: 'NewPa33word!!' })).id).toBe(
      user.id
    );
  });

  it('updates the profile and keeps emails unique', async () => {
    const alice = await auth.register({
      username: 'alice',
      email: 'alice@example.com',
      password: 'ExamplePa33word!'
    });
    await auth.register({ username: 'bob', email: 'bob@example.com', password: 'ExamplePa33word!' });

    const updated = await auth.updateProfile(alice.id, {
      country: 'Canada',
      timeZone: 'America/Toronto'
    });
    expect(updated).toMatchObject({
      email: 'alice@example.com',
      country: 'Canada',
      timeZone: 'America/Toronto'
    });

    await expect(auth.updateProfile(alice.id, { email: 'BOB@example.com' })).rejects.toMatchObject({
      field: 'email',
      status: 409
    });
  });

  it('deletes the account after confirming the password', async () => {
    const user = await auth.register({
      username: 'exampleusername',
      email: 'exampleuser@example.com',
      password: 'ExamplePa33word!'
    });
    await store.createNote({ userId: user.id, title: 'one', body: 'first' });

    await expect(auth.deleteAccount(user.id, 'wrong-password')).rejects.toMatchObject({
      code: 40301
    });
    await auth.deleteAccount(user.id, 'ExamplePa33word!');

    expect(await store.getUserById(user.id)).toBeUndefined();
    expect(store.notesById.size).toBe(0);
  });
});
