import { AppError, DataCorruptionError, ValueParsingError } from '../errors';
import { createComponentLogger } from '../logger';
import { checkPassword, setPassword, toPrincipal, userLabel } from '../models';
import type { DataStore } from '../store';
import type { NewUser, User } from '../types';
import { UserLoader } from './userLoader';

const log = createComponentLogger('auth');

const MIN_PASSWORD_LENGTH = 8;
const MAX_PASSWORD_LENGTH = 128;
const WEAK_PASSWORDS = new Set([
  '12345678',
  '123456789',
  'password',
  'password1',
  'qwertyuiop',
  '11111111',
  '00000000',
  'iloveyou'
]);

export interface ProfilePatch {
  email?: string;
  country?: string;
  timeZone?: string;
}

export class AuthService {
  private readonly loader: UserLoader;

  constructor(private readonly store: DataStore) {
    this.loader = new UserLoader(store);
  }

  async register(params: { username: string; email: string; password: string }): Promise<User> {
    this.validatePassword(params.password);
    const draft: NewUser = {
      username: params.username.trim(),
      email: params.email.trim().toLowerCase(),
      passwordHash: null
    };
    await setPassword(draft, params.password);
    const user = await this.store.createUser(draft);
    log.info({ userId: user.id }, `registered ${userLabel(user)}`);
    return user;
  }

  async login(params: { username: string; password: string }): Promise<User> {
    const user = await this.store.getUserByUsername(params.username.trim());
    if (!user || !(await this.verify(user, params.password))) {
      throw new AppError(401, 40102, 'Invalid username or password');
    }
    return user;
  }

  /**
   * Maps a session identifier to its user. Malformed identifiers and unknown
   * users both resolve to null.
   */
  async resolveSession(sessionUserId?: string): Promise<User | null> {
    if (!sessionUserId) {
      return null;
    }
    let user: User | null;
    try {
      user = await this.loader.load(sessionUserId);
    } catch (err) {
      if (err instanceof ValueParsingError) {
        log.warn({ value: sessionUserId }, 'ignoring malformed session identifier');
        return null;
      }
      throw err;
    }
    if (!user || !toPrincipal(user).isActive()) {
      return null;
    }
    return user;
  }

  async requireUser(sessionUserId?: string): Promise<User> {
    const user = await this.resolveSession(sessionUserId);
    if (!user) {
      throw new AppError(401, 40103, 'Not signed in');
    }
    return user;
  }

  async updateProfile(userId: number, patch: ProfilePatch): Promise<User> {
    const user = await this.getUser(userId);
    const updated: User = {
      ...user,
      email: patch.email === undefined ? user.email : patch.email.trim().toLowerCase(),
      country: patch.country ?? user.country,
      timeZone: patch.timeZone ?? user.timeZone
    };
    await this.store.updateUser(updated);
    return updated;
  }

  async changePassword(
    userId: number,
    params: { oldPassword: string; newPassword: string }
  ): Promise<void> {
    const user = await this.getUser(userId);
    if (!(await this.verify(user, params.oldPassword))) {
      throw new AppError(403, 40301, 'Current password is incorrect');
    }
    this.validatePassword(params.newPassword);
    await setPassword(user, params.newPassword);
    await this.store.updateUser(user);
    log.info({ userId }, `password changed for ${userLabel(user)}`);
  }

  async deleteAccount(userId: number, password: string): Promise<void> {
    const user = await this.getUser(userId);
    if (!(await this.verify(user, password))) {
      throw new AppError(403, 40301, 'Current password is incorrect');
    }
    await this.store.deleteUser(user.id);
    log.info({ userId }, `deleted ${userLabel(user)}`);
  }

  private async getUser(userId: number): Promise<User> {
    const user = await this.store.getUserById(userId);
    if (!user) {
      throw new AppError(404, 40401, 'User not found');
    }
    return user;
  }

  private async verify(user: User, password: string): Promise<boolean> {
    try {
      return await checkPassword(user, password);
    } catch (err) {
      if (err instanceof DataCorruptionError) {
        log.error({ userId: user.id, err }, `unreadable password hash for ${userLabel(user)}`);
      }
      throw err;
    }
  }

  private validatePassword(password: string): void {
    if (password.length < MIN_PASSWORD_LENGTH || password.length > MAX_PASSWORD_LENGTH) {
      throw new AppError(
        400,
        40003,
        `Password must be ${MIN_PASSWORD_LENGTH}-${MAX_PASSWORD_LENGTH} characters long`
      );
    }
    if (WEAK_PASSWORDS.has(password.toLowerCase())) {
      throw new AppError(400, 40004, 'Password is too easy to guess');
    }
  }
}
