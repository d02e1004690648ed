import type { DataStore } from '../store';
import type { User } from '../types';
import { parseIntegerId } from '../utils';

export type UserLookup = Pick<DataStore, 'getUserById'>;

/**
 * Resolves the identifier kept in a session back into a user.
 *
 * `load` never writes. A missing user yields null; an identifier that is not an
 * integer throws ValueParsingError so the caller can treat the session as
 * anonymous.
 */
export class UserLoader {
  constructor(private readonly users: UserLookup) {}

  async load(id: string): Promise<User | null> {
    const userId = parseIntegerId(id);
    return (await this.users.getUserById(userId)) ?? null;
  }
}
