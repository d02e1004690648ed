import type { Note, Principal, Tag, User } from './types';
import { hashPassword, verifyPassword } from './utils';

/**
 * Replaces the stored hash with a freshly salted one. The previous hash is not
 * recoverable afterwards.
 */
export async function setPassword(
  user: { passwordHash: string | null },
  plaintext: string
): Promise<void> {
  user.passwordHash = await hashPassword(plaintext);
}

/**
 * False when the user never set a password. Throws DataCorruptionError when the
 * stored hash cannot be parsed.
 */
export async function checkPassword(
  user: Pick<User, 'passwordHash'>,
  plaintext: string
): Promise<boolean> {
  if (!user.passwordHash) {
    return false;
  }
  return verifyPassword(plaintext, user.passwordHash);
}

export function toPrincipal(user: User): Principal {
  return {
    getId: () => String(user.id),
    isActive: () => true
  };
}

export function userLabel(user: Pick<User, 'username'>): string {
  return `User: ${user.username}`;
}

export function tagLabel(tag: Pick<Tag, 'label'>): string {
  return `Tag: ${tag.label}`;
}

export function noteLabel(note: Pick<Note, 'body'>): string {
  return `Note: ${note.body}`;
}
