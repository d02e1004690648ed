import crypto from 'node:crypto';
import { DataCorruptionError, ValueParsingError } from './errors';
import type { Page } from './types';

const SALT_BYTES = 16;
const KEY_LENGTH = 64;
const STORED_HASH_PATTERN = /^[0-9a-f]{32}:[0-9a-f]{128}$/;

export const PASSWORD_HASH_LENGTH = SALT_BYTES * 2 + 1 + KEY_LENGTH * 2;
export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

export function now(): number {
  return Date.now();
}

export function toIso(ts: number): string {
  return new Date(ts).toISOString();
}

function deriveKey(password: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(password, salt, KEY_LENGTH, (err, key) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(key);
    });
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.randomBytes(SALT_BYTES).toString('hex');
  const hash = (await deriveKey(password, salt)).toString('hex');
  return `${salt}:${hash}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  if (!STORED_HASH_PATTERN.test(stored)) {
    throw new DataCorruptionError('Stored password hash is malformed', {
      length: stored.length
    });
  }
  const [salt, hash] = stored.split(':');
  const candidate = await deriveKey(password, salt);
  return crypto.timingSafeEqual(Buffer.from(hash, 'hex'), candidate);
}

export function parseIntegerId(raw: string): number {
  const value = raw.trim();
  if (!/^-?\d+$/.test(value)) {
    throw new ValueParsingError('Identifier is not an integer', raw);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id)) {
    throw new ValueParsingError('Identifier is out of range', raw);
  }
  return id;
}

export function normalizeTagLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ');
}

export function tagKey(label: string): string {
  return normalizeTagLabel(label).toLowerCase();
}

export function toPage(params: { limit?: number; offset?: number } = {}): Page {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_PAGE_LIMIT, 1), MAX_PAGE_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);
  return { limit, offset };
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
