import { Pool } from 'pg';
import { AppError, UniquenessViolationError } from './errors';
import {
  DEFAULT_COUNTRY,
  DEFAULT_TIME_ZONE,
  type NewNote,
  type NewUser,
  type Note,
  type NoteTag,
  type Page,
  type Tag,
  type User
} from './types';
import { normalizeTagLabel, now, PASSWORD_HASH_LENGTH, tagKey, toIso } from './utils';

export type StoreKind = 'memory' | 'postgres';

export interface NoteTagFilter {
  noteId?: number;
  tagId?: number;
}

export interface DataStore {
  init(): Promise<void>;
  close(): Promise<void>;
  ping(): Promise<void>;

  createUser(user: NewUser): Promise<User>;
  getUserById(userId: number): Promise<User | undefined>;
  getUserByUsername(username: string): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  updateUser(user: User): Promise<void>;
  deleteUser(userId: number): Promise<void>;

  createNote(note: NewNote): Promise<Note>;
  getNote(noteId: number): Promise<Note | undefined>;
  updateNote(note: Note): Promise<void>;
  deleteNote(noteId: number): Promise<void>;
  listNotesByUser(userId: number, page: Page): Promise<Note[]>;
  listDueReminders(before: string): Promise<Note[]>;
  /** Latches the reminder only if it is still unlatched and still set to `reminderDate`. */
  markReminded(noteId: number, reminderDate: string): Promise<boolean>;

  findOrCreateTag(label: string): Promise<Tag>;
  getTag(tagId: number): Promise<Tag | undefined>;
  attachTag(noteId: number, tagId: number): Promise<void>;
  detachTag(noteId: number, tagId: number): Promise<boolean>;
  listTagsByNote(noteId: number): Promise<Tag[]>;
  listNotesByTag(tagId: number, page: Page, userId?: number): Promise<Note[]>;
  listNoteTags(filter: NoteTagFilter): Promise<NoteTag[]>;
}

const ownerMissing = () => new AppError(404, 40401, 'User not found');
const noteOrTagMissing = () => new AppError(404, 40402, 'Note or tag not found');

function paginate<T>(items: T[], page: Page): T[] {
  return items.slice(page.offset, page.offset + page.limit);
}

export class InMemoryStore implements DataStore {
  usersById = new Map<number, User>();
  notesById = new Map<number, Note>();
  tagsById = new Map<number, Tag>();
  tagIdByKey = new Map<string, number>();
  noteTags: NoteTag[] = [];

  private nextUserId = 1;
  private nextNoteId = 1;
  private nextTagId = 1;

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async ping(): Promise<void> {}

  async createUser(input: NewUser): Promise<User> {
    this.assertUnique(input.username, input.email);
    const user: User = {
      id: this.nextUserId,
      username: input.username,
      email: input.email,
      creationDate: input.creationDate ?? toIso(now()),
      passwordHash: input.passwordHash,
      country: input.country ?? DEFAULT_COUNTRY,
      timeZone: input.timeZone ?? DEFAULT_TIME_ZONE
    };
    this.nextUserId += 1;
    this.usersById.set(user.id, user);
    return { ...user };
  }

  async getUserById(userId: number): Promise<User | undefined> {
    const user = this.usersById.get(userId);
    return user ? { ...user } : undefined;
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    const user = [...this.usersById.values()].find((item) => item.username === username);
    return user ? { ...user } : undefined;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const user = [...this.usersById.values()].find((item) => item.email === email);
    return user ? { ...user } : undefined;
  }

  async updateUser(user: User): Promise<void> {
    if (!this.usersById.has(user.id)) {
      return;
    }
    this.assertUnique(user.username, user.email, user.id);
    this.usersById.set(user.id, { ...user });
  }

  async deleteUser(userId: number): Promise<void> {
    for (const note of [...this.notesById.values()]) {
      if (note.userId === userId) {
        await this.deleteNote(note.id);
      }
    }
    this.usersById.delete(userId);
  }

  async createNote(input: NewNote): Promise<Note> {
    if (!this.usersById.has(input.userId)) {
      throw ownerMissing();
    }
    const noteDate = input.noteDate ?? toIso(now());
    const note: Note = {
      id: this.nextNoteId,
      userId: input.userId,
      title: input.title,
      body: input.body,
      noteDate,
      lastEdited: input.lastEdited ?? noteDate,
      reminderDate: input.reminderDate ?? null,
      alreadyReminded: false
    };
    this.nextNoteId += 1;
    this.notesById.set(note.id, note);
    return { ...note };
  }

  async getNote(noteId: number): Promise<Note | undefined> {
    const note = this.notesById.get(noteId);
    return note ? { ...note } : undefined;
  }

  async updateNote(note: Note): Promise<void> {
    if (!this.notesById.has(note.id)) {
      return;
    }
    this.notesById.set(note.id, { ...note });
  }

  async deleteNote(noteId: number): Promise<void> {
    this.noteTags = this.noteTags.filter((item) => item.noteId !== noteId);
    this.notesById.delete(noteId);
  }

  async listNotesByUser(userId: number, page: Page): Promise<Note[]> {
    const notes = [...this.notesById.values()]
      .filter((note) => note.userId === userId)
      .sort((a, b) => a.id - b.id);
    return paginate(notes, page).map((note) => ({ ...note }));
  }

  async listDueReminders(before: string): Promise<Note[]> {
    return [...this.notesById.values()]
      .filter(
        (note) =>
          note.reminderDate !== null && !note.alreadyReminded && note.reminderDate <= before
      )
      .sort((a, b) => (a.reminderDate ?? '').localeCompare(b.reminderDate ?? '') || a.id - b.id)
      .map((note) => ({ ...note }));
  }

  async markReminded(noteId: number, reminderDate: string): Promise<boolean> {
    const note = this.notesById.get(noteId);
    if (!note || note.alreadyReminded || note.reminderDate !== reminderDate) {
      return false;
    }
    this.notesById.set(noteId, { ...note, alreadyReminded: true });
    return true;
  }

  async findOrCreateTag(label: string): Promise<Tag> {
    const key = tagKey(label);
    const existingId = this.tagIdByKey.get(key);
    const existing = existingId === undefined ? undefined : this.tagsById.get(existingId);
    if (existing) {
      return { ...existing };
    }
    const tag: Tag = { id: this.nextTagId, label: normalizeTagLabel(label) };
    this.nextTagId += 1;
    this.tagsById.set(tag.id, tag);
    this.tagIdByKey.set(key, tag.id);
    return { ...tag };
  }

  async getTag(tagId: number): Promise<Tag | undefined> {
    const tag = this.tagsById.get(tagId);
    return tag ? { ...tag } : undefined;
  }

  async attachTag(noteId: number, tagId: number): Promise<void> {
    if (!this.notesById.has(noteId) || !this.tagsById.has(tagId)) {
      throw noteOrTagMissing();
    }
    const exists = this.noteTags.some((item) => item.noteId === noteId && item.tagId === tagId);
    if (!exists) {
      this.noteTags.push({ noteId, tagId });
    }
  }

  async detachTag(noteId: number, tagId: number): Promise<boolean> {
    const before = this.noteTags.length;
    this.noteTags = this.noteTags.filter(
      (item) => !(item.noteId === noteId && item.tagId === tagId)
    );
    return this.noteTags.length < before;
  }

  async listTagsByNote(noteId: number): Promise<Tag[]> {
    const tags: Tag[] = [];
    this.noteTags.forEach((item) => {
      const tag = item.noteId === noteId ? this.tagsById.get(item.tagId) : undefined;
      if (tag) {
        tags.push({ ...tag });
      }
    });
    return tags.sort((a, b) => a.id - b.id);
  }

  async listNotesByTag(tagId: number, page: Page, userId?: number): Promise<Note[]> {
    const notes: Note[] = [];
    this.noteTags.forEach((item) => {
      const note = item.tagId === tagId ? this.notesById.get(item.noteId) : undefined;
      if (note && (userId === undefined || note.userId === userId)) {
        notes.push({ ...note });
      }
    });
    return paginate(
      notes.sort((a, b) => a.id - b.id),
      page
    );
  }

  async listNoteTags(filter: NoteTagFilter): Promise<NoteTag[]> {
    return this.noteTags
      .filter((item) => {
        if (filter.noteId !== undefined && item.noteId !== filter.noteId) {
          return false;
        }
        if (filter.tagId !== undefined && item.tagId !== filter.tagId) {
          return false;
        }
        return true;
      })
      .map((item) => ({ ...item }));
  }

  private assertUnique(username: string, email: string, exceptId?: number): void {
    for (const user of this.usersById.values()) {
      if (user.id === exceptId) {
        continue;
      }
      if (user.username === username) {
        throw new UniquenessViolationError('username');
      }
      if (user.email === email) {
        throw new UniquenessViolationError('email');
      }
    }
  }
}

interface UserRow {
  id: number;
  username: string;
  email: string;
  creation_date: Date;
  password_hash: string | null;
  country: string;
  time_zone: string;
}

interface NoteRow {
  id: number;
  user_id: number;
  title: string;
  note: string;
  note_date: Date;
  last_edited: Date;
  reminder_date: Date | null;
  already_reminded: boolean;
}

interface TagRow {
  id: number;
  tag: string;
}

interface NoteTagRow {
  note_id: number;
  tag_id: number;
}

const NOTE_COLUMNS =
  'n.id, n.user_id, n.title, n.note, n.note_date, n.last_edited, n.reminder_date, n.already_reminded';

function toUser(row: UserRow): User {
  return {
    id: Number(row.id),
    username: row.username,
    email: row.email,
    creationDate: row.creation_date.toISOString(),
    passwordHash: row.password_hash,
    country: row.country,
    timeZone: row.time_zone
  };
}

function toNote(row: NoteRow): Note {
  return {
    id: Number(row.id),
    userId: Number(row.user_id),
    title: row.title,
    body: row.note,
    noteDate: row.note_date.toISOString(),
    lastEdited: row.last_edited.toISOString(),
    reminderDate: row.reminder_date ? row.reminder_date.toISOString() : null,
    alreadyReminded: row.already_reminded
  };
}

function toTag(row: TagRow): Tag {
  return { id: Number(row.id), label: row.tag };
}

function hasPgCode(err: unknown, code: string): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && err.code === code;
}

function translateWriteError(err: unknown, onForeignKey: () => AppError): unknown {
  if (hasPgCode(err, '23505')) {
    const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : '';
    return new UniquenessViolationError(constraint.includes('email') ? 'email' : 'username');
  }
  if (hasPgCode(err, '23503')) {
    return onForeignKey();
  }
  return err;
}

export class PostgresStore implements DataStore {
  private readonly pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        username TEXT NOT NULL,
        email TEXT NOT NULL,
        creation_date TIMESTAMPTZ NOT NULL DEFAULT now(),
        password_hash VARCHAR(${PASSWORD_HASH_LENGTH}),
        country TEXT NOT NULL DEFAULT 'United States',
        time_zone TEXT NOT NULL DEFAULT 'America/New_York',
        CONSTRAINT users_username_key UNIQUE (username),
        CONSTRAINT users_email_key UNIQUE (email)
      );
      CREATE INDEX IF NOT EXISTS idx_users_creation_date ON users(creation_date);

      CREATE TABLE IF NOT EXISTS notes (
        id SERIAL PRIMARY KEY,
        user_id INT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        note TEXT NOT NULL,
        note_date TIMESTAMPTZ NOT NULL,
        last_edited TIMESTAMPTZ NOT NULL,
        reminder_date TIMESTAMPTZ,
        already_reminded BOOLEAN NOT NULL DEFAULT FALSE,
        CHECK (last_edited >= note_date),
        CHECK (NOT already_reminded OR reminder_date IS NOT NULL)
      );
      CREATE INDEX IF NOT EXISTS idx_notes_user_id ON notes(user_id, id);
      CREATE INDEX IF NOT EXISTS idx_notes_title ON notes(title);
      CREATE INDEX IF NOT EXISTS idx_notes_pending_reminders
        ON notes(reminder_date) WHERE already_reminded = FALSE;

      CREATE TABLE IF NOT EXISTS tags (
        id SERIAL PRIMARY KEY,
        tag TEXT NOT NULL,
        tag_key TEXT NOT NULL UNIQUE
      );

      CREATE TABLE IF NOT EXISTS note_tags (
        note_id INT NOT NULL REFERENCES notes(id) ON DELETE CASCADE,
        tag_id INT NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
        PRIMARY KEY(note_id, tag_id)
      );
      CREATE INDEX IF NOT EXISTS idx_note_tags_tag_id ON note_tags(tag_id);
    `);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async createUser(user: NewUser): Promise<User> {
    try {
      const { rows } = await this.pool.query<UserRow>(
        `INSERT INTO users(username, email, password_hash, country, time_zone, creation_date)
         VALUES ($1,$2,$3,$4,$5,COALESCE($6::timestamptz, now()))
         RETURNING *`,
        [
          user.username,
          user.email,
          user.passwordHash,
          user.country ?? DEFAULT_COUNTRY,
          user.timeZone ?? DEFAULT_TIME_ZONE,
          user.creationDate ?? null
        ]
      );
      return toUser(rows[0]);
    } catch (err) {
      throw translateWriteError(err, ownerMissing);
    }
  }

  async getUserById(userId: number): Promise<User | undefined> {
    const { rows } = await this.pool.query<UserRow>('SELECT * FROM users WHERE id = $1', [userId]);
    const row = rows[0];
    return row ? toUser(row) : undefined;
  }

  async getUserByUsername(username: string): Promise<User | undefined> {
    const { rows } = await this.pool.query<UserRow>('SELECT * FROM users WHERE username = $1', [
      username
    ]);
    const row = rows[0];
    return row ? toUser(row) : undefined;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const { rows } = await this.pool.query<UserRow>('SELECT * FROM users WHERE email = $1', [
      email
    ]);
    const row = rows[0];
    return row ? toUser(row) : undefined;
  }

  async updateUser(user: User): Promise<void> {
    try {
      await this.pool.query(
        `UPDATE users
         SET username = $2, email = $3, password_hash = $4, country = $5, time_zone = $6
         WHERE id = $1`,
        [user.id, user.username, user.email, user.passwordHash, user.country, user.timeZone]
      );
    } catch (err) {
      throw translateWriteError(err, ownerMissing);
    }
  }

  async deleteUser(userId: number): Promise<void> {
    await this.pool.query('DELETE FROM users WHERE id = $1', [userId]);
  }

  async createNote(note: NewNote): Promise<Note> {
    const noteDate = note.noteDate ?? toIso(now());
    try {
      const { rows } = await this.pool.query<NoteRow>(
        `INSERT INTO notes(user_id, title, note, note_date, last_edited, reminder_date)
         VALUES ($1,$2,$3,$4,$5,$6)
         RETURNING *`,
        [
          note.userId,
          note.title,
          note.body,
          noteDate,
          note.lastEdited ?? noteDate,
          note.reminderDate ?? null
        ]
      );
      return toNote(rows[0]);
    } catch (err) {
      throw translateWriteError(err, ownerMissing);
    }
  }

  async getNote(noteId: number): Promise<Note | undefined> {
    const { rows } = await this.pool.query<NoteRow>('SELECT * FROM notes WHERE id = $1', [noteId]);
    const row = rows[0];
    return row ? toNote(row) : undefined;
  }

  async updateNote(note: Note): Promise<void> {
    await this.pool.query(
      `UPDATE notes
       SET title = $2, note = $3, last_edited = $4, reminder_date = $5, already_reminded = $6
       WHERE id = $1`,
      [note.id, note.title, note.body, note.lastEdited, note.reminderDate, note.alreadyReminded]
    );
  }

  async deleteNote(noteId: number): Promise<void> {
    await this.pool.query('DELETE FROM notes WHERE id = $1', [noteId]);
  }

  async listNotesByUser(userId: number, page: Page): Promise<Note[]> {
    const { rows } = await this.pool.query<NoteRow>(
      'SELECT * FROM notes WHERE user_id = $1 ORDER BY id ASC LIMIT $2 OFFSET $3',
      [userId, page.limit, page.offset]
    );
    return rows.map(toNote);
  }

  async listDueReminders(before: string): Promise<Note[]> {
    const { rows } = await this.pool.query<NoteRow>(
      `SELECT * FROM notes
       WHERE reminder_date IS NOT NULL AND reminder_date <= $1 AND already_reminded = FALSE
       ORDER BY reminder_date ASC, id ASC`,
      [before]
    );
    return rows.map(toNote);
  }

  async markReminded(noteId: number, reminderDate: string): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE notes SET already_reminded = TRUE
       WHERE id = $1 AND reminder_date = $2 AND already_reminded = FALSE`,
      [noteId, reminderDate]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findOrCreateTag(label: string): Promise<Tag> {
    const { rows } = await this.pool.query<TagRow>(
      `INSERT INTO tags(tag, tag_key) VALUES ($1,$2)
       ON CONFLICT (tag_key) DO UPDATE SET tag_key = EXCLUDED.tag_key
       RETURNING id, tag`,
      [normalizeTagLabel(label), tagKey(label)]
    );
    return toTag(rows[0]);
  }

  async getTag(tagId: number): Promise<Tag | undefined> {
    const { rows } = await this.pool.query<TagRow>('SELECT id, tag FROM tags WHERE id = $1', [
      tagId
    ]);
    const row = rows[0];
    return row ? toTag(row) : undefined;
  }

  async attachTag(noteId: number, tagId: number): Promise<void> {
    try {
      await this.pool.query(
        'INSERT INTO note_tags(note_id, tag_id) VALUES ($1,$2) ON CONFLICT DO NOTHING',
        [noteId, tagId]
      );
    } catch (err) {
      throw translateWriteError(err, noteOrTagMissing);
    }
  }

  async detachTag(noteId: number, tagId: number): Promise<boolean> {
    const result = await this.pool.query(
      'DELETE FROM note_tags WHERE note_id = $1 AND tag_id = $2',
      [noteId, tagId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listTagsByNote(noteId: number): Promise<Tag[]> {
    const { rows } = await this.pool.query<TagRow>(
      `SELECT t.id, t.tag FROM tags t
       JOIN note_tags nt ON nt.tag_id = t.id
       WHERE nt.note_id = $1
       ORDER BY t.id ASC`,
      [noteId]
    );
    return rows.map(toTag);
  }

  async listNotesByTag(tagId: number, page: Page, userId?: number): Promise<Note[]> {
    const { rows } = await this.pool.query<NoteRow>(
      `SELECT ${NOTE_COLUMNS} FROM notes n
       JOIN note_tags nt ON nt.note_id = n.id
       WHERE nt.tag_id = $1 AND ($4::int IS NULL OR n.user_id = $4)
       ORDER BY n.id ASC LIMIT $2 OFFSET $3`,
      [tagId, page.limit, page.offset, userId ?? null]
    );
    return rows.map(toNote);
  }

  async listNoteTags(filter: NoteTagFilter): Promise<NoteTag[]> {
    const { rows } = await this.pool.query<NoteTagRow>(
      `SELECT note_id, tag_id FROM note_tags
       WHERE ($1::int IS NULL OR note_id = $1) AND ($2::int IS NULL OR tag_id = $2)
       ORDER BY note_id ASC, tag_id ASC`,
      [filter.noteId ?? null, filter.tagId ?? null]
    );
    return rows.map((row) => ({ noteId: Number(row.note_id), tagId: Number(row.tag_id) }));
  }
}

export function createStore(params: { kind: StoreKind; databaseUrl?: string }): DataStore {
  if (params.kind === 'memory') {
    return new InMemoryStore();
  }
  if (!params.databaseUrl) {
    throw new Error('DATABASE_URL is required when using postgres store');
  }
  return new PostgresStore(params.databaseUrl);
}
