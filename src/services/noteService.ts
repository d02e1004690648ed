import { AppError } from '../errors';
import { createComponentLogger } from '../logger';
import { noteLabel, tagLabel } from '../models';
import type { DataStore } from '../store';
import type { Note, NoteWithTags, Page, Tag } from '../types';
import { normalizeTagLabel, now, toIso } from '../utils';

const log = createComponentLogger('notes');

const MAX_TAG_LENGTH = 64;

export interface NoteDraft {
  title: string;
  body: string;
  tags?: string[];
  reminderDate?: string | null;
}

export interface NoteEdit {
  title?: string;
  body?: string;
}

/** The edit time never moves backwards, even if the wall clock does. */
function nextEditTime(note: Note): string {
  return [toIso(now()), note.lastEdited, note.noteDate].reduce((latest, candidate) =>
    candidate > latest ? candidate : latest
  );
}

export class NoteService {
  constructor(private readonly store: DataStore) {}

  async create(userId: number, draft: NoteDraft): Promise<NoteWithTags> {
    const labels = (draft.tags ?? []).map((label) => this.validateLabel(label));
    const note = await this.store.createNote({
      userId,
      title: draft.title,
      body: draft.body,
      reminderDate: draft.reminderDate ?? null
    });
    for (const label of labels) {
      const tag = await this.store.findOrCreateTag(label);
      await this.store.attachTag(note.id, tag.id);
    }
    log.debug({ userId, noteId: note.id }, `created ${noteLabel(note)}`);
    return { note, tags: await this.store.listTagsByNote(note.id) };
  }

  async getById(userId: number, noteId: number): Promise<NoteWithTags> {
    const note = await this.assertOwner(userId, noteId);
    return { note, tags: await this.store.listTagsByNote(note.id) };
  }

  async list(userId: number, page: Page): Promise<Note[]> {
    return this.store.listNotesByUser(userId, page);
  }

  async edit(userId: number, noteId: number, changes: NoteEdit): Promise<Note> {
    const note = await this.assertOwner(userId, noteId);
    const edited: Note = {
      ...note,
      title: changes.title ?? note.title,
      body: changes.body ?? note.body,
      lastEdited: nextEditTime(note)
    };
    await this.store.updateNote(edited);
    return edited;
  }

  /** Replacing or clearing the reminder re-arms the latch. */
  async setReminder(userId: number, noteId: number, reminderDate: string | null): Promise<Note> {
    const note = await this.assertOwner(userId, noteId);
    const updated: Note = { ...note, reminderDate, alreadyReminded: false };
    await this.store.updateNote(updated);
    return updated;
  }

  async attachTag(userId: number, noteId: number, label: string): Promise<NoteWithTags> {
    const note = await this.assertOwner(userId, noteId);
    const tag = await this.store.findOrCreateTag(this.validateLabel(label));
    await this.store.attachTag(note.id, tag.id);
    log.debug({ noteId, tagId: tag.id }, `attached ${tagLabel(tag)}`);
    return { note, tags: await this.store.listTagsByNote(note.id) };
  }

  async detachTag(userId: number, noteId: number, tagId: number): Promise<NoteWithTags> {
    const note = await this.assertOwner(userId, noteId);
    const removed = await this.store.detachTag(note.id, tagId);
    if (!removed) {
      throw new AppError(404, 40405, 'Tag is not attached to this note');
    }
    return { note, tags: await this.store.listTagsByNote(note.id) };
  }

  async delete(userId: number, noteId: number): Promise<void> {
    const note = await this.assertOwner(userId, noteId);
    await this.store.deleteNote(note.id);
  }

  async notesForTag(userId: number, tagId: number, page: Page): Promise<{ tag: Tag; notes: Note[] }> {
    const tag = await this.store.getTag(tagId);
    if (!tag) {
      throw new AppError(404, 40406, 'Tag not found');
    }
    const notes = await this.store.listNotesByTag(tag.id, page, userId);
    return { tag, notes };
  }

  private async assertOwner(userId: number, noteId: number): Promise<Note> {
    const note = await this.store.getNote(noteId);
    if (!note || note.userId !== userId) {
      throw new AppError(404, 40403, 'Note not found');
    }
    return note;
  }

  private validateLabel(label: string): string {
    const normalized = normalizeTagLabel(label);
    if (normalized.length === 0) {
      throw new AppError(400, 40006, 'Tag label must not be empty');
    }
    if (normalized.length > MAX_TAG_LENGTH) {
      throw new AppError(400, 40007, `Tag label must be at most ${MAX_TAG_LENGTH} characters`);
    }
    return normalized;
  }
}
