export const DEFAULT_COUNTRY = 'United States';
export const DEFAULT_TIME_ZONE = 'America/New_York';

export interface User {
  id: number;
  username: string;
  email: string;
  creationDate: string;
  passwordHash: string | null;
  country: string;
  timeZone: string;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string | null;
  country?: string;
  timeZone?: string;
  creationDate?: string;
}

export interface Principal {
  getId(): string;
  isActive(): boolean;
}

export interface Tag {
  id: number;
  label: string;
}

export interface Note {
  id: number;
  userId: number;
  title: string;
  body: string;
  noteDate: string;
  lastEdited: string;
  reminderDate: string | null;
  alreadyReminded: boolean;
}

export interface NewNote {
  userId: number;
  title: string;
  body: string;
  noteDate?: string;
  lastEdited?: string;
  reminderDate?: string | null;
}

export interface NoteTag {
  noteId: number;
  tagId: number;
}

export interface Page {
  limit: number;
  offset: number;
}

export interface NoteWithTags {
  note: Note;
  tags: Tag[];
}
