import { createComponentLogger } from '../logger';
import { noteLabel } from '../models';
import type { DataStore } from '../store';
import type { Note } from '../types';
import { now, toIso } from '../utils';

const log = createComponentLogger('reminders');

export interface ReminderNotifier {
  notify(note: Note): Promise<void>;
}

export const logNotifier: ReminderNotifier = {
  async notify(note) {
    log.info({ noteId: note.id, userId: note.userId }, `reminder due: ${noteLabel(note)}`);
  }
};

export class ReminderService {
  constructor(
    private readonly store: DataStore,
    private readonly notifier: ReminderNotifier = logNotifier
  ) {}

  /**
   * Delivers every reminder that has passed and latches it. A note whose
   * delivery fails stays unlatched and is retried on the next run, and so does
   * one whose reminder was replaced while it was being delivered.
   */
  async dispatchDue(): Promise<Note[]> {
    const due = await this.store.listDueReminders(toIso(now()));
    const delivered: Note[] = [];
    for (const note of due) {
      try {
        await this.notifier.notify(note);
      } catch (err) {
        log.warn({ err, noteId: note.id }, 'reminder delivery failed');
        continue;
      }
      if (note.reminderDate === null) {
        continue;
      }
      if (await this.store.markReminded(note.id, note.reminderDate)) {
        delivered.push({ ...note, alreadyReminded: true });
      } else {
        log.debug({ noteId: note.id }, 'note changed or removed during delivery; not latched');
      }
    }
    return delivered;
  }

  start(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.dispatchDue().catch((err: unknown) => {
        log.error({ err }, 'reminder dispatch failed');
      });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}
