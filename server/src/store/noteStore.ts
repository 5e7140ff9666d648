import type { Note } from '@notekeeper/shared';

export type Clock = () => Date;

/**
 * In-memory note collection keyed by note id.
 *
 * Every method is synchronous, so a call runs to completion on the event loop
 * before any other request touches the collection. Notes are copied on the
 * way in and on the way out; callers never hold a reference to a stored record.
 */
export class NoteStore {
  private readonly notes = new Map<string, Note>();
  readonly now: Clock;

  constructor(clock: Clock = () => new Date()) {
    this.now = clock;
  }

  get size(): number {
    return this.notes.size;
  }

  has(id: string): boolean {
    return this.notes.has(id);
  }

  find(id: string): Note | undefined {
    const note = this.notes.get(id);
    return note ? { ...note } : undefined;
  }

  all(): Note[] {
    return Array.from(this.notes.values(), (note) => ({ ...note }));
  }

  /**
   * @throws Error if a note with the same id is already stored
   */
  insert(note: Note): void {
    if (this.notes.has(note.id)) {
      throw new Error(`Note ${note.id} already exists`);
    }
    this.notes.set(note.id, { ...note });
  }

  /**
   * Overwrite an existing note. Returns false when the id is not stored.
   */
  replace(note: Note): boolean {
    if (!this.notes.has(note.id)) return false;
    this.notes.set(note.id, { ...note });
    return true;
  }

  remove(id: string): boolean {
    return this.notes.delete(id);
  }

  clear(): void {
    this.notes.clear();
  }
}
