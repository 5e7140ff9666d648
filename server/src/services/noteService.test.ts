import { describe, it, expect, beforeEach } from '@jest/globals';
import { NoteStore } from '../store/noteStore.js';
import * as noteService from './noteService.js';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import type { CreateNoteRequest, UpdateNoteRequest } from '@notekeeper/shared';

describe('Note Service', () => {
  let store: NoteStore;
  let currentTime: number;

  /**
   * Store whose clock only moves when a test advances it.
   */
  function createTestStore() {
    return new NoteStore(() => new Date(currentTime));
  }

  beforeEach(() => {
    currentTime = Date.parse('2024-03-01T12:00:00.000Z');
    store = createTestStore();
  });

  describe('createNote()', () => {
    it('creates a note with a generated id and equal timestamps', () => {
      const data: CreateNoteRequest = { title: 'Groceries', content: 'milk' };

      const result = noteService.createNote(store, data);

      expect(result.id).toHaveLength(36);
      expect(result.title).toBe('Groceries');
      expect(result.content).toBe('milk');
      expect(result.created_at).toBe('2024-03-01T12:00:00.000Z');
      expect(result.updated_at).toBe('2024-03-01T12:00:00.000Z');
      expect(store.size).toBe(1);
    });

    it('trims whitespace from the title but not from content', () => {
      const result = noteService.createNote(store, { title: '  Groceries \n', content: ' milk ' });

      expect(result.title).toBe('Groceries');
      expect(result.content).toBe(' milk ');
    });

    it('stores null content when content is omitted or null', () => {
      const omitted = noteService.createNote(store, { title: 'A' });
      const explicit = noteService.createNote(store, { title: 'B', content: null });

      expect(omitted.content).toBeNull();
      expect(explicit.content).toBeNull();
    });

    it('never repeats an id, including after deletions', () => {
      const seen = new Set<string>();
      for (let i = 0; i < 50; i++) {
        const note = noteService.createNote(store, { title: `Note ${i}` });
        seen.add(note.id);
        if (i % 2 === 0) {
          noteService.deleteNote(store, note.id);
        }
      }

      expect(seen.size).toBe(50);
    });

    it.each(['', '   ', '\t\n'])('rejects title %j without touching the store', (title) => {
      expect(() => noteService.createNote(store, { title })).toThrow(ValidationError);
      expect(() => noteService.createNote(store, { title })).toThrow('Note title cannot be empty');
      expect(store.size).toBe(0);
    });
  });

  describe('listNotes()', () => {
    it('returns an empty array for an empty store', () => {
      expect(noteService.listNotes(store)).toEqual([]);
    });

    it('returns every stored note', () => {
      const first = noteService.createNote(store, { title: 'First' });
      const second = noteService.createNote(store, { title: 'Second' });

      const result = noteService.listNotes(store);

      expect(result).toHaveLength(2);
      expect(result).toEqual(expect.arrayContaining([first, second]));
    });
  });

  describe('getNote()', () => {
    it('returns a note identical to the created one', () => {
      const created = noteService.createNote(store, { title: 'Groceries', content: 'milk' });

      expect(noteService.getNote(store, created.id)).toEqual(created);
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() => noteService.getNote(store, 'missing')).toThrow(NotFoundError);
      expect(() => noteService.getNote(store, 'missing')).toThrow('Note not found');
    });

    it('accepts the id in uppercase', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });

      expect(noteService.getNote(store, created.id.toUpperCase())).toEqual(created);
    });

    it('returns a copy that cannot alter the stored note', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });

      const fetched = noteService.getNote(store, created.id);
      fetched.title = 'Changed';

      expect(noteService.getNote(store, created.id).title).toBe('Groceries');
    });
  });

  describe('updateNote()', () => {
    it('changes only the title and refreshes updated_at', () => {
      const created = noteService.createNote(store, { title: 'Groceries', content: 'milk' });
      currentTime += 5000;

      const data: UpdateNoteRequest = { title: ' Shopping ' };
      const result = noteService.updateNote(store, created.id, data);

      expect(result).toEqual({
        id: created.id,
        title: 'Shopping',
        content: 'milk',
        created_at: '2024-03-01T12:00:00.000Z',
        updated_at: '2024-03-01T12:00:05.000Z',
      });
      expect(noteService.getNote(store, created.id)).toEqual(result);
    });

    it('changes only the content when title is absent', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });
      currentTime += 1000;

      const result = noteService.updateNote(store, created.id, { content: 'milk, eggs' });

      expect(result.title).toBe('Groceries');
      expect(result.content).toBe('milk, eggs');
    });

    it('clears content on explicit null', () => {
      const created = noteService.createNote(store, { title: 'Groceries', content: 'milk' });

      const result = noteService.updateNote(store, created.id, { content: null });

      expect(result.content).toBeNull();
    });

    it('ignores a null title', () => {
      const created = noteService.createNote(store, { title: 'Groceries', content: 'milk' });

      const result = noteService.updateNote(store, created.id, { title: null });

      expect(result.title).toBe('Groceries');
      expect(result.content).toBe('milk');
    });

    it('moves updated_at forward even when the clock has not advanced', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });

      const first = noteService.updateNote(store, created.id, {});
      const second = noteService.updateNote(store, created.id, {});

      expect(first.updated_at).toBe('2024-03-01T12:00:00.001Z');
      expect(second.updated_at).toBe('2024-03-01T12:00:00.002Z');
      expect(second.created_at).toBe('2024-03-01T12:00:00.000Z');
    });

    it('moves updated_at forward when the clock goes backwards', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });
      currentTime -= 60_000;

      const result = noteService.updateNote(store, created.id, { title: 'Later' });

      expect(result.updated_at).toBe('2024-03-01T12:00:00.001Z');
    });

    it('rejects an empty title and leaves the note unchanged', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });
      currentTime += 1000;

      expect(() => noteService.updateNote(store, created.id, { title: '  ' })).toThrow(
        ValidationError,
      );
      expect(noteService.getNote(store, created.id)).toEqual(created);
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() => noteService.updateNote(store, 'missing', { title: 'X' })).toThrow(
        NotFoundError,
      );
    });
  });

  describe('deleteNote()', () => {
    it('removes the note permanently', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });

      noteService.deleteNote(store, created.id);

      expect(store.size).toBe(0);
      expect(() => noteService.getNote(store, created.id)).toThrow(NotFoundError);
    });

    it('throws NotFoundError when deleting twice', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });
      noteService.deleteNote(store, created.id);

      expect(() => noteService.deleteNote(store, created.id)).toThrow(NotFoundError);
    });

    it('accepts the id in uppercase', () => {
      const created = noteService.createNote(store, { title: 'Groceries' });

      noteService.deleteNote(store, created.id.toUpperCase());

      expect(store.size).toBe(0);
    });

    it('leaves other notes in place', () => {
      const keep = noteService.createNote(store, { title: 'Keep' });
      const drop = noteService.createNote(store, { title: 'Drop' });

      noteService.deleteNote(store, drop.id);

      expect(noteService.listNotes(store)).toEqual([keep]);
    });
  });
});
