import { randomUUID } from 'node:crypto';
import type { Note, CreateNoteRequest, UpdateNoteRequest } from '@notekeeper/shared';
import type { NoteStore } from '../store/noteStore.js';
import { NotFoundError, ValidationError } from '../errors/AppError.js';

/**
 * Trim a title and reject it when nothing is left.
 * @throws ValidationError if the title is empty or whitespace-only
 */
function normalizeTitle(title: string): string {
  const trimmedTitle = title.trim();
  if (trimmedTitle.length === 0) {
    throw new ValidationError('Note title cannot be empty', { field: 'title' });
  }
  return trimmedTitle;
}

/**
 * Timestamp for an update: the store clock, but never at or before the
 * previous `updated_at`.
 */
function nextTimestamp(store: NoteStore, previous: string): string {
  const now = store.now().getTime();
  return new Date(Math.max(now, Date.parse(previous) + 1)).toISOString();
}

/**
 * Ids are stored in the lowercase form `randomUUID` produces.
 */
function normalizeId(noteId: string): string {
  return noteId.toLowerCase();
}

function requireNote(store: NoteStore, noteId: string): Note {
  const note = store.find(normalizeId(noteId));
  if (!note) {
    throw new NotFoundError('Note not found', { id: noteId });
  }
  return note;
}

/**
 * Create a new note.
 * @throws ValidationError if title is empty
 */
export function createNote(store: NoteStore, data: CreateNoteRequest): Note {
  const title = normalizeTitle(data.title);

  const now = store.now().toISOString();
  const note: Note = {
    id: randomUUID(),
    title,
    content: data.content ?? null,
    created_at: now,
    updated_at: now,
  };

  store.insert(note);
  return note;
}

/**
 * List all notes. No ordering is guaranteed.
 */
export function listNotes(store: NoteStore): Note[] {
  return store.all();
}

/**
 * @throws NotFoundError if note does not exist
 */
export function getNote(store: NoteStore, noteId: string): Note {
  return requireNote(store, noteId);
}

/**
 * Update the fields present in `data` and refresh `updated_at`.
 * An explicit `content: null` clears the content; `title: null` is ignored.
 * @throws NotFoundError if note does not exist
 * @throws ValidationError if a supplied title is empty
 */
export function updateNote(store: NoteStore, noteId: string, data: UpdateNoteRequest): Note {
  const existing = requireNote(store, noteId);

  const updated: Note = { ...existing };
  if (data.title !== undefined && data.title !== null) {
    updated.title = normalizeTitle(data.title);
  }
  if (data.content !== undefined) {
    updated.content = data.content;
  }
  updated.updated_at = nextTimestamp(store, existing.updated_at);

  store.replace(updated);
  return updated;
}

/**
 * @throws NotFoundError if note does not exist
 */
export function deleteNote(store: NoteStore, noteId: string): void {
  if (!store.remove(normalizeId(noteId))) {
    throw new NotFoundError('Note not found', { id: noteId });
  }
}
