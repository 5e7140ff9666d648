/**
 * Note-related types and interfaces.
 * Field names follow the snake_case wire format of the notes API.
 */

/**
 * Note entity as stored and as returned by the API.
 */
export interface Note {
  id: string;
  title: string;
  content: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Request body for creating a new note.
 */
export interface CreateNoteRequest {
  title: string;
  content?: string | null;
}

/**
 * Request body for updating a note. Only the fields present are changed;
 * `content: null` clears the content, `title: null` leaves the title as is.
 */
export interface UpdateNoteRequest {
  title?: string | null;
  content?: string | null;
}

/**
 * Response for GET /notes.
 */
export type NoteListResponse = Note[];
