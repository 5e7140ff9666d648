/**
 * @notekeeper/shared
 *
 * Shared TypeScript types for the notes API: request/response shapes,
 * the note entity and error codes.
 */

export type { ApiError, ApiErrorResponse, FieldError } from './types/api.js';
export type { ErrorCode } from './types/errors.js';
export type { HealthResponse } from './types/health.js';

// Notes
export type {
  Note,
  CreateNoteRequest,
  UpdateNoteRequest,
  NoteListResponse,
} from './types/note.js';
