import type { FastifyInstance } from 'fastify';
import * as noteService from '../services/noteService.js';
import type {
  CreateNoteRequest,
  NoteListResponse,
  UpdateNoteRequest,
} from '@notekeeper/shared';

const noteIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', format: 'uuid' },
  },
};

// JSON schema for POST /notes (create note)
const createNoteSchema = {
  body: {
    type: 'object',
    required: ['title'],
    properties: {
      title: { type: 'string' },
      content: { type: ['string', 'null'] },
    },
    additionalProperties: false,
  },
};

// JSON schema for PUT /notes/:id (update note)
const updateNoteSchema = {
  body: {
    type: 'object',
    properties: {
      title: { type: ['string', 'null'] },
      content: { type: ['string', 'null'] },
    },
    additionalProperties: false,
  },
  params: noteIdParams,
};

// JSON schema for path parameter validation (GET/DELETE)
const noteIdParamsSchema = {
  params: noteIdParams,
};

export default async function noteRoutes(fastify: FastifyInstance) {
  /**
   * POST /notes
   * Create a new note.
   */
  fastify.post<{ Body: CreateNoteRequest }>(
    '/',
    { schema: createNoteSchema },
    async (request, reply) => {
      const note = noteService.createNote(fastify.store, request.body);
      request.log.debug({ noteId: note.id }, 'Note created');
      return reply.status(201).send(note);
    },
  );

  /**
   * GET /notes
   * List all notes.
   */
  fastify.get('/', async (_request, reply) => {
    const notes: NoteListResponse = noteService.listNotes(fastify.store);
    return reply.status(200).send(notes);
  });

  /**
   * GET /notes/:id
   * Fetch a single note.
   */
  fastify.get<{ Params: { id: string } }>(
    '/:id',
    { schema: noteIdParamsSchema },
    async (request, reply) => {
      const note = noteService.getNote(fastify.store, request.params.id);
      return reply.status(200).send(note);
    },
  );

  /**
   * PUT /notes/:id
   * Update the supplied fields of a note.
   */
  fastify.put<{ Params: { id: string }; Body: UpdateNoteRequest }>(
    '/:id',
    { schema: updateNoteSchema },
    async (request, reply) => {
      const note = noteService.updateNote(fastify.store, request.params.id, request.body);
      return reply.status(200).send(note);
    },
  );

  /**
   * DELETE /notes/:id
   * Delete a note.
   */
  fastify.delete<{ Params: { id: string } }>(
    '/:id',
    { schema: noteIdParamsSchema },
    async (request, reply) => {
      noteService.deleteNote(fastify.store, request.params.id);
      request.log.debug({ noteId: request.params.id }, 'Note deleted');
      return reply.status(204).send();
    },
  );
}
