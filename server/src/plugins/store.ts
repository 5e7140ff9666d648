import fp from 'fastify-plugin';
import { NoteStore } from '../store/noteStore.js';

// Type augmentation: makes fastify.store available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    store: NoteStore;
  }
}

export default fp(
  async function storePlugin(fastify) {
    const store = new NoteStore();
    fastify.log.info('In-memory note store initialized');

    // Decorate the Fastify instance so all routes can access fastify.store
    fastify.decorate('store', store);

    // Contents do not survive the instance
    fastify.addHook('onClose', () => {
      fastify.log.info({ notes: store.size }, 'Discarding in-memory note store');
      store.clear();
    });
  },
  {
    name: 'store',
  },
);
