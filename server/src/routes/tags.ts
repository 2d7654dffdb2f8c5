import type { FastifyInstance } from 'fastify';
import * as tagService from '../services/tagService.js';

export default async function tagRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/tags
   * List all tags, sorted alphabetically by name, with usage counts.
   * Tags are read-only: they follow the hashtags in entry descriptions.
   */
  fastify.get('/', async (_request, reply) => {
    const tags = tagService.listTags(fastify.db);
    return reply.status(200).send({ tags });
  });
}
