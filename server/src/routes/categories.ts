import type { FastifyInstance } from 'fastify';
import type { CreateCategoryRequest, UpdateCategoryRequest } from '@timekeep/shared';
import * as categoryService from '../services/categoryService.js';

// JSON schema for POST /api/categories (create category)
const createCategorySchema = {
  body: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 100 },
      color: { type: 'string', pattern: '^#[0-9A-Fa-f]{6}$' },
    },
    additionalProperties: false,
  },
};

// JSON schema for path parameter validation (GET/DELETE)
const categoryIdSchema = {
  params: {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'integer', minimum: 1 },
    },
  },
};

// JSON schema for PATCH /api/categories/:id (update category)
const updateCategorySchema = {
  ...categoryIdSchema,
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 100 },
      color: { type: 'string', pattern: '^#[0-9A-Fa-f]{6}$' },
    },
    additionalProperties: false,
    minProperties: 1,
  },
};

export default async function categoryRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/categories
   * List all categories, sorted alphabetically by name.
   */
  fastify.get('/', async (_request, reply) => {
    const categories = categoryService.listCategories(fastify.db);
    return reply.status(200).send({ categories });
  });

  /**
   * POST /api/categories
   * Create a new category.
   */
  fastify.post<{ Body: CreateCategoryRequest }>(
    '/',
    { schema: createCategorySchema },
    async (request, reply) => {
      const category = categoryService.createCategory(fastify.db, request.body);
      return reply.status(201).send(category);
    },
  );

  /**
   * GET /api/categories/:id
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: categoryIdSchema },
    async (request, reply) => {
      const category = categoryService.getCategoryById(fastify.db, request.params.id);
      return reply.status(200).send(category);
    },
  );

  /**
   * PATCH /api/categories/:id
   * Update a category's name and/or color.
   */
  fastify.patch<{ Params: { id: number }; Body: UpdateCategoryRequest }>(
    '/:id',
    { schema: updateCategorySchema },
    async (request, reply) => {
      const category = categoryService.updateCategory(fastify.db, request.params.id, request.body);
      return reply.status(200).send(category);
    },
  );

  /**
   * DELETE /api/categories/:id
   * Delete a category; its entries become uncategorized.
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: categoryIdSchema },
    async (request, reply) => {
      categoryService.deleteCategory(fastify.db, request.params.id);
      return reply.status(204).send();
    },
  );
}
