import { Router } from 'express';
import z from 'zod/v3';

import { listQuerySchema, parseId, parseRequest } from '@app/http/request-parsing.js';
import type { ServiceResolver } from '@app/http/request-parsing.js';
import { categoryFields, categoryPatchFields } from '@app/schemas.js';
import type { CategoryService } from '@app/services/category-service.js';

const CategoryBodySchema = z.object(categoryFields);
const CategoryPatchBodySchema = z.object(categoryPatchFields);

export function createCategoryRouter(categories: ServiceResolver<CategoryService>): Router {
  const router = Router();

  router.get('/', async function (req, res) {
    const options = parseRequest(listQuerySchema, req.query, 'query parameters');
    res.json(await categories(res).listCategories(options));
  });

  router.post('/', async function (req, res) {
    const input = parseRequest(CategoryBodySchema, req.body, 'category');
    res.status(201).json(await categories(res).createCategory(input));
  });

  router.get('/:id', async function (req, res) {
    res.json(await categories(res).getCategory(parseId(req.params.id)));
  });

  router.put('/:id', async function (req, res) {
    const id = parseId(req.params.id);
    const patch = parseRequest(CategoryPatchBodySchema, req.body, 'category');
    res.json(await categories(res).updateCategory(id, patch));
  });

  router.delete('/:id', async function (req, res) {
    await categories(res).deleteCategory(parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
