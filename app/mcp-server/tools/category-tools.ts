import z from 'zod/v3';

import { defineTool } from '@app/mcp-server/tool-registry.js';
import type { ToolRegistry } from '@app/mcp-server/tool-registry.js';
import {
  categoryFields,
  categoryPatchFields,
  categoryShape,
  deletedShape,
  listFields,
  pageShape,
} from '@app/schemas.js';
import type { CategoryService } from '@app/services/category-service.js';

const categoryId = z.number().int().positive().describe('Category id');

export function defineCategoryTools(registry: ToolRegistry, categories: CategoryService): void {
  registry.register(defineTool({
    name: 'create_category',
    group: 'category',
    title: 'Create category',
    description: 'Create an invoice category with a name, an optional description and an optional hex color.',
    inputSchema: categoryFields,
    outputSchema: categoryShape,
    invoke: function (input) {
      return categories.createCategory(input);
    },
  }));

  registry.register(defineTool({
    name: 'list_categories',
    group: 'category',
    title: 'List categories',
    description: 'List categories ordered by name, optionally filtered by keyword, with paging.',
    inputSchema: listFields,
    outputSchema: pageShape(categoryShape),
    invoke: function (input) {
      return categories.listCategories(input);
    },
  }));

  registry.register(defineTool({
    name: 'get_category',
    group: 'category',
    title: 'Get category',
    description: 'Get one category by id.',
    inputSchema: { categoryId },
    outputSchema: categoryShape,
    invoke: function (input) {
      return categories.getCategory(input.categoryId);
    },
  }));

  registry.register(defineTool({
    name: 'update_category',
    group: 'category',
    title: 'Update category',
    description: 'Update the given fields of a category. Omitted fields keep their value; null clears an optional field.',
    inputSchema: { categoryId, ...categoryPatchFields },
    outputSchema: categoryShape,
    invoke: function ({ categoryId, ...patch }) {
      return categories.updateCategory(categoryId, patch);
    },
  }));

  registry.register(defineTool({
    name: 'delete_category',
    group: 'category',
    title: 'Delete category',
    description: 'Delete a category. Fails with a conflict while any invoice still uses it.',
    inputSchema: { categoryId },
    outputSchema: deletedShape,
    invoke: async function (input) {
      await categories.deleteCategory(input.categoryId);
      return { deleted: true as const, id: input.categoryId };
    },
  }));
}
