import type { SqlExecutor, StorageHandle } from '@app/data/storage-backend.js';
import { ConflictError, NotFoundError } from '@app/errors.js';
import type { Category, CategoryInput, CategoryPatch, ListOptions, Page } from '@app/services/models.js';
import {
  likePattern,
  normalizeListOptions,
  optionalColor,
  optionalText,
  positiveId,
  requireText,
} from '@app/services/validation.js';
import { firstRow, readNumber, readNullableString, readString } from '@app/tools/assertion.js';
import type { SqlRow } from '@app/tools/assertion.js';

/**
 * Categories of one owner. Every query is scoped to the owner the service was built for.
 */
export class CategoryService {
  #storage: StorageHandle;
  #owner: string;

  constructor(storage: StorageHandle, owner: string) {
    this.#storage = storage;
    this.#owner = owner;
  }

  async createCategory(input: CategoryInput): Promise<Category> {
    const name = requireText(input.name, 'name', 100);
    const description = optionalText(input.description);
    const color = optionalColor(input.color);
    const now = new Date().toISOString();
    const rows = await this.#storage.sql`
      INSERT INTO invoice_categories (owner, name, description, color, created_at, updated_at)
      VALUES (${this.#owner}, ${name}, ${description}, ${color}, ${now}, ${now})
      RETURNING *
    `;
    return toCategory(firstRow(rows));
  }

  async getCategory(id: number): Promise<Category> {
    const category = await findCategory(this.#storage, this.#owner, positiveId(id, 'categoryId'));
    if (category === null) {
      throw new NotFoundError(`Category ${id} not found`);
    }
    return category;
  }

  async listCategories(options: ListOptions = {}): Promise<Page<Category>> {
    const { keyword, limit, offset } = normalizeListOptions(options);
    const pattern = likePattern(keyword);
    const [countRow] = await this.#storage.sql`
      SELECT COUNT(*) AS total FROM invoice_categories
      WHERE owner = ${this.#owner}
        AND (${pattern} IS NULL OR name LIKE ${pattern} ESCAPE '\\' OR description LIKE ${pattern} ESCAPE '\\')
    `;
    const rows = await this.#storage.sql`
      SELECT * FROM invoice_categories
      WHERE owner = ${this.#owner}
        AND (${pattern} IS NULL OR name LIKE ${pattern} ESCAPE '\\' OR description LIKE ${pattern} ESCAPE '\\')
      ORDER BY name ASC, id ASC
      LIMIT ${limit} OFFSET ${offset}
    `;
    return {
      data: rows.map(toCategory),
      total: countRow === undefined ? 0 : readNumber(countRow, 'total'),
      limit,
      offset,
    };
  }

  async updateCategory(id: number, patch: CategoryPatch): Promise<Category> {
    const existing = await this.getCategory(id);
    const name = patch.name === undefined ? existing.name : requireText(patch.name, 'name', 100);
    const description = patch.description === undefined ? existing.description : optionalText(patch.description);
    const color = patch.color === undefined ? existing.color : optionalColor(patch.color);
    const now = new Date().toISOString();
    const rows = await this.#storage.sql`
      UPDATE invoice_categories
      SET name = ${name}, description = ${description}, color = ${color}, updated_at = ${now}
      WHERE id = ${existing.id} AND owner = ${this.#owner}
      RETURNING *
    `;
    if (rows.length === 0) {
      throw new NotFoundError(`Category ${id} not found`);
    }
    return toCategory(firstRow(rows));
  }

  async deleteCategory(id: number): Promise<void> {
    const categoryId = positiveId(id, 'categoryId');
    const owner = this.#owner;
    await this.#storage.transaction(async function (tx) {
      if (await findCategory(tx, owner, categoryId) === null) {
        throw new NotFoundError(`Category ${categoryId} not found`);
      }
      const [usage] = await tx.sql`SELECT COUNT(*) AS total FROM invoices WHERE category_id = ${categoryId}`;
      const invoiceCount = usage === undefined ? 0 : readNumber(usage, 'total');
      if (invoiceCount > 0) {
        throw new ConflictError(`Category ${categoryId} is used by ${invoiceCount} invoice(s)`);
      }
      await tx.sql`DELETE FROM invoice_categories WHERE id = ${categoryId} AND owner = ${owner}`;
    });
  }
}

export async function findCategory(executor: SqlExecutor, owner: string, id: number): Promise<Category | null> {
  const [row] = await executor.sql`SELECT * FROM invoice_categories WHERE id = ${id} AND owner = ${owner}`;
  return row === undefined ? null : toCategory(row);
}

export function toCategory(row: SqlRow): Category {
  return {
    id: readNumber(row, 'id'),
    name: readString(row, 'name'),
    description: readNullableString(row, 'description'),
    color: readNullableString(row, 'color'),
    createdAt: readString(row, 'created_at'),
    updatedAt: readString(row, 'updated_at'),
  };
}
