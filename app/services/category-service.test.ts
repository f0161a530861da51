import { deepStrictEqual, rejects, strictEqual } from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { SqliteStorageBackend } from '@app/data/sqlite-storage-backend.js';
import { ConflictError, NotFoundError, ValidationError } from '@app/errors.js';
import { createDomainServices } from '@app/services/domain-services.js';
import type { DomainServices } from '@app/services/domain-services.js';

describe('CategoryService', function () {
  let backend: SqliteStorageBackend;
  let services: DomainServices;

  beforeEach(async function () {
    backend = new SqliteStorageBackend(':memory:');
    await backend.connect();
    services = createDomainServices(backend.handle, { kind: 'absent', reason: 'not configured' });
  });

  afterEach(async function () {
    await backend.close();
  });

  it('creates and reads back a category with the submitted fields', async function () {
    const created = await services.categories.createCategory({
      name: 'Office Supplies',
      description: 'Paper and pens',
      color: '#FF5733',
    });
    strictEqual(created.id, 1);
    strictEqual(created.name, 'Office Supplies');
    strictEqual(created.description, 'Paper and pens');
    strictEqual(created.color, '#FF5733');
    strictEqual(created.createdAt, created.updatedAt);
    deepStrictEqual(await services.categories.getCategory(created.id), created);
  });

  it('trims the name and stores blank optional fields as null', async function () {
    const created = await services.categories.createCategory({ name: '  Travel  ', description: '   ' });
    strictEqual(created.name, 'Travel');
    strictEqual(created.description, null);
    strictEqual(created.color, null);
  });

  it('rejects an empty name and a malformed color', async function () {
    await rejects(services.categories.createCategory({ name: '   ' }), ValidationError);
    await rejects(services.categories.createCategory({ name: 'Travel', color: 'red' }), ValidationError);
  });

  it('throws NotFoundError for a missing category', async function () {
    await rejects(services.categories.getCategory(99), NotFoundError);
  });

  it('lists categories by name with keyword filtering and paging', async function () {
    await services.categories.createCategory({ name: 'Utilities' });
    await services.categories.createCategory({ name: 'Office Supplies' });
    await services.categories.createCategory({ name: 'Office Rent' });

    const all = await services.categories.listCategories();
    deepStrictEqual(all.data.map(function (category) {
      return category.name;
    }), ['Office Rent', 'Office Supplies', 'Utilities']);
    strictEqual(all.total, 3);
    strictEqual(all.limit, 50);
    strictEqual(all.offset, 0);

    const office = await services.categories.listCategories({ keyword: 'office', limit: 1, offset: 1 });
    deepStrictEqual(office.data.map(function (category) {
      return category.name;
    }), ['Office Supplies']);
    strictEqual(office.total, 2);
  });

  it('rejects an out-of-range page size', async function () {
    await rejects(services.categories.listCategories({ limit: 0 }), ValidationError);
    await rejects(services.categories.listCategories({ offset: -1 }), ValidationError);
  });

  it('applies partial updates', async function () {
    const created = await services.categories.createCategory({ name: 'Travel', color: '#00FF00' });
    const updated = await services.categories.updateCategory(created.id, { description: 'Flights' });
    strictEqual(updated.name, 'Travel');
    strictEqual(updated.color, '#00FF00');
    strictEqual(updated.description, 'Flights');

    const cleared = await services.categories.updateCategory(created.id, { color: null });
    strictEqual(cleared.color, null);
    strictEqual(cleared.description, 'Flights');
  });

  it('deletes an unused category', async function () {
    const created = await services.categories.createCategory({ name: 'Travel' });
    await services.categories.deleteCategory(created.id);
    await rejects(services.categories.getCategory(created.id), NotFoundError);
    await rejects(services.categories.deleteCategory(created.id), NotFoundError);
  });

  it('refuses to delete a category referenced by an invoice', async function () {
    const category = await services.categories.createCategory({ name: 'Travel' });
    await services.invoices.createInvoice({ title: 'Flight', categoryId: category.id });
    await rejects(services.categories.deleteCategory(category.id), ConflictError);
    deepStrictEqual(await services.categories.getCategory(category.id), category);
  });
});
