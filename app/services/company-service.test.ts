import { deepStrictEqual, rejects, strictEqual } from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { SqliteStorageBackend } from '@app/data/sqlite-storage-backend.js';
import { ConflictError, NotFoundError, ValidationError } from '@app/errors.js';
import { createDomainServices } from '@app/services/domain-services.js';
import type { DomainServices } from '@app/services/domain-services.js';

describe('CompanyService', function () {
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

  it('creates a company with contact details', async function () {
    const created = await services.companies.createCompany({
      name: 'Acme Corp',
      email: 'billing@acme.test',
      taxId: 'TAX-001',
      website: 'https://acme.test',
    });
    strictEqual(created.name, 'Acme Corp');
    strictEqual(created.email, 'billing@acme.test');
    strictEqual(created.taxId, 'TAX-001');
    strictEqual(created.website, 'https://acme.test');
    strictEqual(created.address, null);
    strictEqual(created.phone, null);
    strictEqual(created.notes, null);
    deepStrictEqual(await services.companies.getCompany(created.id), created);
  });

  it('validates the name and email', async function () {
    await rejects(services.companies.createCompany({ name: '' }), ValidationError);
    await rejects(services.companies.createCompany({ name: 'Acme', email: 'not-an-email' }), ValidationError);
  });

  it('keeps untouched fields on update', async function () {
    const created = await services.companies.createCompany({ name: 'Acme Corp', phone: '555-0100' });
    const updated = await services.companies.updateCompany(created.id, { notes: 'Net 30' });
    strictEqual(updated.name, 'Acme Corp');
    strictEqual(updated.phone, '555-0100');
    strictEqual(updated.notes, 'Net 30');
  });

  it('throws NotFoundError when updating a missing company', async function () {
    await rejects(services.companies.updateCompany(7, { name: 'Ghost' }), NotFoundError);
  });

  it('searches by name or email', async function () {
    await services.companies.createCompany({ name: 'Acme Corp', email: 'billing@acme.test' });
    await services.companies.createCompany({ name: 'Globex', email: 'ap@globex.test' });
    const page = await services.companies.listCompanies({ keyword: 'globex' });
    deepStrictEqual(page.data.map(function (company) {
      return company.name;
    }), ['Globex']);
    strictEqual(page.total, 1);
  });

  it('refuses to delete a company referenced by an invoice', async function () {
    const company = await services.companies.createCompany({ name: 'Acme Corp' });
    const invoice = await services.invoices.createInvoice({ title: 'Consulting', companyId: company.id });
    await rejects(services.companies.deleteCompany(company.id), ConflictError);

    await services.invoices.deleteInvoice(invoice.id);
    await services.companies.deleteCompany(company.id);
    await rejects(services.companies.getCompany(company.id), NotFoundError);
  });
});
