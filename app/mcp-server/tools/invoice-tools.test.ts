import { deepStrictEqual, ok, strictEqual } from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { SqliteStorageBackend } from '@app/data/sqlite-storage-backend.js';
import { buildInvoiceToolRegistry, createInvoiceMcpServer } from '@app/mcp-server/mcp-server.js';
import { callTool, connectTestClient, readToolError } from '@app/mcp-server/mcp-server-test-utils.js';
import { createDomainServices } from '@app/services/domain-services.js';
import type { DomainServices } from '@app/services/domain-services.js';

describe('Invoice Tools', function () {
  let backend: SqliteStorageBackend;
  let services: DomainServices;
  let server: McpServer;
  let client: Client;

  beforeEach(async function () {
    backend = new SqliteStorageBackend(':memory:');
    await backend.connect();
    services = createDomainServices(backend.handle, { kind: 'absent', reason: 'S3_BUCKET is not set' });
    server = createInvoiceMcpServer(buildInvoiceToolRegistry(services));
    client = await connectTestClient(server);
  });

  afterEach(async function () {
    await Promise.all([
      client.close(),
      server.close(),
    ]);
    await backend.close();
  });

  describe('Tool: list_invoices', function () {
    it('filters by status and tag', async function () {
      await services.invoices.createInvoice({ title: 'Hosting', status: 'paid', tags: ['infra'] });
      await services.invoices.createInvoice({ title: 'Domain', tags: ['infra'] });
      await services.invoices.createInvoice({ title: 'Lunch' });

      const result = await callTool(client, 'list_invoices', { status: 'unpaid', tag: 'infra' });
      strictEqual(result.isError ?? false, false);
      deepStrictEqual(result.structuredContent, {
        data: [await services.invoices.getInvoice(2)],
        total: 1,
        limit: 50,
        offset: 0,
      });
    });
  });

  describe('Tool: update_invoice', function () {
    it('changes only the given fields', async function () {
      await services.invoices.createInvoice({ title: 'Hosting', currency: 'eur', tags: ['infra'] });
      const result = await callTool(client, 'update_invoice', { invoiceId: 1, title: 'Hosting March' });
      strictEqual(result.structuredContent?.title, 'Hosting March');
      strictEqual(result.structuredContent?.currency, 'EUR');
      deepStrictEqual(result.structuredContent?.tags, ['infra']);
    });

    it('rejects references to missing categories', async function () {
      await services.invoices.createInvoice({ title: 'Hosting' });
      const result = await callTool(client, 'update_invoice', { invoiceId: 1, categoryId: 9 });
      strictEqual(result.isError, true);
      deepStrictEqual(readToolError(result), { code: 'VALIDATION_ERROR', message: 'Category 9 does not exist' });
    });
  });

  describe('Tool: update_invoice_status', function () {
    it('marks an invoice as paid', async function () {
      await services.invoices.createInvoice({ title: 'Hosting' });
      const result = await callTool(client, 'update_invoice_status', { invoiceId: 1, status: 'paid' });
      strictEqual(result.structuredContent?.status, 'paid');
    });
  });

  describe('Tool: list_overdue_invoices', function () {
    it('lists unpaid invoices past their due date', async function () {
      await services.invoices.createInvoice({ title: 'Old', dueDate: '2000-01-01' });
      await services.invoices.createInvoice({ title: 'Paid', dueDate: '2000-01-01', status: 'paid' });
      await services.invoices.createInvoice({ title: 'Future', dueDate: '2999-01-01' });

      const result = await callTool(client, 'list_overdue_invoices');
      deepStrictEqual(result.structuredContent, { data: [await services.invoices.getInvoice(1)] });
    });
  });

  describe('Tool: search_invoices', function () {
    it('matches titles, descriptions and tags', async function () {
      await services.invoices.createInvoice({ title: 'Hosting', description: 'Servers for March' });
      await services.invoices.createInvoice({ title: 'Domain', tags: ['march-renewal'] });
      await services.invoices.createInvoice({ title: 'Lunch' });

      const result = await callTool(client, 'search_invoices', { query: 'march' });
      const data = result.structuredContent?.data;
      ok(Array.isArray(data));
      strictEqual(data.length, 2);
    });
  });

  describe('Tool: delete_invoice', function () {
    it('deletes the invoice with its items', async function () {
      await services.invoices.createInvoice({ title: 'Hosting', items: [{ description: 'Server', unitPrice: 20 }] });
      const result = await callTool(client, 'delete_invoice', { invoiceId: 1 });
      deepStrictEqual(result.structuredContent, { deleted: true, id: 1 });

      const again = await callTool(client, 'get_invoice', { invoiceId: 1 });
      deepStrictEqual(readToolError(again), { code: 'NOT_FOUND', message: 'Invoice 1 not found' });
    });
  });

  describe('Tool: get_invoice_attachment_url', function () {
    it('returns absolute links as they are', async function () {
      await services.invoices.createInvoice({ title: 'Hosting', originalDownloadLink: 'https://files.example.test/a.pdf' });
      const result = await callTool(client, 'get_invoice_attachment_url', { invoiceId: 1 });
      deepStrictEqual(result.structuredContent, {
        key: 'https://files.example.test/a.pdf',
        downloadUrl: 'https://files.example.test/a.pdf',
        expiresIn: 0,
      });
    });

    it('needs file storage for stored keys', async function () {
      await services.invoices.createInvoice({ title: 'Hosting', originalDownloadLink: 'invoices/a.pdf' });
      const result = await callTool(client, 'get_invoice_attachment_url', { invoiceId: 1 });
      strictEqual(readToolError(result).code, 'STORAGE_UNAVAILABLE');
    });
  });

  describe('Invoice item tools', function () {
    it('keeps the invoice amount equal to the sum of its items', async function () {
      await services.invoices.createInvoice({ title: 'Consulting' });

      const added = await callTool(client, 'add_invoice_item', {
        invoiceId: 1,
        description: 'Workshop',
        quantity: 3,
        unitPrice: 99.99,
      });
      strictEqual(added.structuredContent?.amount, 299.97);

      await callTool(client, 'add_invoice_item', { invoiceId: 1, description: 'Travel', unitPrice: 40 });
      strictEqual((await services.invoices.getInvoice(1)).amount, 339.97);

      const updated = await callTool(client, 'update_invoice_item', { invoiceId: 1, itemId: 1, quantity: 1 });
      strictEqual(updated.structuredContent?.amount, 99.99);
      strictEqual((await services.invoices.getInvoice(1)).amount, 139.99);

      const deleted = await callTool(client, 'delete_invoice_item', { invoiceId: 1, itemId: 2 });
      deepStrictEqual(deleted.structuredContent, { deleted: true, id: 2 });
      strictEqual((await services.invoices.getInvoice(1)).amount, 99.99);
    });
  });
});
