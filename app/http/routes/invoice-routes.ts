import { Router } from 'express';
import z from 'zod/v3';

import { invoiceListQuerySchema, parseId, parseRequest } from '@app/http/request-parsing.js';
import type { ServiceResolver } from '@app/http/request-parsing.js';
import {
  invoiceFields,
  invoiceItemFields,
  invoiceItemPatchFields,
  invoicePatchFields,
  invoiceStatusSchema,
} from '@app/schemas.js';
import type { InvoiceService } from '@app/services/invoice-service.js';

const InvoiceBodySchema = z.object(invoiceFields);
const InvoicePatchBodySchema = z.object(invoicePatchFields);
const InvoiceStatusBodySchema = z.object({ status: invoiceStatusSchema });
const InvoiceItemBodySchema = z.object(invoiceItemFields);
const InvoiceItemPatchBodySchema = z.object(invoiceItemPatchFields);
const SearchQuerySchema = z.object({ q: z.string() });

export function createInvoiceRouter(invoices: ServiceResolver<InvoiceService>): Router {
  const router = Router();

  router.get('/', async function (req, res) {
    const options = parseRequest(invoiceListQuerySchema, req.query, 'query parameters');
    res.json(await invoices(res).listInvoices(options));
  });

  router.post('/', async function (req, res) {
    const input = parseRequest(InvoiceBodySchema, req.body, 'invoice');
    res.status(201).json(await invoices(res).createInvoice(input));
  });

  // Fixed paths go before /:id.
  router.get('/search', async function (req, res) {
    const { q } = parseRequest(SearchQuerySchema, req.query, 'query parameters');
    res.json({ data: await invoices(res).searchInvoices(q) });
  });

  router.get('/overdue', async function (_req, res) {
    res.json({ data: await invoices(res).listOverdueInvoices() });
  });

  router.get('/:id', async function (req, res) {
    res.json(await invoices(res).getInvoice(parseId(req.params.id)));
  });

  router.put('/:id', async function (req, res) {
    const id = parseId(req.params.id);
    const patch = parseRequest(InvoicePatchBodySchema, req.body, 'invoice');
    res.json(await invoices(res).updateInvoice(id, patch));
  });

  router.delete('/:id', async function (req, res) {
    await invoices(res).deleteInvoice(parseId(req.params.id));
    res.status(204).end();
  });

  router.patch('/:id/status', async function (req, res) {
    const id = parseId(req.params.id);
    const { status } = parseRequest(InvoiceStatusBodySchema, req.body, 'status update');
    res.json(await invoices(res).updateInvoiceStatus(id, status));
  });

  router.get('/:id/attachment', async function (req, res) {
    res.json(await invoices(res).getAttachmentDownloadUrl(parseId(req.params.id)));
  });

  router.post('/:id/items', async function (req, res) {
    const invoiceId = parseId(req.params.id);
    const input = parseRequest(InvoiceItemBodySchema, req.body, 'invoice item');
    res.status(201).json(await invoices(res).addInvoiceItem(invoiceId, input));
  });

  router.put('/:id/items/:itemId', async function (req, res) {
    const invoiceId = parseId(req.params.id);
    const itemId = parseId(req.params.itemId, 'itemId');
    const patch = parseRequest(InvoiceItemPatchBodySchema, req.body, 'invoice item');
    res.json(await invoices(res).updateInvoiceItem(invoiceId, itemId, patch));
  });

  router.delete('/:id/items/:itemId', async function (req, res) {
    await invoices(res).deleteInvoiceItem(parseId(req.params.id), parseId(req.params.itemId, 'itemId'));
    res.status(204).end();
  });

  return router;
}
