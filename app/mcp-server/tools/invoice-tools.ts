import z from 'zod/v3';

import { defineTool } from '@app/mcp-server/tool-registry.js';
import type { ToolRegistry } from '@app/mcp-server/tool-registry.js';
import {
  collectionShape,
  deletedShape,
  invoiceFields,
  invoiceListFields,
  invoicePatchFields,
  invoiceShape,
  invoiceStatusSchema,
  pageShape,
  presignedDownloadShape,
} from '@app/schemas.js';
import type { InvoiceService } from '@app/services/invoice-service.js';

const invoiceId = z.number().int().positive().describe('Invoice id');

export function defineInvoiceTools(registry: ToolRegistry, invoices: InvoiceService): void {
  registry.register(defineTool({
    name: 'create_invoice',
    group: 'invoice',
    title: 'Create invoice',
    description: 'Create an invoice, optionally with line items. The amount is computed from the items.',
    inputSchema: invoiceFields,
    outputSchema: invoiceShape,
    invoke: function (input) {
      return invoices.createInvoice(input);
    },
  }));

  registry.register(defineTool({
    name: 'list_invoices',
    group: 'invoice',
    title: 'List invoices',
    description: 'List invoices with optional filters (keyword, category, company, status, tag), sorting and paging. Newest first by default.',
    inputSchema: invoiceListFields,
    outputSchema: pageShape(invoiceShape),
    invoke: function (input) {
      return invoices.listInvoices(input);
    },
  }));

  registry.register(defineTool({
    name: 'get_invoice',
    group: 'invoice',
    title: 'Get invoice',
    description: 'Get one invoice with its category, company and line items.',
    inputSchema: { invoiceId },
    outputSchema: invoiceShape,
    invoke: function (input) {
      return invoices.getInvoice(input.invoiceId);
    },
  }));

  registry.register(defineTool({
    name: 'update_invoice',
    group: 'invoice',
    title: 'Update invoice',
    description: 'Update the given fields of an invoice. Line items are managed with the invoice item tools.',
    inputSchema: { invoiceId, ...invoicePatchFields },
    outputSchema: invoiceShape,
    invoke: function ({ invoiceId, ...patch }) {
      return invoices.updateInvoice(invoiceId, patch);
    },
  }));

  registry.register(defineTool({
    name: 'delete_invoice',
    group: 'invoice',
    title: 'Delete invoice',
    description: 'Delete an invoice and its line items.',
    inputSchema: { invoiceId },
    outputSchema: deletedShape,
    invoke: async function (input) {
      await invoices.deleteInvoice(input.invoiceId);
      return { deleted: true as const, id: input.invoiceId };
    },
  }));

  registry.register(defineTool({
    name: 'search_invoices',
    group: 'invoice',
    title: 'Search invoices',
    description: 'Search invoice titles, descriptions and tags. Returns at most 50 matches, newest first.',
    inputSchema: {
      query: z.string().describe('Text to search for'),
    },
    outputSchema: collectionShape(invoiceShape),
    invoke: async function (input) {
      return { data: await invoices.searchInvoices(input.query) };
    },
  }));

  registry.register(defineTool({
    name: 'update_invoice_status',
    group: 'invoice',
    title: 'Update invoice status',
    description: 'Mark an invoice as paid, unpaid or overdue.',
    inputSchema: {
      invoiceId,
      status: invoiceStatusSchema,
    },
    outputSchema: invoiceShape,
    invoke: function (input) {
      return invoices.updateInvoiceStatus(input.invoiceId, input.status);
    },
  }));

  registry.register(defineTool({
    name: 'list_overdue_invoices',
    group: 'invoice',
    title: 'List overdue invoices',
    description: 'List unpaid invoices whose due date has passed, oldest due date first.',
    inputSchema: {},
    outputSchema: collectionShape(invoiceShape),
    invoke: async function () {
      return { data: await invoices.listOverdueInvoices() };
    },
  }));

  registry.register(defineTool({
    name: 'get_invoice_attachment_url',
    group: 'invoice',
    title: 'Get invoice attachment URL',
    description: 'Get a download URL for the original document attached to an invoice.',
    inputSchema: { invoiceId },
    outputSchema: presignedDownloadShape,
    invoke: function (input) {
      return invoices.getAttachmentDownloadUrl(input.invoiceId);
    },
  }));
}
