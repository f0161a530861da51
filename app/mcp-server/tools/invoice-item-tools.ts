import z from 'zod/v3';

import { defineTool } from '@app/mcp-server/tool-registry.js';
import type { ToolRegistry } from '@app/mcp-server/tool-registry.js';
import { deletedShape, invoiceItemFields, invoiceItemPatchFields, invoiceItemShape } from '@app/schemas.js';
import type { InvoiceService } from '@app/services/invoice-service.js';

const invoiceId = z.number().int().positive().describe('Invoice id');
const itemId = z.number().int().positive().describe('Line item id');

export function defineInvoiceItemTools(registry: ToolRegistry, invoices: InvoiceService): void {
  registry.register(defineTool({
    name: 'add_invoice_item',
    group: 'invoice',
    title: 'Add invoice item',
    description: 'Add a line item to an invoice and recompute the invoice amount.',
    inputSchema: { invoiceId, ...invoiceItemFields },
    outputSchema: invoiceItemShape,
    invoke: function ({ invoiceId, ...item }) {
      return invoices.addInvoiceItem(invoiceId, item);
    },
  }));

  registry.register(defineTool({
    name: 'update_invoice_item',
    group: 'invoice',
    title: 'Update invoice item',
    description: 'Update a line item of an invoice and recompute the invoice amount.',
    inputSchema: { invoiceId, itemId, ...invoiceItemPatchFields },
    outputSchema: invoiceItemShape,
    invoke: function ({ invoiceId, itemId, ...patch }) {
      return invoices.updateInvoiceItem(invoiceId, itemId, patch);
    },
  }));

  registry.register(defineTool({
    name: 'delete_invoice_item',
    group: 'invoice',
    title: 'Delete invoice item',
    description: 'Remove a line item from an invoice and recompute the invoice amount.',
    inputSchema: { invoiceId, itemId },
    outputSchema: deletedShape,
    invoke: async function (input) {
      await invoices.deleteInvoiceItem(input.invoiceId, input.itemId);
      return { deleted: true as const, id: input.itemId };
    },
  }));
}
