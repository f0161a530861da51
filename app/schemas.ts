import z from 'zod/v3';

import { INVOICE_SORT_FIELDS, INVOICE_STATUSES } from '@app/services/models.js';

const nullableText = z.string().nullable().optional();
const id = z.number().int().positive();

export const invoiceStatusSchema = z.enum(INVOICE_STATUSES);

// Inputs

export const listFields = {
  keyword: z.string().optional().describe('Case-insensitive text to match'),
  limit: z.number().int().min(1).max(500).optional().describe('Page size, defaults to 50'),
  offset: z.number().int().min(0).optional().describe('Number of records to skip'),
};

export const categoryFields = {
  name: z.string().describe('Category name'),
  description: nullableText.describe('Category description'),
  color: nullableText.describe('Hex color code, e.g. #FF5733'),
};

export const categoryPatchFields = {
  name: z.string().optional().describe('New category name'),
  description: nullableText,
  color: nullableText.describe('Hex color code, e.g. #FF5733'),
};

export const companyFields = {
  name: z.string().describe('Company name'),
  address: nullableText,
  email: nullableText.describe('Billing email address'),
  phone: nullableText,
  website: nullableText,
  taxId: nullableText.describe('Tax or VAT identifier'),
  notes: nullableText,
};

export const companyPatchFields = {
  ...companyFields,
  name: z.string().optional().describe('New company name'),
};

export const invoiceItemFields = {
  description: z.string().describe('Line item description'),
  quantity: z.number().positive().optional().describe('Quantity, defaults to 1'),
  unitPrice: z.number().describe('Price per unit'),
};

export const invoiceItemPatchFields = {
  description: z.string().optional(),
  quantity: z.number().positive().optional(),
  unitPrice: z.number().optional(),
};

const invoiceCommonFields = {
  description: nullableText,
  invoiceStartedAt: nullableText.describe('Start of the billed period (ISO 8601)'),
  invoiceEndedAt: nullableText.describe('End of the billed period (ISO 8601)'),
  currency: z.string().optional().describe('Three-letter currency code, defaults to USD'),
  categoryId: id.nullable().optional().describe('Existing category id'),
  companyId: id.nullable().optional().describe('Existing company id'),
  originalDownloadLink: nullableText.describe('Object key from an upload, or an absolute URL'),
  tags: z.array(z.string()).optional(),
  status: invoiceStatusSchema.optional().describe('Defaults to unpaid'),
  dueDate: nullableText.describe('Due date (ISO 8601)'),
};

export const invoiceFields = {
  title: z.string().describe('Invoice title'),
  ...invoiceCommonFields,
  items: z.array(z.object(invoiceItemFields)).optional().describe('Line items; the invoice amount is their sum'),
};

export const invoicePatchFields = {
  title: z.string().optional(),
  ...invoiceCommonFields,
};

export const invoiceListFields = {
  ...listFields,
  categoryId: id.optional(),
  companyId: id.optional(),
  status: invoiceStatusSchema.optional(),
  tag: z.string().optional(),
  sortBy: z.enum(INVOICE_SORT_FIELDS).optional(),
  sortOrder: z.enum(['asc', 'desc']).optional(),
};

// Outputs

export const categoryShape = {
  id: z.number(),
  name: z.string(),
  description: z.string().nullable(),
  color: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
};

export const companyShape = {
  id: z.number(),
  name: z.string(),
  address: z.string().nullable(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  website: z.string().nullable(),
  taxId: z.string().nullable(),
  notes: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
};

export const invoiceItemShape = {
  id: z.number(),
  invoiceId: z.number(),
  description: z.string(),
  quantity: z.number(),
  unitPrice: z.number(),
  amount: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
};

export const invoiceShape = {
  id: z.number(),
  title: z.string(),
  description: z.string().nullable(),
  invoiceStartedAt: z.string().nullable(),
  invoiceEndedAt: z.string().nullable(),
  amount: z.number(),
  currency: z.string(),
  categoryId: z.number().nullable(),
  category: z.object(categoryShape).nullable(),
  companyId: z.number().nullable(),
  company: z.object(companyShape).nullable(),
  items: z.array(z.object(invoiceItemShape)),
  originalDownloadLink: z.string().nullable(),
  tags: z.array(z.string()),
  status: invoiceStatusSchema,
  dueDate: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
};

export function pageShape<T extends z.ZodRawShape>(itemShape: T) {
  return {
    data: z.array(z.object(itemShape)),
    total: z.number(),
    limit: z.number(),
    offset: z.number(),
  };
}

export function collectionShape<T extends z.ZodRawShape>(itemShape: T) {
  return {
    data: z.array(z.object(itemShape)),
  };
}

export const deletedShape = {
  deleted: z.literal(true),
  id: z.number(),
};

export const storedFileShape = {
  key: z.string(),
  filename: z.string(),
  contentType: z.string(),
  size: z.number(),
  downloadUrl: z.string(),
};

export const presignedUploadShape = {
  key: z.string(),
  uploadUrl: z.string(),
  contentType: z.string(),
  expiresIn: z.number(),
};

export const presignedDownloadShape = {
  key: z.string(),
  downloadUrl: z.string(),
  expiresIn: z.number(),
};
