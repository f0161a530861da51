import type { Response } from 'express';
import z from 'zod/v3';

import { SchemaValidationError, ValidationError } from '@app/errors.js';
import { invoiceStatusSchema } from '@app/schemas.js';
import { INVOICE_SORT_FIELDS } from '@app/services/models.js';

/** Picks the service scoped to the caller of the current request. */
export type ServiceResolver<T> = (res: Response) => T;

export function parseId(value: string | undefined, name = 'id'): number {
  const id = Number(value);
  if (value === undefined || !/^\d+$/.test(value) || !Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`${name} must be a positive integer`);
  }
  return id;
}

export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new SchemaValidationError(`Invalid ${what}`, parsed.error.issues.map(function (issue) {
      return { path: issue.path.join('.'), message: issue.message };
    }));
  }
  return parsed.data;
}

const queryInt = z.coerce.number().int();

export const listQuerySchema = z.object({
  keyword: z.string().optional(),
  limit: queryInt.min(1).max(500).optional(),
  offset: queryInt.min(0).optional(),
});

export const invoiceListQuerySchema = listQuerySchema.extend({
  categoryId: queryInt.positive().optional(),
  companyId: queryInt.positive().optional(),
  status: invoiceStatusSchema.optional(),
  tag: z.string().optional(),
  sortBy: z.enum(INVOICE_SORT_FIELDS).optional(),
  sortOrder: z.enum(['asc', 'desc']).optional(),
});
