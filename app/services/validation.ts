import { ValidationError } from '@app/errors.js';
import { INVOICE_STATUSES } from '@app/services/models.js';
import type { InvoiceStatus, ListOptions } from '@app/services/models.js';

export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 500;

const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}){1,2}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export function requireText(value: string | undefined, field: string, maxLength: number): string {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') {
    throw new ValidationError(`${field} is required`);
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} must be at most ${maxLength} characters`);
  }
  return trimmed;
}

export function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

export function optionalColor(value: string | null | undefined): string | null {
  const color = optionalText(value);
  if (color !== null && !HEX_COLOR_PATTERN.test(color)) {
    throw new ValidationError(`color must be a hex color such as #FF5733, got "${color}"`);
  }
  return color;
}

export function optionalEmail(value: string | null | undefined): string | null {
  const email = optionalText(value);
  if (email !== null && !EMAIL_PATTERN.test(email)) {
    throw new ValidationError(`email "${email}" is not a valid address`);
  }
  return email;
}

export function optionalDate(value: string | null | undefined, field: string): string | null {
  const text = optionalText(value);
  if (text === null) {
    return null;
  }
  const time = Date.parse(text);
  if (Number.isNaN(time)) {
    throw new ValidationError(`${field} must be an ISO 8601 date, got "${text}"`);
  }
  return new Date(time).toISOString();
}

export function currencyCode(value: string | undefined): string {
  const currency = value?.trim().toUpperCase() ?? 'USD';
  if (!CURRENCY_PATTERN.test(currency)) {
    throw new ValidationError(`currency must be a three-letter code, got "${value}"`);
  }
  return currency;
}

export function invoiceStatus(value: string | undefined): InvoiceStatus {
  if (value === undefined) {
    return 'unpaid';
  }
  const status = INVOICE_STATUSES.find(function (candidate) {
    return candidate === value;
  });
  if (status === undefined) {
    throw new ValidationError(`status must be one of ${INVOICE_STATUSES.join(', ')}, got "${value}"`);
  }
  return status;
}

export function normalizeTags(tags: ReadonlyArray<string> | undefined): string[] {
  const unique = new Set<string>();
  for (const tag of tags ?? []) {
    const trimmed = tag.trim();
    if (trimmed !== '') {
      unique.add(trimmed);
    }
  }
  return Array.from(unique);
}

export function positiveId(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`);
  }
  return value;
}

export function normalizeListOptions(options: ListOptions): { keyword: string | null; limit: number; offset: number } {
  const limit = options.limit ?? DEFAULT_PAGE_LIMIT;
  const offset = options.offset ?? 0;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_PAGE_LIMIT}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError('offset must be a non-negative integer');
  }
  return { keyword: optionalText(options.keyword), limit, offset };
}

/**
 * Substring pattern for LIKE with a backslash ESCAPE. Wildcards in the keyword match literally.
 */
export function likePattern(keyword: string | null): string | null {
  return keyword === null ? null : `%${keyword.replace(/[\\%_]/g, '\\$&')}%`;
}

export function roundAmount(value: number): number {
  return Math.round(value * 100) / 100;
}
