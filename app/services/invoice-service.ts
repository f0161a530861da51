import type { SqlExecutor, StorageHandle } from '@app/data/storage-backend.js';
import { NotFoundError, ValidationError } from '@app/errors.js';
import { findCategory } from '@app/services/category-service.js';
import { findCompany } from '@app/services/company-service.js';
import type {
  Invoice,
  InvoiceInput,
  InvoiceItem,
  InvoiceItemInput,
  InvoiceItemPatch,
  InvoiceListOptions,
  InvoicePatch,
  InvoiceSortField,
  InvoiceStatus,
  Page,
  PresignedDownload,
} from '@app/services/models.js';
import type { UploadService } from '@app/services/upload-service.js';
import {
  currencyCode,
  invoiceStatus,
  likePattern,
  normalizeListOptions,
  normalizeTags,
  optionalDate,
  optionalText,
  positiveId,
  requireText,
  roundAmount,
} from '@app/services/validation.js';
import { firstRow, readNullableNumber, readNullableString, readNumber, readString } from '@app/tools/assertion.js';
import type { SqlRow } from '@app/tools/assertion.js';

const SEARCH_RESULT_LIMIT = 50;

const SORT_COLUMNS: Record<InvoiceSortField, string> = {
  createdAt: 'created_at',
  amount: 'amount',
  dueDate: 'due_date',
  title: 'title',
};

type ItemValues = {
  description: string;
  quantity: number;
  unitPrice: number;
  amount: number;
};

export class InvoiceService {
  #storage: StorageHandle;
  #owner: string;
  #uploads: UploadService;

  constructor(storage: StorageHandle, owner: string, uploads: UploadService) {
    this.#storage = storage;
    this.#owner = owner;
    this.#uploads = uploads;
  }

  async createInvoice(input: InvoiceInput): Promise<Invoice> {
    const title = requireText(input.title, 'title', 200);
    const description = optionalText(input.description);
    const invoiceStartedAt = optionalDate(input.invoiceStartedAt, 'invoiceStartedAt');
    const invoiceEndedAt = optionalDate(input.invoiceEndedAt, 'invoiceEndedAt');
    assertPeriod(invoiceStartedAt, invoiceEndedAt);
    const dueDate = optionalDate(input.dueDate, 'dueDate');
    const currency = currencyCode(input.currency);
    const categoryId = optionalReference(input.categoryId, 'categoryId');
    const companyId = optionalReference(input.companyId, 'companyId');
    const originalDownloadLink = optionalText(input.originalDownloadLink);
    const tags = normalizeTags(input.tags);
    const status = invoiceStatus(input.status);
    const items = (input.items ?? []).map(itemValues);
    const amount = sumAmounts(items);
    const now = new Date().toISOString();
    const owner = this.#owner;

    return this.#storage.transaction(async function (tx) {
      await assertReferences(tx, owner, categoryId, companyId);
      const inserted = await tx.sql`
        INSERT INTO invoices (
          owner, title, description, invoice_started_at, invoice_ended_at, amount, currency,
          category_id, company_id, original_download_link, tags, status, due_date, created_at, updated_at
        )
        VALUES (
          ${owner}, ${title}, ${description}, ${invoiceStartedAt}, ${invoiceEndedAt}, ${amount}, ${currency},
          ${categoryId}, ${companyId}, ${originalDownloadLink}, ${JSON.stringify(tags)}, ${status}, ${dueDate}, ${now}, ${now}
        )
        RETURNING id
      `;
      const invoiceId = readNumber(firstRow(inserted), 'id');
      for (const item of items) {
        await insertItem(tx, invoiceId, item, now);
      }
      return loadInvoice(tx, owner, invoiceId);
    });
  }

  async getInvoice(id: number): Promise<Invoice> {
    return loadInvoice(this.#storage, this.#owner, positiveId(id, 'invoiceId'));
  }

  async listInvoices(options: InvoiceListOptions = {}): Promise<Page<Invoice>> {
    const { keyword, limit, offset } = normalizeListOptions(options);
    const conditions = ['owner = ?'];
    const params: unknown[] = [this.#owner];

    const pattern = likePattern(keyword);
    if (pattern !== null) {
      conditions.push("(title LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\')");
      params.push(pattern, pattern);
    }
    if (options.categoryId !== undefined) {
      conditions.push('category_id = ?');
      params.push(positiveId(options.categoryId, 'categoryId'));
    }
    if (options.companyId !== undefined) {
      conditions.push('company_id = ?');
      params.push(positiveId(options.companyId, 'companyId'));
    }
    if (options.status !== undefined) {
      conditions.push('status = ?');
      params.push(invoiceStatus(options.status));
    }
    const tag = optionalText(options.tag);
    if (tag !== null) {
      conditions.push('EXISTS (SELECT 1 FROM json_each(invoices.tags) WHERE json_each.value = ?)');
      params.push(tag);
    }

    const where = `WHERE ${conditions.join(' AND ')}`;
    const sortColumn = SORT_COLUMNS[options.sortBy ?? 'createdAt'];
    const sortOrder = options.sortOrder === 'asc' ? 'ASC' : 'DESC';

    const [countRow] = await this.#storage.rawSql(`SELECT COUNT(*) AS total FROM invoices ${where}`, params);
    const rows = await this.#storage.rawSql(
      `SELECT * FROM invoices ${where} ORDER BY ${sortColumn} ${sortOrder}, id ${sortOrder} LIMIT ? OFFSET ?`,
      [...params, limit, offset],
    );
    const data: Invoice[] = [];
    for (const row of rows) {
      data.push(await hydrateInvoice(this.#storage, row));
    }
    return {
      data,
      total: countRow === undefined ? 0 : readNumber(countRow, 'total'),
      limit,
      offset,
    };
  }

  async searchInvoices(query: string): Promise<Invoice[]> {
    const pattern = likePattern(optionalText(query));
    if (pattern === null) {
      throw new ValidationError('search query is required');
    }
    const rows = await this.#storage.sql`
      SELECT * FROM invoices
      WHERE owner = ${this.#owner} AND (
        title LIKE ${pattern} ESCAPE '\\'
        OR description LIKE ${pattern} ESCAPE '\\'
        OR EXISTS (SELECT 1 FROM json_each(invoices.tags) WHERE json_each.value LIKE ${pattern} ESCAPE '\\')
      )
      ORDER BY created_at DESC, id DESC
      LIMIT ${SEARCH_RESULT_LIMIT}
    `;
    const invoices: Invoice[] = [];
    for (const row of rows) {
      invoices.push(await hydrateInvoice(this.#storage, row));
    }
    return invoices;
  }

  async updateInvoice(id: number, patch: InvoicePatch): Promise<Invoice> {
    const invoiceId = positiveId(id, 'invoiceId');
    const owner = this.#owner;
    return this.#storage.transaction(async function (tx) {
      const existing = await loadInvoice(tx, owner, invoiceId);
      const title = patch.title === undefined ? existing.title : requireText(patch.title, 'title', 200);
      const description = patch.description === undefined ? existing.description : optionalText(patch.description);
      const invoiceStartedAt = patch.invoiceStartedAt === undefined
        ? existing.invoiceStartedAt
        : optionalDate(patch.invoiceStartedAt, 'invoiceStartedAt');
      const invoiceEndedAt = patch.invoiceEndedAt === undefined
        ? existing.invoiceEndedAt
        : optionalDate(patch.invoiceEndedAt, 'invoiceEndedAt');
      assertPeriod(invoiceStartedAt, invoiceEndedAt);
      const dueDate = patch.dueDate === undefined ? existing.dueDate : optionalDate(patch.dueDate, 'dueDate');
      const currency = patch.currency === undefined ? existing.currency : currencyCode(patch.currency);
      const categoryId = patch.categoryId === undefined ? existing.categoryId : optionalReference(patch.categoryId, 'categoryId');
      const companyId = patch.companyId === undefined ? existing.companyId : optionalReference(patch.companyId, 'companyId');
      const originalDownloadLink = patch.originalDownloadLink === undefined
        ? existing.originalDownloadLink
        : optionalText(patch.originalDownloadLink);
      const tags = patch.tags === undefined ? existing.tags : normalizeTags(patch.tags);
      const status = patch.status === undefined ? existing.status : invoiceStatus(patch.status);

      await assertReferences(tx, owner, categoryId, companyId);
      const now = new Date().toISOString();
      await tx.sql`
        UPDATE invoices
        SET title = ${title}, description = ${description},
          invoice_started_at = ${invoiceStartedAt}, invoice_ended_at = ${invoiceEndedAt},
          currency = ${currency}, category_id = ${categoryId}, company_id = ${companyId},
          original_download_link = ${originalDownloadLink}, tags = ${JSON.stringify(tags)},
          status = ${status}, due_date = ${dueDate}, updated_at = ${now}
        WHERE id = ${invoiceId} AND owner = ${owner}
      `;
      return loadInvoice(tx, owner, invoiceId);
    });
  }

  async updateInvoiceStatus(id: number, status: InvoiceStatus): Promise<Invoice> {
    const invoiceId = positiveId(id, 'invoiceId');
    const nextStatus = invoiceStatus(status);
    const now = new Date().toISOString();
    const updated = await this.#storage.sql`
      UPDATE invoices SET status = ${nextStatus}, updated_at = ${now}
      WHERE id = ${invoiceId} AND owner = ${this.#owner}
      RETURNING id
    `;
    if (updated.length === 0) {
      throw new NotFoundError(`Invoice ${invoiceId} not found`);
    }
    return loadInvoice(this.#storage, this.#owner, invoiceId);
  }

  async deleteInvoice(id: number): Promise<void> {
    const invoiceId = positiveId(id, 'invoiceId');
    const owner = this.#owner;
    await this.#storage.transaction(async function (tx) {
      const deleted = await tx.sql`DELETE FROM invoices WHERE id = ${invoiceId} AND owner = ${owner} RETURNING id`;
      if (deleted.length === 0) {
        throw new NotFoundError(`Invoice ${invoiceId} not found`);
      }
      await tx.sql`DELETE FROM invoice_items WHERE invoice_id = ${invoiceId}`;
    });
  }

  async listOverdueInvoices(now: Date = new Date()): Promise<Invoice[]> {
    const rows = await this.#storage.sql`
      SELECT * FROM invoices
      WHERE owner = ${this.#owner} AND status = 'unpaid' AND due_date IS NOT NULL AND due_date < ${now.toISOString()}
      ORDER BY due_date ASC, id ASC
    `;
    const invoices: Invoice[] = [];
    for (const row of rows) {
      invoices.push(await hydrateInvoice(this.#storage, row));
    }
    return invoices;
  }

  async addInvoiceItem(invoiceId: number, input: InvoiceItemInput): Promise<InvoiceItem> {
    const id = positiveId(invoiceId, 'invoiceId');
    const values = itemValues(input);
    const owner = this.#owner;
    return this.#storage.transaction(async function (tx) {
      await assertInvoiceExists(tx, owner, id);
      const now = new Date().toISOString();
      const item = await insertItem(tx, id, values, now);
      await recomputeAmount(tx, id, now);
      return item;
    });
  }

  async updateInvoiceItem(invoiceId: number, itemId: number, patch: InvoiceItemPatch): Promise<InvoiceItem> {
    const id = positiveId(invoiceId, 'invoiceId');
    const targetItemId = positiveId(itemId, 'itemId');
    const owner = this.#owner;
    return this.#storage.transaction(async function (tx) {
      await assertInvoiceExists(tx, owner, id);
      const existing = await findItem(tx, id, targetItemId);
      const values = itemValues({
        description: patch.description ?? existing.description,
        quantity: patch.quantity ?? existing.quantity,
        unitPrice: patch.unitPrice ?? existing.unitPrice,
      });
      const now = new Date().toISOString();
      const rows = await tx.sql`
        UPDATE invoice_items
        SET description = ${values.description}, quantity = ${values.quantity},
          unit_price = ${values.unitPrice}, amount = ${values.amount}, updated_at = ${now}
        WHERE id = ${targetItemId}
        RETURNING *
      `;
      await recomputeAmount(tx, id, now);
      return toInvoiceItem(firstRow(rows));
    });
  }

  async deleteInvoiceItem(invoiceId: number, itemId: number): Promise<void> {
    const id = positiveId(invoiceId, 'invoiceId');
    const targetItemId = positiveId(itemId, 'itemId');
    const owner = this.#owner;
    await this.#storage.transaction(async function (tx) {
      await assertInvoiceExists(tx, owner, id);
      await findItem(tx, id, targetItemId);
      await tx.sql`DELETE FROM invoice_items WHERE id = ${targetItemId}`;
      await recomputeAmount(tx, id, new Date().toISOString());
    });
  }

  /**
   * Absolute links are returned untouched; anything else is treated as an object key and signed.
   */
  async getAttachmentDownloadUrl(invoiceId: number): Promise<PresignedDownload> {
    const invoice = await this.getInvoice(invoiceId);
    const link = invoice.originalDownloadLink;
    if (link === null) {
      throw new NotFoundError(`Invoice ${invoice.id} has no attachment`);
    }
    if (/^https?:\/\//i.test(link)) {
      return { key: link, downloadUrl: link, expiresIn: 0 };
    }
    return this.#uploads.getPresignedDownloadUrl(link);
  }
}

function optionalReference(value: number | null | undefined, field: string): number | null {
  return value === null || value === undefined ? null : positiveId(value, field);
}

function assertPeriod(startedAt: string | null, endedAt: string | null): void {
  if (startedAt !== null && endedAt !== null && endedAt < startedAt) {
    throw new ValidationError('invoiceEndedAt must not be before invoiceStartedAt');
  }
}

function itemValues(input: InvoiceItemInput): ItemValues {
  const description = requireText(input.description, 'item description', 500);
  const quantity = input.quantity ?? 1;
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new ValidationError('item quantity must be greater than zero');
  }
  if (!Number.isFinite(input.unitPrice)) {
    throw new ValidationError('item unitPrice must be a finite number');
  }
  return {
    description,
    quantity,
    unitPrice: input.unitPrice,
    amount: roundAmount(quantity * input.unitPrice),
  };
}

function sumAmounts(items: ReadonlyArray<{ amount: number }>): number {
  return roundAmount(items.reduce(function (total, item) {
    return total + item.amount;
  }, 0));
}

async function assertReferences(
  executor: SqlExecutor,
  owner: string,
  categoryId: number | null,
  companyId: number | null,
): Promise<void> {
  if (categoryId !== null && await findCategory(executor, owner, categoryId) === null) {
    throw new ValidationError(`Category ${categoryId} does not exist`);
  }
  if (companyId !== null && await findCompany(executor, owner, companyId) === null) {
    throw new ValidationError(`Company ${companyId} does not exist`);
  }
}

async function assertInvoiceExists(executor: SqlExecutor, owner: string, invoiceId: number): Promise<void> {
  const rows = await executor.sql`SELECT id FROM invoices WHERE id = ${invoiceId} AND owner = ${owner}`;
  if (rows.length === 0) {
    throw new NotFoundError(`Invoice ${invoiceId} not found`);
  }
}

async function insertItem(executor: SqlExecutor, invoiceId: number, item: ItemValues, now: string): Promise<InvoiceItem> {
  const rows = await executor.sql`
    INSERT INTO invoice_items (invoice_id, description, quantity, unit_price, amount, created_at, updated_at)
    VALUES (${invoiceId}, ${item.description}, ${item.quantity}, ${item.unitPrice}, ${item.amount}, ${now}, ${now})
    RETURNING *
  `;
  return toInvoiceItem(firstRow(rows));
}

async function findItem(executor: SqlExecutor, invoiceId: number, itemId: number): Promise<InvoiceItem> {
  const [row] = await executor.sql`
    SELECT * FROM invoice_items WHERE id = ${itemId} AND invoice_id = ${invoiceId}
  `;
  if (row === undefined) {
    throw new NotFoundError(`Item ${itemId} not found on invoice ${invoiceId}`);
  }
  return toInvoiceItem(row);
}

async function listItems(executor: SqlExecutor, invoiceId: number): Promise<InvoiceItem[]> {
  const rows = await executor.sql`
    SELECT * FROM invoice_items WHERE invoice_id = ${invoiceId} ORDER BY id ASC
  `;
  return rows.map(toInvoiceItem);
}

async function recomputeAmount(executor: SqlExecutor, invoiceId: number, now: string): Promise<void> {
  const amount = sumAmounts(await listItems(executor, invoiceId));
  await executor.sql`UPDATE invoices SET amount = ${amount}, updated_at = ${now} WHERE id = ${invoiceId}`;
}

async function loadInvoice(executor: SqlExecutor, owner: string, invoiceId: number): Promise<Invoice> {
  const [row] = await executor.sql`SELECT * FROM invoices WHERE id = ${invoiceId} AND owner = ${owner}`;
  if (row === undefined) {
    throw new NotFoundError(`Invoice ${invoiceId} not found`);
  }
  return hydrateInvoice(executor, row);
}

async function hydrateInvoice(executor: SqlExecutor, row: SqlRow): Promise<Invoice> {
  const id = readNumber(row, 'id');
  const owner = readString(row, 'owner');
  const categoryId = readNullableNumber(row, 'category_id');
  const companyId = readNullableNumber(row, 'company_id');
  return {
    id,
    title: readString(row, 'title'),
    description: readNullableString(row, 'description'),
    invoiceStartedAt: readNullableString(row, 'invoice_started_at'),
    invoiceEndedAt: readNullableString(row, 'invoice_ended_at'),
    amount: readNumber(row, 'amount'),
    currency: readString(row, 'currency'),
    categoryId,
    category: categoryId === null ? null : await findCategory(executor, owner, categoryId),
    companyId,
    company: companyId === null ? null : await findCompany(executor, owner, companyId),
    items: await listItems(executor, id),
    originalDownloadLink: readNullableString(row, 'original_download_link'),
    tags: parseTags(readString(row, 'tags')),
    status: invoiceStatus(readString(row, 'status')),
    dueDate: readNullableString(row, 'due_date'),
    createdAt: readString(row, 'created_at'),
    updatedAt: readString(row, 'updated_at'),
  };
}

function parseTags(text: string): string[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter(function (tag): tag is string {
    return typeof tag === 'string';
  });
}

function toInvoiceItem(row: SqlRow): InvoiceItem {
  return {
    id: readNumber(row, 'id'),
    invoiceId: readNumber(row, 'invoice_id'),
    description: readString(row, 'description'),
    quantity: readNumber(row, 'quantity'),
    unitPrice: readNumber(row, 'unit_price'),
    amount: readNumber(row, 'amount'),
    createdAt: readString(row, 'created_at'),
    updatedAt: readString(row, 'updated_at'),
  };
}
