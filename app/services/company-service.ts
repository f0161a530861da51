import type { SqlExecutor, StorageHandle } from '@app/data/storage-backend.js';
import { ConflictError, NotFoundError } from '@app/errors.js';
import type { Company, CompanyInput, CompanyPatch, ListOptions, Page } from '@app/services/models.js';
import {
  likePattern,
  normalizeListOptions,
  optionalEmail,
  optionalText,
  positiveId,
  requireText,
} from '@app/services/validation.js';
import { firstRow, readNumber, readNullableString, readString } from '@app/tools/assertion.js';
import type { SqlRow } from '@app/tools/assertion.js';

type CompanyValues = Omit<Company, 'id' | 'createdAt' | 'updatedAt'>;

export class CompanyService {
  #storage: StorageHandle;
  #owner: string;

  constructor(storage: StorageHandle, owner: string) {
    this.#storage = storage;
    this.#owner = owner;
  }

  async createCompany(input: CompanyInput): Promise<Company> {
    const values = companyValues(input);
    const now = new Date().toISOString();
    const rows = await this.#storage.sql`
      INSERT INTO invoice_companies (owner, name, address, email, phone, website, tax_id, notes, created_at, updated_at)
      VALUES (
        ${this.#owner}, ${values.name}, ${values.address}, ${values.email}, ${values.phone},
        ${values.website}, ${values.taxId}, ${values.notes}, ${now}, ${now}
      )
      RETURNING *
    `;
    return toCompany(firstRow(rows));
  }

  async getCompany(id: number): Promise<Company> {
    const company = await findCompany(this.#storage, this.#owner, positiveId(id, 'companyId'));
    if (company === null) {
      throw new NotFoundError(`Company ${id} not found`);
    }
    return company;
  }

  async listCompanies(options: ListOptions = {}): Promise<Page<Company>> {
    const { keyword, limit, offset } = normalizeListOptions(options);
    const pattern = likePattern(keyword);
    const [countRow] = await this.#storage.sql`
      SELECT COUNT(*) AS total FROM invoice_companies
      WHERE owner = ${this.#owner} AND (${pattern} IS NULL
        OR name LIKE ${pattern} ESCAPE '\\' OR email LIKE ${pattern} ESCAPE '\\' OR notes LIKE ${pattern} ESCAPE '\\')
    `;
    const rows = await this.#storage.sql`
      SELECT * FROM invoice_companies
      WHERE owner = ${this.#owner} AND (${pattern} IS NULL
        OR name LIKE ${pattern} ESCAPE '\\' OR email LIKE ${pattern} ESCAPE '\\' OR notes LIKE ${pattern} ESCAPE '\\')
      ORDER BY name ASC, id ASC
      LIMIT ${limit} OFFSET ${offset}
    `;
    return {
      data: rows.map(toCompany),
      total: countRow === undefined ? 0 : readNumber(countRow, 'total'),
      limit,
      offset,
    };
  }

  async updateCompany(id: number, patch: CompanyPatch): Promise<Company> {
    const existing = await this.getCompany(id);
    const values = companyValues({
      name: patch.name ?? existing.name,
      address: patch.address === undefined ? existing.address : patch.address,
      email: patch.email === undefined ? existing.email : patch.email,
      phone: patch.phone === undefined ? existing.phone : patch.phone,
      website: patch.website === undefined ? existing.website : patch.website,
      taxId: patch.taxId === undefined ? existing.taxId : patch.taxId,
      notes: patch.notes === undefined ? existing.notes : patch.notes,
    });
    const now = new Date().toISOString();
    const rows = await this.#storage.sql`
      UPDATE invoice_companies
      SET name = ${values.name}, address = ${values.address}, email = ${values.email}, phone = ${values.phone},
        website = ${values.website}, tax_id = ${values.taxId}, notes = ${values.notes}, updated_at = ${now}
      WHERE id = ${existing.id} AND owner = ${this.#owner}
      RETURNING *
    `;
    if (rows.length === 0) {
      throw new NotFoundError(`Company ${id} not found`);
    }
    return toCompany(firstRow(rows));
  }

  async deleteCompany(id: number): Promise<void> {
    const companyId = positiveId(id, 'companyId');
    const owner = this.#owner;
    await this.#storage.transaction(async function (tx) {
      if (await findCompany(tx, owner, companyId) === null) {
        throw new NotFoundError(`Company ${companyId} not found`);
      }
      const [usage] = await tx.sql`SELECT COUNT(*) AS total FROM invoices WHERE company_id = ${companyId}`;
      const invoiceCount = usage === undefined ? 0 : readNumber(usage, 'total');
      if (invoiceCount > 0) {
        throw new ConflictError(`Company ${companyId} is used by ${invoiceCount} invoice(s)`);
      }
      await tx.sql`DELETE FROM invoice_companies WHERE id = ${companyId} AND owner = ${owner}`;
    });
  }
}

function companyValues(input: CompanyInput): CompanyValues {
  return {
    name: requireText(input.name, 'name', 200),
    address: optionalText(input.address),
    email: optionalEmail(input.email),
    phone: optionalText(input.phone),
    website: optionalText(input.website),
    taxId: optionalText(input.taxId),
    notes: optionalText(input.notes),
  };
}

export async function findCompany(executor: SqlExecutor, owner: string, id: number): Promise<Company | null> {
  const [row] = await executor.sql`SELECT * FROM invoice_companies WHERE id = ${id} AND owner = ${owner}`;
  return row === undefined ? null : toCompany(row);
}

export function toCompany(row: SqlRow): Company {
  return {
    id: readNumber(row, 'id'),
    name: readString(row, 'name'),
    address: readNullableString(row, 'address'),
    email: readNullableString(row, 'email'),
    phone: readNullableString(row, 'phone'),
    website: readNullableString(row, 'website'),
    taxId: readNullableString(row, 'tax_id'),
    notes: readNullableString(row, 'notes'),
    createdAt: readString(row, 'created_at'),
    updatedAt: readString(row, 'updated_at'),
  };
}
