export type Category = {
  id: number;
  name: string;
  description: string | null;
  color: string | null;
  createdAt: string;
  updatedAt: string;
};

export type CategoryInput = {
  name: string;
  description?: string | null;
  color?: string | null;
};

export type CategoryPatch = Partial<CategoryInput>;

export type Company = {
  id: number;
  name: string;
  address: string | null;
  email: string | null;
  phone: string | null;
  website: string | null;
  taxId: string | null;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
};

export type CompanyInput = {
  name: string;
  address?: string | null;
  email?: string | null;
  phone?: string | null;
  website?: string | null;
  taxId?: string | null;
  notes?: string | null;
};

export type CompanyPatch = Partial<CompanyInput>;

export const INVOICE_STATUSES = ['paid', 'unpaid', 'overdue'] as const;

export type InvoiceStatus = typeof INVOICE_STATUSES[number];

export type InvoiceItem = {
  id: number;
  invoiceId: number;
  description: string;
  quantity: number;
  unitPrice: number;
  amount: number;
  createdAt: string;
  updatedAt: string;
};

export type InvoiceItemInput = {
  description: string;
  quantity?: number;
  unitPrice: number;
};

export type InvoiceItemPatch = Partial<InvoiceItemInput>;

export type Invoice = {
  id: number;
  title: string;
  description: string | null;
  invoiceStartedAt: string | null;
  invoiceEndedAt: string | null;
  amount: number;
  currency: string;
  categoryId: number | null;
  category: Category | null;
  companyId: number | null;
  company: Company | null;
  items: InvoiceItem[];
  originalDownloadLink: string | null;
  tags: string[];
  status: InvoiceStatus;
  dueDate: string | null;
  createdAt: string;
  updatedAt: string;
};

export type InvoiceInput = {
  title: string;
  description?: string | null;
  invoiceStartedAt?: string | null;
  invoiceEndedAt?: string | null;
  currency?: string;
  categoryId?: number | null;
  companyId?: number | null;
  originalDownloadLink?: string | null;
  tags?: string[];
  status?: InvoiceStatus;
  dueDate?: string | null;
  items?: InvoiceItemInput[];
};

export type InvoicePatch = Partial<Omit<InvoiceInput, 'items'>>;

export type ListOptions = {
  keyword?: string;
  limit?: number;
  offset?: number;
};

export const INVOICE_SORT_FIELDS = ['createdAt', 'amount', 'dueDate', 'title'] as const;

export type InvoiceSortField = typeof INVOICE_SORT_FIELDS[number];

export type InvoiceListOptions = ListOptions & {
  categoryId?: number;
  companyId?: number;
  status?: InvoiceStatus;
  tag?: string;
  sortBy?: InvoiceSortField;
  sortOrder?: 'asc' | 'desc';
};

export type Page<T> = {
  data: T[];
  total: number;
  limit: number;
  offset: number;
};

export type StoredFile = {
  key: string;
  filename: string;
  contentType: string;
  size: number;
  downloadUrl: string;
};

export type PresignedUpload = {
  key: string;
  uploadUrl: string;
  contentType: string;
  expiresIn: number;
};

export type PresignedDownload = {
  key: string;
  downloadUrl: string;
  expiresIn: number;
};
