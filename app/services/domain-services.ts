import type { StorageHandle } from '@app/data/storage-backend.js';
import type { ObjectStorageHandle } from '@app/object-storage/object-storage.js';
import { CategoryService } from '@app/services/category-service.js';
import { CompanyService } from '@app/services/company-service.js';
import { InvoiceService } from '@app/services/invoice-service.js';
import { UploadService } from '@app/services/upload-service.js';

/** Owner of every record while authentication is disabled. */
export const LOCAL_OWNER = 'local';

export type DomainServices = {
  categories: CategoryService;
  companies: CompanyService;
  invoices: InvoiceService;
  uploads: UploadService;
};

export type DomainServicesFactory = (owner: string) => DomainServices;

export function createDomainServices(
  storage: StorageHandle,
  objectStorage: ObjectStorageHandle,
  owner: string = LOCAL_OWNER,
): DomainServices {
  const uploads = new UploadService(objectStorage);
  return {
    categories: new CategoryService(storage, owner),
    companies: new CompanyService(storage, owner),
    invoices: new InvoiceService(storage, owner, uploads),
    uploads,
  };
}

export function domainServicesFactory(storage: StorageHandle, objectStorage: ObjectStorageHandle): DomainServicesFactory {
  return function (owner) {
    return createDomainServices(storage, objectStorage, owner);
  };
}
