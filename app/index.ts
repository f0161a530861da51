export { loadConfig } from '@app/config.js';
export type { AppConfig, AuthenticationConfig, LogLevel } from '@app/config.js';
export * from '@app/errors.js';
export { createLogger } from '@app/logger.js';
export type { Logger } from '@app/logger.js';

export { StorageBackend } from '@app/data/storage-backend.js';
export type { SqlExecutor, StorageHandle, StorageState } from '@app/data/storage-backend.js';
export { SqliteStorageBackend } from '@app/data/sqlite-storage-backend.js';
export { LibsqlStorageBackend } from '@app/data/libsql-storage-backend.js';
export { createStorageBackend, selectStorageBackend } from '@app/data/storage-selection.js';
export type { StorageSelection } from '@app/data/storage-selection.js';

export { resolveObjectStorage } from '@app/object-storage/object-storage.js';
export type { ObjectStorage, ObjectStorageConfig, ObjectStorageHandle } from '@app/object-storage/object-storage.js';
export { S3ObjectStorage, createS3ObjectStorage } from '@app/object-storage/s3-object-storage.js';

export { CategoryService } from '@app/services/category-service.js';
export { CompanyService } from '@app/services/company-service.js';
export { InvoiceService } from '@app/services/invoice-service.js';
export { UploadService } from '@app/services/upload-service.js';
export { LOCAL_OWNER, createDomainServices, domainServicesFactory } from '@app/services/domain-services.js';
export type { DomainServices, DomainServicesFactory } from '@app/services/domain-services.js';
export * from '@app/services/models.js';

export { ToolRegistry, defineTool } from '@app/mcp-server/tool-registry.js';
export type { ToolDescriptor, ToolGroup } from '@app/mcp-server/tool-registry.js';
export { buildInvoiceToolRegistry, createInvoiceMcpServer } from '@app/mcp-server/mcp-server.js';

export { ApiServer, ownerOf } from '@app/http/api-server.js';
export type { ApiServerOptions } from '@app/http/api-server.js';
export { AuthenticationBridge, McpRouterAuthority } from '@app/http/authentication-bridge.js';
export type { AuthenticationContext, Authority, Identity } from '@app/http/authentication-bridge.js';

export { runUntilSignalled, startInvoiceService } from '@app/supervisor.js';
export type { ServiceOverrides, ServiceRuntime } from '@app/supervisor.js';
