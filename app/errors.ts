export type ErrorCode =
  | 'CONNECTION_ERROR'
  | 'STORAGE_INIT_ERROR'
  | 'UPLOAD_CONFIG_ERROR'
  | 'STORAGE_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'STORAGE_ERROR'
  | 'UNKNOWN_TOOL'
  | 'SCHEMA_VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'AUTH_UNAVAILABLE'
  | 'AUTHENTICATION_SETUP_ERROR'
  | 'CONFIG_ERROR';

export abstract class InvoiceServiceError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Startup

export class ConfigError extends InvoiceServiceError {
  readonly code = 'CONFIG_ERROR';
}

export class ConnectionError extends InvoiceServiceError {
  readonly code = 'CONNECTION_ERROR';
}

export class StorageInitError extends InvoiceServiceError {
  readonly code = 'STORAGE_INIT_ERROR';
}

export class UploadConfigError extends InvoiceServiceError {
  readonly code = 'UPLOAD_CONFIG_ERROR';
}

export class AuthenticationSetupError extends InvoiceServiceError {
  readonly code = 'AUTHENTICATION_SETUP_ERROR';
}

// Domain

export class StorageUnavailableError extends InvoiceServiceError {
  readonly code = 'STORAGE_UNAVAILABLE';
}

export class NotFoundError extends InvoiceServiceError {
  readonly code = 'NOT_FOUND';
}

export class ValidationError extends InvoiceServiceError {
  readonly code = 'VALIDATION_ERROR';
}

export class ConflictError extends InvoiceServiceError {
  readonly code = 'CONFLICT';
}

export class StorageError extends InvoiceServiceError {
  readonly code = 'STORAGE_ERROR';
}

// Tool protocol

export class UnknownToolError extends InvoiceServiceError {
  readonly code = 'UNKNOWN_TOOL';

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

export type SchemaIssue = {
  path: string;
  message: string;
};

export class SchemaValidationError extends InvoiceServiceError {
  readonly code = 'SCHEMA_VALIDATION_ERROR';

  constructor(message: string, readonly issues: ReadonlyArray<SchemaIssue> = []) {
    super(issues.length > 0
      ? `${message}: ${issues.map(formatSchemaIssue).join('; ')}`
      : message);
  }
}

function formatSchemaIssue(issue: SchemaIssue): string {
  return issue.path === '' ? issue.message : `${issue.path}: ${issue.message}`;
}

// Authentication

export class UnauthorizedError extends InvoiceServiceError {
  readonly code = 'UNAUTHORIZED';
}

export class AuthUnavailableError extends InvoiceServiceError {
  readonly code = 'AUTH_UNAVAILABLE';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
