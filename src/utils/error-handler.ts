import { logger } from './logger.js';

export class ProvisioningImportError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProvisioningImportError';
  }
}

/**
 * A required worksheet is missing after case/whitespace-insensitive matching.
 * Fatal: the run stops before any output is built.
 */
export class SheetNotFoundError extends ProvisioningImportError {
  constructor(
    public readonly wanted: string[],
    public readonly availableSheets: string[]
  ) {
    super(
      `Worksheet '${wanted.join("' or '")}' not found. Available: ${availableSheets.join(', ')}`,
      'SHEET_NOT_FOUND',
      { wanted, availableSheets }
    );
    this.name = 'SheetNotFoundError';
  }
}

export class WorkbookParseError extends ProvisioningImportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'WORKBOOK_PARSE_ERROR', context);
    this.name = 'WorkbookParseError';
  }
}

export class ConfigError extends ProvisioningImportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Raised inside the rate-center client only; the client converts it into a
 * lookup miss before returning.
 */
export class RateCenterLookupError extends ProvisioningImportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RATE_CENTER_LOOKUP_ERROR', context);
    this.name = 'RateCenterLookupError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof SheetNotFoundError) {
    return `${error.message}. Check the workbook tab names.`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function handleError(error: unknown, identifier?: string): string {
  const message = describeError(error);
  const details = error instanceof ProvisioningImportError
    ? { code: error.code, ...error.context }
    : undefined;

  logger.error('Provisioning import failed', {
    identifier,
    error: message,
    details,
  });

  return message;
}
