/**
 * Error Types
 *
 * Lightweight typed errors for better debugging and error handling.
 * These extend Error to preserve stack traces while adding context.
 */

import type { Platform } from '../types/unified.js';

/** Base error for all scanner errors */
export class ScannerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScannerError';
  }
}

/** Error fetching data from a platform API */
export class ApiError extends ScannerError {
  constructor(
    message: string,
    public readonly platform: Platform,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { platform, statusCode, ...context });
    this.name = 'ApiError';
  }
}

/** Error parsing or validating upstream data */
export class DataValidationError extends ScannerError {
  constructor(
    message: string,
    public readonly field: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { field, ...context });
    this.name = 'DataValidationError';
  }
}

/** Invalid runtime configuration */
export class ConfigError extends ScannerError {
  constructor(
    message: string,
    public readonly variable: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', { variable, ...context });
    this.name = 'ConfigError';
  }
}

/** Unreadable or corrupt stats store */
export class StatsStoreError extends ScannerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STATS_STORE_ERROR', context);
    this.name = 'StatsStoreError';
  }
}

/**
 * Type guard to check if an error is a ScannerError
 */
export function isScannerError(error: unknown): error is ScannerError {
  return error instanceof ScannerError;
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
