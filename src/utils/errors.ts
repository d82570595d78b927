import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';

// =============================================================================
// Engine errors
// =============================================================================

/**
 * Base class for faults raised by the audit engine itself.
 * Structural defects in the scene are Findings, never errors.
 */
export class SceneAuditError extends Error {
  constructor(message: string, readonly entityName?: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An object, material or data block disappeared between lookup and use.
 * Always non-fatal: callers skip the entity.
 */
export class EntityMissingError extends SceneAuditError {}

/**
 * The store is in a state where a bulk operation is unsafe
 * (wrong interaction mode, object outside the working set, shared data).
 * Aborts the one fix that needed it, not the run.
 */
export class UnsafeStateError extends SceneAuditError {}

/**
 * A host bulk operation (transform apply, unwrap, normalize, pack) failed.
 */
export class HostOperationError extends SceneAuditError {
  constructor(
    message: string,
    readonly operation: string,
    entityName?: string,
  ) {
    super(message, entityName);
  }
}

/**
 * The requested object scope (e.g. a named collection) does not exist.
 */
export class ScopeNotFoundError extends SceneAuditError {}

/**
 * Extract a printable message from anything thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

// =============================================================================
// HTTP error envelope
// =============================================================================

/**
 * Error codes for structured error responses
 */
export type ErrorCode = 'BAD_INPUT' | 'NOT_FOUND' | 'CONFLICT' | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Remove absolute paths from a message before it leaves the service
 */
function sanitizeMessage(message: string): string {
  return message.replace(/\/[\w/.@-]+/g, '[path]');
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack or host paths)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof ScopeNotFoundError) {
    return buildErrorV1('NOT_FOUND', error.message, undefined, requestId);
  }

  if (error instanceof UnsafeStateError) {
    return buildErrorV1('CONFLICT', sanitizeMessage(error.message), undefined, requestId);
  }

  if (error instanceof Error) {
    // Fastify body parser and size limit errors carry a 4xx status code
    const statusCode = 'statusCode' in error ? error.statusCode : undefined;
    if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1('BAD_INPUT', sanitizeMessage(error.message), undefined, requestId);
    }
    return buildErrorV1(
      'INTERNAL',
      sanitizeMessage(error.message || 'An unexpected error occurred'),
      undefined,
      requestId
    );
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'CONFLICT':
      return 409;
    case 'INTERNAL':
    default:
      return 500;
  }
}
