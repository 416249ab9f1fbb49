import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'VALIDATION_FAILED'
  | 'GRAPH_LOAD_FAILED'
  | 'INTERNAL';

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

// =============================================================================
// Domain errors
// =============================================================================

/**
 * Base class for errors the engine raises on purpose. Validation findings
 * are never thrown; these cover conditions that abort an operation.
 */
export class DecisionGraphError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * Fatal: the same decision ID exists in both partitions. Nothing is computed.
 */
export class GraphLoadError extends DecisionGraphError {
  constructor(id: string, existingScope: string, incomingScope: string) {
    super(
      'GRAPH_LOAD_FAILED',
      `ID collision — ${id} exists in both ${existingScope} and ${incomingScope}`,
      { id, scopes: [existingScope, incomingScope] },
    );
  }
}

export class NotFoundError extends DecisionGraphError {
  constructor(what: string, where = 'graph') {
    super('NOT_FOUND', `${what} not found in ${where}`, { id: what });
  }
}

export class ConflictError extends DecisionGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, details);
  }
}

/** Body substitution target is missing or ambiguous. */
export class EditConflictError extends ConflictError {
  constructor(message: string, occurrences: number) {
    super(message, { occurrences });
  }
}

export class ConfigError extends DecisionGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('BAD_INPUT', message, details);
  }
}

/** A caller-supplied value could not be coerced (e.g. a non-numeric level). */
export class UsageError extends DecisionGraphError {
  constructor(message: string) {
    super('BAD_INPUT', message);
  }
}

export class RecordParseError extends DecisionGraphError {
  constructor(location: string, what = 'frontmatter', reason?: string) {
    super(
      'INTERNAL',
      reason ? `could not parse ${what} from ${location}: ${reason}` : `could not parse ${what} from ${location}`,
      reason ? { location, reason } : { location }
    );
  }
}

// =============================================================================
// error.v1 mapping
// =============================================================================

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
 * Convert any error to ErrorV1 (never leaks stack traces or file paths)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof DecisionGraphError) {
    return buildErrorV1(error.code, error.message, error.details, requestId);
  }

  if (error instanceof Error) {
    // Remove file paths
    const message = (error.message || 'An unexpected error occurred').replace(/\/[\w/.@-]+/g, '[path]');
    return buildErrorV1('INTERNAL', message, undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * HTTP status for an error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'CONFLICT':
      return 409;
    case 'VALIDATION_FAILED':
      return 422;
    case 'GRAPH_LOAD_FAILED':
    case 'INTERNAL':
      return 500;
  }
}
