import crypto from 'crypto';

import { telemetry } from '../telemetry/Telemetry';
import { asDomainError, DomainError, type DomainErrorCode } from './DomainError';

export type PublicApiError = {
  errorId: string;
  code: DomainErrorCode;
  message: string;
  retryable: boolean;
};

export type ApiErrorResponse = {
  success: false;
  errorMessage: string;
  error: PublicApiError;
};

export const httpStatusFor = (code: DomainErrorCode): number => {
  switch (code) {
    case 'VALIDATION_ERROR':
    case 'INVALID_ASSET_RECORD':
    case 'INVALID_TYPE_REGISTRY':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'DUPLICATE_IDENTIFIER':
      return 409;
    case 'TRAVERSAL_LIMIT_EXCEEDED':
      return 422;
    case 'RULE_EVALUATION_ERROR':
    case 'UNKNOWN_ERROR':
    default:
      return 500;
  }
};

const publicMessageFor = (err: DomainError): string => {
  // Inventory errors name ids and file paths, which clients need; only
  // unclassified failures are masked.
  switch (err.code) {
    case 'UNKNOWN_ERROR':
      return 'Unexpected error.';
    case 'RULE_EVALUATION_ERROR':
      return err.message || 'A validation rule failed.';
    default:
      return err.message || 'Invalid request.';
  }
};

/**
 * Maps any thrown value to a status and client-safe body, logging one
 * structured line with the full error under a fresh `errorId`.
 */
export function mapErrorToApiResponse(
  err: unknown,
  context: { operation: string },
): {
  status: number;
  body: ApiErrorResponse;
} {
  const errorId = crypto.randomUUID();
  const domain = asDomainError(err);

  telemetry.record({
    name: 'api.error',
    durationMs: 0,
    tags: {
      operation: context.operation,
      code: domain.code,
      errorId,
    },
    metrics: {},
  });

  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({
      type: 'inventory.error',
      errorId,
      operation: context.operation,
      code: domain.code,
      retryable: domain.retryable,
      message: domain.message,
      details: domain.details,
      stack: domain.stack,
    }),
  );

  const publicMessage = publicMessageFor(domain);

  return {
    status: httpStatusFor(domain.code),
    body: {
      success: false,
      errorMessage: publicMessage,
      error: {
        errorId,
        code: domain.code,
        message: publicMessage,
        retryable: domain.retryable,
      },
    },
  };
}
