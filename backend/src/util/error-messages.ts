import type { ErrorResponse } from './error-messages.types.js';

export const ERROR_MESSAGES = {
  notFound: 'not found',
  upstream: 'error when obtaining cryptocurrency data',
  internal: 'internal server error',
  invalidParams: 'invalid path parameter',
  invalidQuery: 'invalid query',
};

export function notFoundMessage(cryptoId: string) {
  return `cryptocurrency '${cryptoId}' not found`;
}

export function errorResponse(message: string): ErrorResponse {
  return { error: message };
}
