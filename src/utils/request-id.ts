import { randomUUID } from 'node:crypto';
import type { FastifyRequest } from 'fastify';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Extract request ID from incoming headers or generate a new one.
 * Wired as Fastify's `genReqId`, so `request.id` always holds it.
 */
export function resolveRequestId(headers: Record<string, string | string[] | undefined>): string {
  const incomingId = headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string' && incomingId.trim().length > 0) {
    return incomingId.trim();
  }

  return generateRequestId();
}

/**
 * Get request ID from Fastify request
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return 'unknown';
  }
  return request.id || 'unknown';
}
