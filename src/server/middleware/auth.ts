import type { FastifyRequest, FastifyReply } from 'fastify';
import { createErrorResponse, ErrorCode } from '../types.js';

/**
 * Header carrying the internal API key
 */
export const API_KEY_HEADER = 'x-api-key';

/**
 * API key stored in server config
 */
let configuredApiKey: string | undefined;

/**
 * Set the API key for authentication
 */
export function setApiKey(key: string | undefined): void {
  configuredApiKey = key;
}

/**
 * API key authentication preHandler
 * Validates the X-API-Key header
 */
export async function apiKeyAuth(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  // If no API key is configured, skip auth
  if (!configuredApiKey) {
    return;
  }

  const header = request.headers[API_KEY_HEADER];
  const key = Array.isArray(header) ? header[0] : header;

  if (!key) {
    return reply.status(401).send(
      createErrorResponse(
        ErrorCode.UNAUTHORIZED,
        'X-API-Key header required',
        undefined,
        request.id
      )
    );
  }

  if (key !== configuredApiKey) {
    return reply.status(403).send(
      createErrorResponse(
        ErrorCode.FORBIDDEN,
        'Invalid API Key',
        undefined,
        request.id
      )
    );
  }

  // Auth successful - continue
}

/**
 * Configure authentication for a new app instance
 */
export function registerAuthPlugin(apiKey?: string): void {
  setApiKey(apiKey);
}
