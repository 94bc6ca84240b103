import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import { WaitTimeoutError } from '../../cluster/errors.js';
import { InvalidIdentityError } from '../../provisioning/names.js';
import { createErrorResponse, ErrorCode } from '../types.js';

/**
 * Send the response for an error raised by a provisioning operation.
 *
 * Bad identities are the caller's fault (400), an expired wait is a 504,
 * everything else is a 500 carrying the error message.
 */
export function sendOperationError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  logger: Logger,
  action: string
): FastifyReply {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof InvalidIdentityError) {
    logger.warn({ requestId: request.id, raw: error.raw }, `Rejected ${action}: invalid name`);
    return reply
      .status(400)
      .send(createErrorResponse(ErrorCode.BAD_REQUEST, message, undefined, request.id));
  }

  logger.error({ err: error, requestId: request.id }, `Failed to ${action}`);

  if (error instanceof WaitTimeoutError) {
    return reply
      .status(504)
      .send(
        createErrorResponse(
          ErrorCode.TIMEOUT,
          message,
          { timeoutMs: error.timeoutMs },
          request.id
        )
      );
  }

  return reply
    .status(500)
    .send(createErrorResponse(ErrorCode.INTERNAL_ERROR, message, undefined, request.id));
}
