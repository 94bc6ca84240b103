import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import { apiKeyAuth } from '../middleware/auth.js';
import {
  createServerBodySchema,
  serverParamsSchema,
  serverStorageParamsSchema,
  type CreateServerBody,
  type ServerParams,
  type ServerStorageParams,
} from '../types/api.js';
import type { ServerManager } from '../../provisioning/server-manager.js';
import { createLogger } from '../../utils/logger.js';
import { sendOperationError } from './errors.js';

const logger = createLogger('routes:servers');

/**
 * Register game server lifecycle routes
 */
export function registerServerRoutes(
  app: FastifyInstance,
  getManager: () => ServerManager
): void {
  /**
   * POST /api/v1/servers - Provision a server
   * Requires authentication
   */
  app.post<{
    Body: CreateServerBody;
  }>(
    '/api/v1/servers',
    {
      preHandler: [apiKeyAuth],
    },
    async (request, reply) => {
      const bodyResult = createServerBodySchema.safeParse(request.body);
      if (!bodyResult.success) {
        return reply.status(400).send(
          createErrorResponse(
            ErrorCode.BAD_REQUEST,
            'Invalid request body',
            { errors: bodyResult.error.errors },
            request.id
          )
        );
      }

      try {
        const result = await getManager().createServer(bodyResult.data);
        return reply.status(201).send(createSuccessResponse(result, request.id));
      } catch (error) {
        return sendOperationError(request, reply, error, logger, 'create server');
      }
    }
  );

  /**
   * POST /api/v1/servers/:serverName/pause - Remove the running server, keep its data
   * Requires authentication
   */
  app.post<{
    Params: ServerParams;
  }>(
    '/api/v1/servers/:serverName/pause',
    {
      preHandler: [apiKeyAuth],
    },
    async (request, reply) => {
      const paramsResult = serverParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return reply.status(400).send(
          createErrorResponse(
            ErrorCode.BAD_REQUEST,
            'Invalid server name',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
      }

      try {
        const result = await getManager().pauseServer(paramsResult.data.serverName);
        return reply.send(createSuccessResponse(result, request.id));
      } catch (error) {
        return sendOperationError(request, reply, error, logger, 'pause server');
      }
    }
  );

  /**
   * DELETE /api/v1/servers/:serverName/:storageName - Remove the server and its data
   * Requires authentication. Irreversible.
   */
  app.delete<{
    Params: ServerStorageParams;
  }>(
    '/api/v1/servers/:serverName/:storageName',
    {
      preHandler: [apiKeyAuth],
    },
    async (request, reply) => {
      const paramsResult = serverStorageParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return reply.status(400).send(
          createErrorResponse(
            ErrorCode.BAD_REQUEST,
            'Invalid server or storage name',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
      }

      const { serverName, storageName } = paramsResult.data;

      try {
        const result = await getManager().deleteServer(serverName, storageName);
        return reply.send(createSuccessResponse(result, request.id));
      } catch (error) {
        return sendOperationError(request, reply, error, logger, 'delete server');
      }
    }
  );
}
