import type { FastifyInstance } from 'fastify';
import { createSuccessResponse, createErrorResponse, ErrorCode } from '../types.js';
import { apiKeyAuth } from '../middleware/auth.js';
import { storageParamsSchema, type StorageParams } from '../types/api.js';
import type { ServerManager } from '../../provisioning/server-manager.js';
import { createLogger } from '../../utils/logger.js';
import { sendOperationError } from './errors.js';

const logger = createLogger('routes:volumes');

/**
 * Register persistent data routes
 */
export function registerVolumeRoutes(
  app: FastifyInstance,
  getManager: () => ServerManager
): void {
  /**
   * GET /api/v1/volumes - List managed data volumes
   * Requires authentication
   */
  app.get(
    '/api/v1/volumes',
    {
      preHandler: [apiKeyAuth],
    },
    async (request, reply) => {
      try {
        const volumes = await getManager().listVolumes();
        return reply.send(createSuccessResponse(volumes, request.id));
      } catch (error) {
        return sendOperationError(request, reply, error, logger, 'list volumes');
      }
    }
  );

  /**
   * DELETE /api/v1/volumes/:storageName - Delete a data volume
   * Requires authentication. Irreversible; the server using it is not touched.
   */
  app.delete<{
    Params: StorageParams;
  }>(
    '/api/v1/volumes/:storageName',
    {
      preHandler: [apiKeyAuth],
    },
    async (request, reply) => {
      const paramsResult = storageParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return reply.status(400).send(
          createErrorResponse(
            ErrorCode.BAD_REQUEST,
            'Invalid storage name',
            { errors: paramsResult.error.errors },
            request.id
          )
        );
      }

      try {
        const result = await getManager().deleteServerData(paramsResult.data.storageName);
        return reply.send(createSuccessResponse(result, request.id));
      } catch (error) {
        return sendOperationError(request, reply, error, logger, 'delete volume');
      }
    }
  );
}
