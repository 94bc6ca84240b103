import type { FastifyInstance } from 'fastify';
import {
  createSuccessResponse,
  SERVICE_NAME,
  VERSION,
  type HealthResponse,
  type LivenessResponse,
} from '../types.js';
import type { ServerManager } from '../../provisioning/server-manager.js';
import type { ClusterHealth } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('routes:health');

/**
 * Probe the cluster through the manager. A manager that cannot be built
 * (invalid configuration, unreadable kubeconfig) is reported as unhealthy.
 */
async function probeCluster(getManager: () => ServerManager): Promise<ClusterHealth> {
  try {
    return await getManager().checkHealth();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ err: error }, 'Server manager unavailable for health check');
    return { status: 'unhealthy', kubernetes: `error: ${message}` };
  }
}

/**
 * Register root and health check routes
 */
export function registerHealthRoutes(
  app: FastifyInstance,
  getManager: () => ServerManager
): void {
  /**
   * GET / - Service banner
   */
  app.get('/', async (request, reply) => {
    return reply.send(
      createSuccessResponse(
        {
          service: SERVICE_NAME,
          version: VERSION,
          docs: 'Send requests to /api/v1 with the X-API-Key header',
        },
        request.id
      )
    );
  });

  /**
   * GET /health - Cluster connectivity check
   * Returns 503 when the Kubernetes API cannot be reached
   */
  app.get('/health', async (request, reply) => {
    const health = await probeCluster(getManager);

    const response: HealthResponse = {
      status: health.status,
      kubernetes: health.kubernetes,
      version: VERSION,
      timestamp: new Date().toISOString(),
    };

    if (health.status !== 'healthy') {
      return reply.status(503).send(createSuccessResponse(response, request.id));
    }

    return reply.send(createSuccessResponse(response, request.id));
  });

  /**
   * GET /health/live - Liveness check
   * Simple check to verify the process is serving requests
   */
  app.get('/health/live', async (request, reply) => {
    const response: LivenessResponse = {
      alive: true,
      timestamp: new Date().toISOString(),
    };
    return reply.send(createSuccessResponse(response, request.id));
  });
}
