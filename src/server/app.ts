import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { nanoid } from 'nanoid';
import {
  serverConfigSchema,
  createErrorResponse,
  ErrorCode,
  type ServerConfig,
} from './types.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerServerRoutes } from './routes/servers.js';
import { registerVolumeRoutes } from './routes/volumes.js';
import { registerAuthPlugin } from './middleware/auth.js';
import { getServerManager, type ServerManager } from '../provisioning/server-manager.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

/**
 * Extended server configuration with API key and manager
 */
export interface AppConfig extends Partial<ServerConfig> {
  apiKey?: string;
  /**
   * Manager the routes delegate to. When omitted the process-wide manager
   * is created from configuration on first use.
   */
  serverManager?: ServerManager;
}

/**
 * Create and configure a Fastify application instance
 */
export async function createApp(
  config: AppConfig = {}
): Promise<FastifyInstance> {
  // Extract apiKey and manager before validation (not part of ServerConfig schema)
  const { apiKey, serverManager, ...serverConfig } = config;

  const getManager = (): ServerManager => serverManager ?? getServerManager();

  // Validate and apply defaults
  const validatedConfig = serverConfigSchema.parse(serverConfig);

  // Create Fastify instance with logging
  const app = Fastify({
    logger: validatedConfig.enableLogging
      ? {
          level: 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : false,
    requestTimeout: validatedConfig.requestTimeout,
    genReqId: () => nanoid(12),
  });

  // Register CORS plugin
  await app.register(cors, {
    origin: validatedConfig.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-API-Key', 'X-Request-ID'],
  });

  // Add request ID to response headers
  app.addHook('onRequest', (request: FastifyRequest, reply, done) => {
    void reply.header('X-Request-ID', request.id);
    done();
  });

  // Global error handler
  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    logger.error({ err: error, requestId: request.id }, 'Request error');

    // Handle validation errors
    if (error.validation) {
      return reply.status(400).send(
        createErrorResponse(
          ErrorCode.BAD_REQUEST,
          'Validation error',
          { errors: error.validation },
          request.id
        )
      );
    }

    // Handle specific HTTP status codes
    if (error.statusCode) {
      const code = mapStatusToErrorCode(error.statusCode);
      return reply.status(error.statusCode).send(
        createErrorResponse(code, error.message, undefined, request.id)
      );
    }

    // Generic internal error
    return reply.status(500).send(
      createErrorResponse(
        ErrorCode.INTERNAL_ERROR,
        'An unexpected error occurred',
        undefined,
        request.id
      )
    );
  });

  // Not found handler
  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send(
      createErrorResponse(
        ErrorCode.NOT_FOUND,
        `Route ${request.method} ${request.url} not found`,
        undefined,
        request.id
      )
    );
  });

  // Register auth with API key
  registerAuthPlugin(apiKey);

  registerHealthRoutes(app, getManager);
  registerServerRoutes(app, getManager);
  registerVolumeRoutes(app, getManager);

  return app;
}

/**
 * Map HTTP status code to error code
 */
function mapStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCode.BAD_REQUEST;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 403:
      return ErrorCode.FORBIDDEN;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 409:
      return ErrorCode.CONFLICT;
    case 503:
      return ErrorCode.SERVICE_UNAVAILABLE;
    case 504:
      return ErrorCode.TIMEOUT;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
}
