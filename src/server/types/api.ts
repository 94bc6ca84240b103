import { z } from 'zod';
import { quantitySchema } from '../../config/index.js';

/**
 * Create server request body
 */
export const createServerBodySchema = z.object({
  /** Server identity, normalized to a Kubernetes name */
  serverName: z.string().min(1).max(63),
  /** Storage identity; an existing claim of this name is reused */
  storageName: z.string().min(1).max(63),
  /** Key for the server's management API */
  apiKey: z.string().min(1),
  memoryLimit: quantitySchema.optional(),
  memoryRequest: quantitySchema.optional(),
  cpuLimit: quantitySchema.optional(),
  cpuRequest: quantitySchema.optional(),
  storageCapacity: quantitySchema.optional(),
});

export type CreateServerBody = z.infer<typeof createServerBodySchema>;

/**
 * Server name parameter
 */
export const serverParamsSchema = z.object({
  serverName: z.string().min(1),
});

export type ServerParams = z.infer<typeof serverParamsSchema>;

/**
 * Server and storage name parameters
 */
export const serverStorageParamsSchema = z.object({
  serverName: z.string().min(1),
  storageName: z.string().min(1),
});

export type ServerStorageParams = z.infer<typeof serverStorageParamsSchema>;

/**
 * Storage name parameter
 */
export const storageParamsSchema = z.object({
  storageName: z.string().min(1),
});

export type StorageParams = z.infer<typeof storageParamsSchema>;
