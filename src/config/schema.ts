import { z } from 'zod';

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = '0.0.0.0';
export const SERVICE_NAME = 'user-health-api';

// Numbers, or digit-only strings from the environment and CLI flags
const portSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected a decimal port number').transform(Number)])
  .pipe(z.number().int().min(0).max(65535));

const serverSchema = z.object({
  host: z.string().min(1).default(DEFAULT_HOST),
  port: portSchema.default(DEFAULT_PORT)
});

const serviceSchema = z.object({
  name: z.string().min(1).default(SERVICE_NAME),
  /** Reported by GET /; falls back to the package version when unset */
  version: z.string().min(1).optional()
});

const loggingSchema = z.object({
  /** One stdout line per request: method, path, status, duration */
  access_log: z.boolean().default(true)
});

export const serviceConfigSchema = z.object({
  server: serverSchema.default({}),
  service: serviceSchema.default({}),
  logging: loggingSchema.default({})
});

export type ServiceConfig = z.infer<typeof serviceConfigSchema>;
