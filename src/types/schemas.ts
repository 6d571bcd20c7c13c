import { z } from 'zod';

export interface User {
  id: number;
  name: string;
  email: string;
}

/**
 * Body accepted by POST /users.
 *
 * Both fields are optional at this layer so that a missing field reaches the
 * store and is rejected there with the same error as an empty one.
 */
export const createUserBodySchema = z.object({
  name: z.string().optional(),
  email: z.string().optional()
});

export interface HealthStatus {
  status: 'ok';
}

export interface ServiceDescriptor {
  service: string;
  version: string;
  docs: {
    health: string;
    users: string;
  };
}

export type ErrorName = 'ValidationError' | 'NotFound' | 'BadRequest' | 'MethodNotAllowed';

export interface ErrorBody {
  error: ErrorName;
  message: string;
}
