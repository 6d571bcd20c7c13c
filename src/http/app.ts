import express, { Express, Request, Response } from 'express';
import type { UserStore } from '../store/user-store.js';
import type { ServiceDescriptor } from '../types/schemas.js';
import { accessLog, errorHandler, LogLine, methodNotAllowed, notFoundHandler } from './middleware.js';
import { healthRouter } from './routes/health.js';
import { usersRouter } from './routes/users.js';

export interface AppOptions {
  store: UserStore;
  service: {
    name: string;
    version: string;
  };
  /** Access log sink; omit to disable request logging */
  log?: LogLine;
  logError?: (err: unknown) => void;
}

/**
 * Build the Express application. The store is owned by the caller, which
 * keeps every app instance (and every test) isolated.
 */
export function createApp(options: AppOptions): Express {
  const { store, service } = options;
  const logError = options.logError ?? ((err: unknown) => console.error(err));
  const app = express();

  app.disable('x-powered-by');
  app.set('case sensitive routing', true);
  if (options.log) {
    app.use(accessLog(options.log));
  }
  app.use(express.json());

  app
    .route('/')
    .get((_req: Request, res: Response) => {
      const body: ServiceDescriptor = {
        service: service.name,
        version: service.version,
        docs: { health: '/health', users: '/users' }
      };
      res.json(body);
    })
    .all(methodNotAllowed('GET'));
  app.use('/health', healthRouter());
  app.use('/users', usersRouter(store));

  app.use(notFoundHandler);
  app.use(errorHandler(logError));

  return app;
}
