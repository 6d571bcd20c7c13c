export { UserStore } from './store/user-store.js';
export { ApiError, BadRequestError, NotFoundError, ValidationError } from './store/errors.js';
export { createApp, type AppOptions } from './http/app.js';
export { startServer, type RunningServer } from './http/server.js';
export { loadConfig, resolveConfig, resolveConfigPath } from './config/load.js';
export { serviceConfigSchema, type ServiceConfig } from './config/schema.js';
export type { User, HealthStatus, ServiceDescriptor, ErrorBody } from './types/schemas.js';
