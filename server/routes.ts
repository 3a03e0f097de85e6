import type { Express } from 'express';
import type { Storage } from './db.js';
import { createHealthRouter } from './routes/health.js';
import { createInstanceRouter } from './routes/instances.js';
import { createItemRouter } from './routes/items.js';
import { createProjectRouter } from './routes/projects.js';

export interface RouteOptions {
  modelUploadLimitBytes: number;
}

export function registerRoutes(app: Express, storage: Storage, options: RouteOptions): void {
  app.use('/health', createHealthRouter(storage));
  app.use('/items', createItemRouter(storage, options));
  app.use('/projects', createProjectRouter(storage));
  app.use('/instances', createInstanceRouter(storage));
}
