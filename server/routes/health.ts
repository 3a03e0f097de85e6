import { Router, type Request, type Response } from 'express';
import type { Storage } from '../db.js';

export function createHealthRouter(storage: Storage): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    const startTime = Date.now();

    try {
      await storage.withSession((session) => session.ping());
      res.status(200).json({
        status: 'ok',
        database: 'ok',
        responseTime: `${Date.now() - startTime}ms`,
      });
    } catch (error) {
      console.error('Health check failed:', error);
      res.status(503).json({
        status: 'error',
        database: 'error',
        responseTime: `${Date.now() - startTime}ms`,
      });
    }
  });

  return router;
}
