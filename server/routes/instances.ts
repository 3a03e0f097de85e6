import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  instanceCreateSchema,
  instanceReadSchema,
  type InstanceCreate,
  type InstanceRead,
} from '../../shared/schema.js';
import type { Storage } from '../db.js';
import type { Session } from '../storage.js';
import { NotFoundError, parseRequest } from '../errors.js';
import { parseIdParam } from './params.js';

// Both references must resolve before anything is written
async function assertReferencesExist(session: Session, body: InstanceCreate): Promise<void> {
  const project = await session.getProject(body.project_id);
  if (!project) {
    throw new NotFoundError('Project');
  }

  const item = await session.getItem(body.item_id);
  if (!item) {
    throw new NotFoundError('Item');
  }
}

export function createInstanceRouter(storage: Storage): Router {
  const router = Router();

  // POST /instances/ - Place an item inside a project
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(instanceCreateSchema, req.body, 'body');

      const created = await storage.withSession(async (session) => {
        await assertReferencesExist(session, body);
        return session.createInstance(body);
      });

      const response: InstanceRead = instanceReadSchema.parse(created);
      res.status(200).json(response);
    } catch (error) {
      next(error);
    }
  });

  // GET /instances/ - Every instance, oldest first
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const rows = await storage.withSession((session) => session.listInstances());
      res.status(200).json(rows.map((row) => instanceReadSchema.parse(row)));
    } catch (error) {
      next(error);
    }
  });

  // GET /instances/:instance_id
  router.get('/:instance_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instanceId = parseIdParam(req, 'instance_id');

      const instance = await storage.withSession((session) => session.getInstance(instanceId));
      if (!instance) {
        throw new NotFoundError('Instance');
      }

      res.status(200).json(instanceReadSchema.parse(instance));
    } catch (error) {
      next(error);
    }
  });

  // PUT /instances/:instance_id - Full replacement, no merge with the stored row
  router.put('/:instance_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instanceId = parseIdParam(req, 'instance_id');
      const body = parseRequest(instanceCreateSchema, req.body, 'body');

      const updated = await storage.withSession(async (session) => {
        const existing = await session.getInstance(instanceId);
        if (!existing) {
          throw new NotFoundError('Instance');
        }

        await assertReferencesExist(session, body);

        const replaced = await session.updateInstance(instanceId, body);
        if (!replaced) {
          throw new NotFoundError('Instance');
        }
        return replaced;
      });

      res.status(200).json(instanceReadSchema.parse(updated));
    } catch (error) {
      next(error);
    }
  });

  // DELETE /instances/:instance_id
  router.delete('/:instance_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instanceId = parseIdParam(req, 'instance_id');

      const removed = await storage.withSession((session) => session.deleteInstance(instanceId));
      if (!removed) {
        throw new NotFoundError('Instance');
      }

      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
