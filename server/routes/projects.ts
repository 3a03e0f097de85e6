import { Router, type Request, type Response, type NextFunction } from 'express';
import { instanceReadSchema, projectCreateSchema, projectReadSchema } from '../../shared/schema.js';
import type { Storage } from '../db.js';
import { NotFoundError, parseRequest } from '../errors.js';
import { parseIdParam } from './params.js';

export function createProjectRouter(storage: Storage): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(projectCreateSchema, req.body, 'body');
      const created = await storage.withSession((session) => session.createProject(body));
      res.status(200).json(projectReadSchema.parse(created));
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const rows = await storage.withSession((session) => session.listProjects());
      res.status(200).json(rows.map((row) => projectReadSchema.parse(row)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:project_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const projectId = parseIdParam(req, 'project_id');
      const project = await storage.withSession((session) => session.getProject(projectId));
      if (!project) {
        throw new NotFoundError('Project');
      }
      res.status(200).json(projectReadSchema.parse(project));
    } catch (error) {
      next(error);
    }
  });

  // GET /projects/:project_id/instances - Placements inside one project
  router.get('/:project_id/instances', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const projectId = parseIdParam(req, 'project_id');

      const rows = await storage.withSession(async (session) => {
        const project = await session.getProject(projectId);
        if (!project) {
          throw new NotFoundError('Project');
        }
        return session.listProjectInstances(projectId);
      });

      res.status(200).json(rows.map((row) => instanceReadSchema.parse(row)));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:project_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const projectId = parseIdParam(req, 'project_id');
      const body = parseRequest(projectCreateSchema, req.body, 'body');

      const updated = await storage.withSession((session) => session.updateProject(projectId, body));
      if (!updated) {
        throw new NotFoundError('Project');
      }
      res.status(200).json(projectReadSchema.parse(updated));
    } catch (error) {
      next(error);
    }
  });

  // Instances pointing at a deleted project keep their project_id
  router.delete('/:project_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const projectId = parseIdParam(req, 'project_id');
      const removed = await storage.withSession((session) => session.deleteProject(projectId));
      if (!removed) {
        throw new NotFoundError('Project');
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
