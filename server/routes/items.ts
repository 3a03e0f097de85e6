import { Router, type Request, type Response, type NextFunction } from 'express';
import multer from 'multer';
import { itemCreateSchema, itemReadSchema, type Item, type ItemCreate, type ItemRead, type NewItem } from '../../shared/schema.js';
import type { Storage } from '../db.js';
import { NotFoundError, RequestValidationError, parseRequest } from '../errors.js';
import { parseIdParam } from './params.js';

export interface ItemRouterOptions {
  modelUploadLimitBytes: number;
}

/**
 * Items never echo their payload; clients only learn whether one is stored
 * and fetch the bytes from /items/:item_id/model.
 */
export function toItemRead(item: Item): ItemRead {
  return itemReadSchema.parse({
    id: item.id,
    name: item.name,
    description: item.description,
    has_model_data: item.model_data !== null,
  });
}

function toNewItem(body: ItemCreate): NewItem {
  return {
    name: body.name,
    description: body.description,
    model_data: body.model_data ? Buffer.from(body.model_data, 'base64') : null,
  };
}

export function createItemRouter(storage: Storage, { modelUploadLimitBytes }: ItemRouterOptions): Router {
  const router = Router();

  // Payloads stay in memory until they are written to the items row
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: modelUploadLimitBytes,
      files: 1,
    },
  });

  // POST /items/ - Register a model asset
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(itemCreateSchema, req.body, 'body');
      const created = await storage.withSession((session) => session.createItem(toNewItem(body)));
      res.status(200).json(toItemRead(created));
    } catch (error) {
      next(error);
    }
  });

  // GET /items/
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const rows = await storage.withSession((session) => session.listItems());
      res.status(200).json(rows.map(toItemRead));
    } catch (error) {
      next(error);
    }
  });

  // GET /items/:item_id
  router.get('/:item_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const itemId = parseIdParam(req, 'item_id');
      const item = await storage.withSession((session) => session.getItem(itemId));
      if (!item) {
        throw new NotFoundError('Item');
      }
      res.status(200).json(toItemRead(item));
    } catch (error) {
      next(error);
    }
  });

  // PUT /items/:item_id - Full replacement; an absent model_data clears the payload
  router.put('/:item_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const itemId = parseIdParam(req, 'item_id');
      const body = parseRequest(itemCreateSchema, req.body, 'body');

      const updated = await storage.withSession((session) => session.updateItem(itemId, toNewItem(body)));
      if (!updated) {
        throw new NotFoundError('Item');
      }
      res.status(200).json(toItemRead(updated));
    } catch (error) {
      next(error);
    }
  });

  // DELETE /items/:item_id - Instances placing this item are left as they are
  router.delete('/:item_id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const itemId = parseIdParam(req, 'item_id');
      const removed = await storage.withSession((session) => session.deleteItem(itemId));
      if (!removed) {
        throw new NotFoundError('Item');
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  // PUT /items/:item_id/model - Replace the stored payload with an uploaded file
  router.put('/:item_id/model', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const itemId = parseIdParam(req, 'item_id');
      if (!req.file) {
        throw new RequestValidationError('file', [
          { loc: ['file', 'file'], msg: 'A model file is required', type: 'missing' },
        ]);
      }

      const modelData = req.file.buffer;
      const updated = await storage.withSession((session) => session.setItemModel(itemId, modelData));
      if (!updated) {
        throw new NotFoundError('Item');
      }

      console.log(`Stored ${modelData.length} byte model for item ${itemId}`);
      res.status(200).json(toItemRead(updated));
    } catch (error) {
      next(error);
    }
  });

  // GET /items/:item_id/model - Raw payload bytes
  router.get('/:item_id/model', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const itemId = parseIdParam(req, 'item_id');
      const item = await storage.withSession((session) => session.getItem(itemId));
      if (!item) {
        throw new NotFoundError('Item');
      }
      if (!item.model_data) {
        throw new NotFoundError('Model data');
      }

      res.setHeader('Content-Type', 'application/octet-stream');
      res.setHeader('Content-Disposition', `attachment; filename="item-${item.id}.bin"`);
      res.status(200).send(item.model_data);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
