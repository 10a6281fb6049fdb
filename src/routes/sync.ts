import { Router, Request, Response, NextFunction } from 'express';
import { SyncEngine } from '../services/syncEngine';
import { parseSyncRequest } from '../validation/syncRequest';

export function createSyncRouter(engine: SyncEngine): Router {
  const router = Router();

  // Apply a device's changes and return what it has not seen yet
  router.post('/sync', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseSyncRequest(req.body);
      const response = await engine.sync(request.device_id, request.last_sync, request.changes);
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
