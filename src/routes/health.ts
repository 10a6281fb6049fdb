import { Router, Request, Response } from 'express';
import { NAME, VERSION } from '../version';

export function createHealthRouter(): Router {
  const router = Router();

  // Health check endpoint (no auth)
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', service: NAME, version: VERSION });
  });

  return router;
}
