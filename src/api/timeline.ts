import { Router } from 'express';
import { asyncHandler } from '@/api/error-handler';
import type { TimelineAssembler } from '@/services/timeline';

export function createTimelineRouter(assembler: Pick<TimelineAssembler, 'refresh' | 'latestSnapshot'>): Router {
  const router = Router();

  router.get('/timeline', asyncHandler(async (req, res) => {
    const snapshot = await assembler.refresh();
    if (!snapshot) {
      res.status(409).json({
        error: {
          message: 'Timeline refresh was superseded by a newer refresh',
          status: 409,
          timestamp: new Date().toISOString(),
          path: req.path
        }
      });
      return;
    }
    res.json(snapshot);
  }));

  router.get('/timeline/latest', (req, res) => {
    const snapshot = assembler.latestSnapshot();
    if (!snapshot) {
      res.status(204).end();
      return;
    }
    res.json(snapshot);
  });

  return router;
}
