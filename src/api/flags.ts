import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/error-handler';
import type { FeedFilterCoordinator } from '@/services/feed-filter';

const ReplyFilteringFlagSchema = z.object({
  enabled: z.boolean()
});

/**
 * Runtime toggle for reply filtering; no restart needed
 */
export function createFlagsRouter(filter: Pick<FeedFilterCoordinator, 'replyFilteringEnabled' | 'setReplyFilteringEnabled'>): Router {
  const router = Router();

  router.get('/flags/reply-filtering', (req, res) => {
    res.json({ enabled: filter.replyFilteringEnabled });
  });

  router.put('/flags/reply-filtering', asyncHandler(async (req, res) => {
    const { enabled } = ReplyFilteringFlagSchema.parse(req.body);
    filter.setReplyFilteringEnabled(enabled);
    res.json({ enabled: filter.replyFilteringEnabled });
  }));

  return router;
}
