import { Router } from 'express';
import type { Request, Response } from 'express';

import type { RankingPipeline } from '../pipeline/rankCvs';
import type { SessionManager } from '../store/sessions';
import type { CleanupResponse } from '../types';
import { sendError } from './respond';

type SessionRouterOptions = {
  pipeline: RankingPipeline;
  sessions: SessionManager;
};

export const createSessionRouter = ({ pipeline, sessions }: SessionRouterOptions): Router => {
  const router = Router();

  router.delete('/session/:sessionId', async (req: Request, res: Response) => {
    const { sessionId } = req.params;

    try {
      await pipeline.cleanup(sessionId);
      const body: CleanupResponse = { message: `Session ${sessionId} cleaned up successfully` };
      return res.json(body);
    } catch (error) {
      return sendError(res, error);
    }
  });

  router.get('/download-cv/:sessionId/:filename', async (req: Request, res: Response) => {
    const { sessionId, filename } = req.params;

    try {
      const filePath = await sessions.resolveFile(sessionId, filename);

      if (!filePath) {
        return res.status(404).json({ error: 'File not found' });
      }

      return res.download(filePath, filename);
    } catch (error) {
      return sendError(res, error);
    }
  });

  return router;
};
