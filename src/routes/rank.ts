import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';

import type { RankingPipeline, UploadedFile } from '../pipeline/rankCvs';
import { sendError, sendValidationErrors } from './respond';

const rankSchema = z.object({
  job_description: z.string().trim().min(1, 'Job description is required'),
  top_n: z.coerce.number().int().min(1).default(3),
});

const collectFiles = (files: Request['files']): UploadedFile[] => {
  if (!files) {
    return [];
  }

  const list = Array.isArray(files) ? files : Object.values(files).flat();

  return list.map((file) => ({
    originalname: file.originalname,
    size: file.size,
    buffer: file.buffer,
  }));
};

type RankRouterOptions = {
  pipeline: RankingPipeline;
  maxFiles: number;
};

export const createRankRouter = ({ pipeline, maxFiles }: RankRouterOptions): Router => {
  const router = Router();
  // One extra slot so an oversized batch reaches the pipeline's own limit message.
  const upload = multer({ storage: multer.memoryStorage(), limits: { files: maxFiles + 1 } });

  router.post(
    '/',
    (req: Request, res: Response, next: NextFunction) => {
      upload.array('files')(req, res, (error: unknown) => {
        if (error) {
          sendError(res, error);
          return;
        }
        next();
      });
    },
    async (req: Request, res: Response) => {
      const validation = rankSchema.safeParse(req.body);

      if (!validation.success) {
        return sendValidationErrors(res, validation.error.issues);
      }

      try {
        const result = await pipeline.rank({
          jobDescription: validation.data.job_description,
          files: collectFiles(req.files),
          topN: validation.data.top_n,
        });

        return res.json(result);
      } catch (error) {
        return sendError(res, error);
      }
    },
  );

  return router;
};
