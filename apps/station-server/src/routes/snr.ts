import { Router, Request, Response } from 'express';
import { body, validationResult } from 'express-validator';
import { formatSnrReport, type SnrStatsStore } from '@meshack/core';
import { Logger, errorMessage } from '@meshack/shared';
import {
  StationErrorCode,
  createErrorResponse,
  createResponse,
} from '../types.js';

export type SnrStatsSource = Pick<
  SnrStatsStore,
  'summaries' | 'summary' | 'resetAll'
>;

export function createSnrRouter(store: SnrStatsSource): Router {
  const router = Router();
  const logger = Logger.getInstance();

  // GET /api/v1/snr
  router.get('/', (req: Request, res: Response) => {
    const nodes = store.summaries();
    res.json(createResponse({ nodes, total: nodes.length }));
  });

  // GET /api/v1/snr/report
  router.get('/report', (req: Request, res: Response) => {
    res.type('text/plain').send(formatSnrReport(store));
  });

  // GET /api/v1/snr/:nodeName
  router.get('/:nodeName', (req: Request, res: Response) => {
    const summary = store.summary(req.params.nodeName);
    if (!summary) {
      res
        .status(404)
        .json(
          createErrorResponse(
            StationErrorCode.NOT_FOUND,
            `No SNR data for node: ${req.params.nodeName}`
          )
        );
      return;
    }
    res.json(createResponse(summary));
  });

  // POST /api/v1/snr/reset  body: { confirmed: true, reconfirmed: true }
  router.post(
    '/reset',
    [
      body('confirmed')
        .isBoolean({ strict: true })
        .withMessage('confirmed must be a boolean'),
      body('reconfirmed')
        .isBoolean({ strict: true })
        .withMessage('reconfirmed must be a boolean'),
    ],
    async (req: Request, res: Response) => {
      const errors = validationResult(req);
      if (!errors.isEmpty()) {
        res
          .status(400)
          .json(
            createErrorResponse(
              StationErrorCode.INVALID_REQUEST,
              errors
                .array({ onlyFirstError: true })
                .map(error => String(error.msg))
                .join('; ')
            )
          );
        return;
      }

      try {
        const reset = await store.resetAll({
          confirmed: req.body.confirmed === true,
          reconfirmed: req.body.reconfirmed === true,
        });
        if (!reset) {
          res
            .status(409)
            .json(
              createErrorResponse(
                StationErrorCode.RESET_NOT_CONFIRMED,
                'Reset requires confirmation twice'
              )
            );
          return;
        }
        res.json(createResponse({ reset: true }));
      } catch (error) {
        logger.error('Error resetting SNR statistics', {
          error: errorMessage(error),
        });
        res
          .status(500)
          .json(
            createErrorResponse(
              StationErrorCode.INTERNAL_ERROR,
              errorMessage(error)
            )
          );
      }
    }
  );

  return router;
}
