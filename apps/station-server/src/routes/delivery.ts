import { Router, Request, Response } from 'express';
import type { DeliveryEngine } from '@meshack/core';
import { Logger, errorMessage, formatNodeId } from '@meshack/shared';
import {
  StationErrorCode,
  createErrorResponse,
  createResponse,
} from '../types.js';

export type DeliveryStatusSource = Pick<
  DeliveryEngine,
  | 'getLastStatus'
  | 'getMostRecentStatus'
  | 'getMetrics'
  | 'getDirectory'
  | 'ackIndicator'
>;

export function createDeliveryRouter(engine: DeliveryStatusSource): Router {
  const router = Router();
  const logger = Logger.getInstance();

  // GET /api/v1/delivery/status
  router.get('/status', (req: Request, res: Response) => {
    const status = engine.getMostRecentStatus();
    if (!status) {
      res
        .status(404)
        .json(
          createErrorResponse(StationErrorCode.NOT_FOUND, 'No messages sent yet')
        );
      return;
    }
    res.json(
      createResponse({ ...status, ack: engine.ackIndicator(status.nodeName) })
    );
  });

  // GET /api/v1/delivery/status/:nodeName
  router.get('/status/:nodeName', (req: Request, res: Response) => {
    const { nodeName } = req.params;
    if (!engine.getDirectory().has(nodeName)) {
      res
        .status(404)
        .json(
          createErrorResponse(
            StationErrorCode.NOT_FOUND,
            `Node not found: ${nodeName}`
          )
        );
      return;
    }

    const status = engine.getLastStatus(nodeName);
    res.json(
      createResponse({
        nodeName,
        status: status ?? null,
        ack: engine.ackIndicator(nodeName),
      })
    );
  });

  // GET /api/v1/delivery/metrics
  router.get('/metrics', (req: Request, res: Response) => {
    try {
      res.json(createResponse(engine.getMetrics()));
    } catch (error) {
      logger.error('Error reading delivery metrics', {
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
  });

  // GET /api/v1/delivery/nodes
  router.get('/nodes', (req: Request, res: Response) => {
    const nodes = engine
      .getDirectory()
      .list()
      .map(node => ({
        name: node.name,
        id: formatNodeId(node.id),
        encryption: node.publicKey ? 'pki' : 'channel',
        ack: engine.ackIndicator(node.name),
      }));
    res.json(createResponse({ nodes, total: nodes.length }));
  });

  return router;
}
