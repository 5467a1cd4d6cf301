import { Router } from 'express';
import { RelayerController } from '../controllers/RelayerController';
import { asyncHandler } from '../middleware/asyncHandler';
import type { RelayerModule } from '../../services/relayer/RelayerModule';

export function createRelayerRouter(relayer: RelayerModule): Router {
  const router = Router();
  const controller = new RelayerController(relayer);

  /**
   * @route GET /api/v1/relayer/chains
   * @desc List relayed chains, their current provider and remaining pool
   */
  router.get('/chains', asyncHandler(controller.route(() => controller.getChains())));

  /**
   * @route POST /api/v1/relayer/channels/:channelId/clear-packets
   * @desc Relay every pending packet of a channel
   * @body {string} port_id - The port ID (e.g., "transfer")
   * @body {string} source_chain_id - Chain the packets were sent from
   * @body {string} destination_chain_id - Chain the packets are delivered to
   */
  router.post('/channels/:channelId/clear-packets', asyncHandler(controller.route(
    req => controller.clearPackets(req.params.channelId, req.body)
  )));

  /**
   * @route GET /api/v1/relayer/channels/:channelId/packets/:sequence
   * @desc Relay action a packet currently needs
   * @query {string} port_id
   * @query {string} source_chain_id
   * @query {string} destination_chain_id
   */
  router.get('/channels/:channelId/packets/:sequence', asyncHandler(controller.route(
    req => controller.getPacketStatus(req.params.channelId, req.params.sequence, req.query)
  )));

  return router;
}
