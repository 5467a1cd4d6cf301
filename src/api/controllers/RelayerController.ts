import { Request, Response } from 'express';
import { RelayerException } from '../../types/errors';
import { isRecord } from '../../clients/ChainProvider';
import { logger } from '../../utils/logger';
import { pathKey } from '../../services/relayer/RelayerModule';
import type { RelayerModule } from '../../services/relayer/RelayerModule';
import type { RelayPathConfig } from '../../config/relayer-config';

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

function badRequest(message: string): ApiResponse {
  return { status: 400, body: { success: false, message } };
}

function stringParam(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function parsePath(channelId: string, params: Record<string, unknown>): RelayPathConfig | string {
  const portId = stringParam(params.port_id);
  const sourceChainId = stringParam(params.source_chain_id);
  const destinationChainId = stringParam(params.destination_chain_id);
  if (!portId || !sourceChainId || !destinationChainId) {
    return 'Missing required parameters: port_id, source_chain_id, destination_chain_id';
  }
  return { sourceChainId, portId, channelId, destinationChainId };
}

/**
 * Handlers resolve to a status and body so they can be exercised without a
 * running server; `route` adapts them to express.
 */
export class RelayerController {
  constructor(private readonly relayer: RelayerModule) {}

  /**
   * List relayed chains and their provider pools
   * GET /api/v1/relayer/chains
   */
  public async getChains(): Promise<ApiResponse> {
    const chains = this.relayer.registry.list().map(chain => {
      const snapshot = chain.snapshot();
      return {
        chain_id: snapshot.chainId,
        client_id: snapshot.clientId,
        current_provider: snapshot.currentProvider,
        remaining_providers: snapshot.remainingProviders.length,
        failovers: snapshot.failovers
      };
    });
    const workers = this.relayer.listWorkers().map(worker => worker.status());
    return { status: 200, body: { success: true, data: { chains, workers } } };
  }

  /**
   * Relay every pending packet of a channel
   * POST /api/v1/relayer/channels/:channelId/clear-packets
   */
  public async clearPackets(channelId: string, body: unknown): Promise<ApiResponse> {
    const path = parsePath(channelId, isRecord(body) ? body : {});
    if (typeof path === 'string') {
      return badRequest(path);
    }

    logger.info('[RelayerController] Received packet clearing request', { ...path });

    const relayPath = this.relayer.relayPath(path);
    if (!relayPath.ok) {
      throw new RelayerException(relayPath.error);
    }
    const worker = this.relayer.workerFor(path);
    if (!worker) {
      return { status: 404, body: { success: false, message: `Path ${pathKey(path)} is not relayed by this instance` } };
    }
    const result = await worker.clearPendingPackets();
    if (!result.ok) {
      throw new RelayerException(result.error);
    }

    const summary = result.value;
    logger.info('[RelayerController] Packet clearing completed', {
      channelId,
      recvPackets: summary.recvPackets,
      acknowledgements: summary.acknowledgements,
      timeouts: summary.timeouts,
      errors: summary.errors.length
    });

    return {
      status: 200,
      body: {
        success: summary.errors.length === 0,
        data: {
          channel_id: channelId,
          port_id: path.portId,
          recv_packets: summary.recvPackets,
          acknowledgements: summary.acknowledgements,
          timeouts: summary.timeouts,
          client_updates: summary.clientUpdates,
          transaction_hashes: summary.txHashes,
          errors: summary.errors,
          timestamp: new Date().toISOString()
        }
      }
    };
  }

  /**
   * Classify one packet
   * GET /api/v1/relayer/channels/:channelId/packets/:sequence
   */
  public async getPacketStatus(channelId: string, sequence: string, query: Record<string, unknown>): Promise<ApiResponse> {
    const path = parsePath(channelId, query);
    if (typeof path === 'string') {
      return badRequest(path);
    }
    if (!/^[1-9][0-9]*$/.test(sequence) || !Number.isSafeInteger(Number(sequence))) {
      return badRequest(`Invalid sequence: ${sequence}`);
    }

    const relayPath = this.relayer.relayPath(path);
    if (!relayPath.ok) {
      throw new RelayerException(relayPath.error);
    }
    const status = await this.relayer.tracker.packetStatus(relayPath.value, Number(sequence));
    if (!status.ok) {
      throw new RelayerException(status.error);
    }
    if (!status.value) {
      return {
        status: 404,
        body: { success: false, message: `No send_packet event for sequence ${sequence} on ${path.portId}/${channelId}` }
      };
    }

    const packet = status.value;
    return {
      status: 200,
      body: {
        success: true,
        data: {
          sequence: packet.sequence,
          action: packet.action,
          commitment_present: packet.commitmentPresent,
          received: packet.received,
          acknowledgement: packet.acknowledgement,
          client_caught_up: packet.clientCaughtUp,
          destination_height: packet.destinationHeight
        }
      }
    };
  }

  public route(handler: (req: Request) => Promise<ApiResponse>): (req: Request, res: Response) => Promise<void> {
    return async (req, res) => {
      const { status, body } = await handler(req);
      res.status(status).json(body);
    };
  }
}
