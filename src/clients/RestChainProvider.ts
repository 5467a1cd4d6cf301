import axios, { AxiosInstance } from 'axios';
import { logger } from '../utils/logger';
import type { Height } from '../types/ibc';
import { MalformedResponseError, isSendPacketEvent, isWriteAcknowledgementEvent } from './ChainProvider';
import type { ChainProvider, ChainStatus, SendPacketEvent, WriteAcknowledgementEvent } from './ChainProvider';

const HEIGHT_HEADER = 'x-cosmos-block-height';

/**
 * Provider backed by a node's REST gateway. Every lookup is pinned to a height
 * through the block-height header so the returned proof matches that height.
 */
export class RestChainProvider implements ChainProvider {
    private client: AxiosInstance;
    public readonly endpoint: string;

    constructor(private readonly chainId: string, endpoint: string, timeoutMs: number = 30000) {
        this.endpoint = endpoint;
        this.client = axios.create({
            baseURL: endpoint,
            timeout: timeoutMs,
            headers: {
                'Content-Type': 'application/json',
            },
        });

        this.client.interceptors.response.use(
            (response) => response,
            (error) => {
                logger.debug(`[RestChainProvider] Request failed for ${chainId} via ${endpoint}`, {
                    url: error.config?.url,
                    status: error.response?.status,
                    message: error.message
                });
                throw error;
            }
        );
    }

    private async getAt(url: string, height: number): Promise<unknown> {
        const response = await this.client.get(url, {
            headers: { [HEIGHT_HEADER]: String(height) }
        });
        return response.data;
    }

    private channelUrl(portId: string, channelId: string): string {
        return `/ibc/core/channel/v1/channels/${channelId}/ports/${portId}`;
    }

    /**
     * Get current chain height and timestamp
     */
    public async getStatus(): Promise<ChainStatus> {
        const response = await this.client.get('/status');
        const syncInfo = response.data?.result?.sync_info;
        const height = Number.parseInt(syncInfo?.latest_block_height, 10);
        const timestamp = new Date(syncInfo?.latest_block_time);

        if (!Number.isInteger(height) || Number.isNaN(timestamp.getTime())) {
            throw new MalformedResponseError(this.endpoint, 'status');
        }

        logger.debug(`[RestChainProvider] Current height for ${this.chainId}: ${height}`);
        return { height, timestamp };
    }

    public queryChannel(portId: string, channelId: string, height: number): Promise<unknown> {
        return this.getAt(this.channelUrl(portId, channelId), height);
    }

    public queryConnection(connectionId: string, height: number): Promise<unknown> {
        return this.getAt(`/ibc/core/connection/v1/connections/${connectionId}`, height);
    }

    public queryClientState(clientId: string, height: number): Promise<unknown> {
        return this.getAt(`/ibc/core/client/v1/client_states/${clientId}`, height);
    }

    public queryConsensusState(clientId: string, consensusHeight: Height, height: number): Promise<unknown> {
        return this.getAt(
            `/ibc/core/client/v1/consensus_states/${clientId}/revision/${consensusHeight.revisionNumber}/height/${consensusHeight.revisionHeight}`,
            height
        );
    }

    public queryPacketCommitment(portId: string, channelId: string, sequence: number, height: number): Promise<unknown> {
        return this.getAt(`${this.channelUrl(portId, channelId)}/packet_commitments/${sequence}`, height);
    }

    public queryPacketReceipt(portId: string, channelId: string, sequence: number, height: number): Promise<unknown> {
        return this.getAt(`${this.channelUrl(portId, channelId)}/packet_receipts/${sequence}`, height);
    }

    public queryPacketAcknowledgement(portId: string, channelId: string, sequence: number, height: number): Promise<unknown> {
        return this.getAt(`${this.channelUrl(portId, channelId)}/packet_acks/${sequence}`, height);
    }

    public queryNextSequenceSend(portId: string, channelId: string, height: number): Promise<unknown> {
        return this.getAt(`${this.channelUrl(portId, channelId)}/next_sequence_send`, height);
    }

    public queryNextSequenceRecv(portId: string, channelId: string, height: number): Promise<unknown> {
        return this.getAt(`${this.channelUrl(portId, channelId)}/next_sequence`, height);
    }

    public queryNextSequenceAck(portId: string, channelId: string, height: number): Promise<unknown> {
        return this.getAt(`${this.channelUrl(portId, channelId)}/next_sequence_ack`, height);
    }

    private async queryPacketEvents(portId: string, channelId: string, type: string, sequences: number[]): Promise<unknown[]> {
        const response = await this.client.get(`${this.channelUrl(portId, channelId)}/packet_events`, {
            params: { type, sequences: sequences.join(',') }
        });
        const events: unknown = response.data?.events;
        if (!Array.isArray(events)) {
            throw new MalformedResponseError(this.endpoint, `${type} events`);
        }
        return events;
    }

    public async querySendPacketEvents(portId: string, channelId: string, sequences: number[]): Promise<SendPacketEvent[]> {
        const events = await this.queryPacketEvents(portId, channelId, 'send_packet', sequences);
        if (!events.every(isSendPacketEvent)) {
            throw new MalformedResponseError(this.endpoint, 'send_packet events');
        }
        return events;
    }

    public async queryWriteAcknowledgementEvents(
        portId: string,
        channelId: string,
        sequences: number[]
    ): Promise<WriteAcknowledgementEvent[]> {
        const events = await this.queryPacketEvents(portId, channelId, 'write_acknowledgement', sequences);
        if (!events.every(isWriteAcknowledgementEvent)) {
            throw new MalformedResponseError(this.endpoint, 'write_acknowledgement events');
        }
        logger.debug(`[RestChainProvider] Fetched ${events.length} acknowledgements from ${this.chainId}`);
        return events;
    }
}
