import { logger } from '../../../utils/logger';
import { err, ok } from '../../../types/result';
import { LATEST, acknowledgementCommitment, formatHeight, hasTimedOut, packetCommitment } from '../../../types/ibc';
import type { Result } from '../../../types/result';
import type { Height, QueryHeight } from '../../../types/ibc';
import type { RelayerError } from '../../../types/errors';
import type { Chain } from '../chain/ChainRegistry';
import type { ChainStateQueries } from '../query/ChainStateQueries';
import type {
    ChannelHandshakeEvent,
    ConnectionHandshakeEvent,
    Datagram,
    HandshakeDatagram,
    PacketDatagram,
    RelayEvent,
    TimeoutConditionEvent,
    UpdateClientDatagram
} from './types';

/**
 * Builds the datagram that relays one event from `source` (the chain whose state
 * is proven) to `destination` (the chain the datagram is submitted to).
 *
 * Proofs are read at a single height H. When the destination's client of the
 * source has no consensus state at H, the client update is returned instead;
 * callers submit it and build again.
 */
export class DatagramBuilder {
    constructor(private readonly queries: ChainStateQueries) {}

    /**
     * @param installedHeight height on `source` to prove at, or `LATEST`
     * @returns null when the event no longer needs relaying
     */
    public async createDatagram(
        event: RelayEvent,
        source: Chain,
        destination: Chain,
        installedHeight: QueryHeight
    ): Promise<Result<Datagram | null, RelayerError>> {
        const proofHeight = await this.resolveHeight(source, installedHeight);
        if (!proofHeight.ok) {
            return proofHeight;
        }
        const height = proofHeight.value;

        const clientId = await this.clientIdOnDestination(event, source, height);
        if (!clientId.ok) {
            return clientId;
        }

        const updates = await this.createUpdateClientDatagrams(source, destination, clientId.value, height);
        if (!updates.ok) {
            return updates;
        }
        if (updates.value.length > 0) {
            return ok(updates.value[0]);
        }

        switch (event.type) {
            case 'SendPacket':
            case 'WriteAcknowledgement':
            case 'TimeoutCondition':
                return this.packetDatagram(event, source, height);
            case 'ChannelOpenInit':
            case 'ChannelOpenTry':
            case 'ChannelOpenAck':
            case 'ChannelCloseInit':
                return this.channelDatagram(event, source, destination, height);
            case 'ConnectionOpenInit':
            case 'ConnectionOpenTry':
            case 'ConnectionOpenAck':
                return this.connectionDatagram(event, source, height);
        }
    }

    /**
     * Client updates `destination` needs before it can verify proofs read from
     * `source` at `targetHeight`: none when the client already holds a consensus
     * state for that height, otherwise one update to exactly that height.
     */
    public async createUpdateClientDatagrams(
        source: Chain,
        destination: Chain,
        clientId: string,
        targetHeight: Height
    ): Promise<Result<UpdateClientDatagram[], RelayerError>> {
        const client = await this.queries.clientState(destination, clientId, LATEST);
        if (!client.ok) {
            return client;
        }
        const { frozenHeight } = client.value.value;
        if (frozenHeight) {
            return err({
                kind: 'ClientFrozen',
                chainId: destination.chainId,
                clientId,
                frozenHeight: frozenHeight.revisionHeight
            });
        }

        const consensus = await this.queries.consensusState(destination, clientId, targetHeight, LATEST);
        if (!consensus.ok) {
            return consensus;
        }
        if (consensus.value.value !== null) {
            return ok([]);
        }

        const block = await source.lightClient.lightBlock(targetHeight.revisionHeight);
        if (!block.ok) {
            return block;
        }

        logger.info(`[DatagramBuilder] Client ${clientId} on ${destination.chainId} needs update to ${formatHeight(targetHeight)}`, {
            clientHeight: formatHeight(client.value.value.latestHeight)
        });
        return ok([{ type: 'UpdateClient', clientId, height: targetHeight, header: block.value.signedHeader }]);
    }

    private async resolveHeight(chain: Chain, height: QueryHeight): Promise<Result<Height, RelayerError>> {
        if (height !== LATEST) {
            return ok(height);
        }
        return this.queries.currentHeight(chain);
    }

    /**
     * The client on the destination that tracks the source, read from the
     * source's side of the connection.
     */
    private async clientIdOnDestination(event: RelayEvent, source: Chain, height: Height): Promise<Result<string, RelayerError>> {
        if (event.type === 'ConnectionOpenInit' || event.type === 'ConnectionOpenTry' || event.type === 'ConnectionOpenAck') {
            return ok(event.counterpartyClientId);
        }

        let portId: string;
        let channelId: string;
        switch (event.type) {
            case 'SendPacket':
                portId = event.packet.sourcePort;
                channelId = event.packet.sourceChannel;
                break;
            case 'WriteAcknowledgement':
            case 'TimeoutCondition':
                portId = event.packet.destinationPort;
                channelId = event.packet.destinationChannel;
                break;
            default:
                portId = event.portId;
                channelId = event.channelId;
        }

        const channel = await this.queries.channel(source, portId, channelId, height);
        if (!channel.ok) {
            return channel;
        }
        const connection = await this.queries.connection(source, channel.value.value.connectionHops[0], height);
        if (!connection.ok) {
            return connection;
        }
        return ok(connection.value.value.counterparty.clientId);
    }

    private async packetDatagram(
        event: Extract<RelayEvent, { packet: unknown }>,
        source: Chain,
        height: Height
    ): Promise<Result<PacketDatagram | null, RelayerError>> {
        const { packet } = event;

        if (event.type === 'TimeoutCondition') {
            return this.timeoutDatagram(event, source, height);
        }

        if (event.type === 'SendPacket') {
            const commitment = await this.queries.packetCommitment(
                source, packet.sourcePort, packet.sourceChannel, packet.sequence, height
            );
            if (!commitment.ok) {
                return commitment;
            }
            if (commitment.value.value === null) {
                logger.debug(`[DatagramBuilder] Packet ${packet.sequence} on ${source.chainId} already settled`);
                return ok(null);
            }
            if (commitment.value.value !== packetCommitment(packet)) {
                return err({ kind: 'PacketMismatch', chainId: source.chainId, sequence: packet.sequence, reason: 'commitment differs from event' });
            }
            return ok({ type: 'RecvPacket', packet, proofCommitment: commitment.value.proof, proofHeight: height });
        }

        const ack = await this.queries.packetAcknowledgement(
            source, packet.destinationPort, packet.destinationChannel, packet.sequence, height
        );
        if (!ack.ok) {
            return ack;
        }
        if (ack.value.value === null) {
            return ok(null);
        }
        if (ack.value.value !== acknowledgementCommitment(event.acknowledgement)) {
            return err({ kind: 'PacketMismatch', chainId: source.chainId, sequence: packet.sequence, reason: 'acknowledgement differs from event' });
        }
        return ok({
            type: 'Acknowledgement',
            packet,
            acknowledgement: event.acknowledgement,
            proofAcked: ack.value.proof,
            proofHeight: height
        });
    }

    // Proofs come from the packet's destination, which is `source` here
    private async timeoutDatagram(
        event: TimeoutConditionEvent,
        source: Chain,
        height: Height
    ): Promise<Result<PacketDatagram | null, RelayerError>> {
        const { packet } = event;

        const block = await source.lightClient.lightBlock(height.revisionHeight);
        if (!block.ok) {
            return block;
        }
        if (!hasTimedOut(packet, height, BigInt(block.value.timestamp))) {
            logger.debug(`[DatagramBuilder] Packet ${packet.sequence} has not timed out on ${source.chainId} at ${formatHeight(height)}`);
            return ok(null);
        }

        const channel = await this.queries.channel(source, packet.destinationPort, packet.destinationChannel, height);
        if (!channel.ok) {
            return channel;
        }

        if (channel.value.value.ordering === 'ORDERED') {
            const nextRecv = await this.queries.nextSequenceRecv(source, packet.destinationPort, packet.destinationChannel, height);
            if (!nextRecv.ok) {
                return nextRecv;
            }
            if (nextRecv.value.value > packet.sequence) {
                return ok(null);
            }
            return ok({
                type: 'Timeout',
                packet,
                proofUnreceived: nextRecv.value.proof,
                proofHeight: height,
                nextSequenceRecv: nextRecv.value.value
            });
        }

        const receipt = await this.queries.packetReceipt(
            source, packet.destinationPort, packet.destinationChannel, packet.sequence, height
        );
        if (!receipt.ok) {
            return receipt;
        }
        if (receipt.value.value) {
            return ok(null);
        }
        return ok({
            type: 'Timeout',
            packet,
            proofUnreceived: receipt.value.proof,
            proofHeight: height,
            nextSequenceRecv: packet.sequence
        });
    }

    private async channelDatagram(
        event: ChannelHandshakeEvent,
        source: Chain,
        destination: Chain,
        height: Height
    ): Promise<Result<HandshakeDatagram | null, RelayerError>> {
        const channel = await this.queries.channel(source, event.portId, event.channelId, height);
        if (!channel.ok) {
            return channel;
        }
        const end = channel.value.value;
        const proof = channel.value.proof;
        const counterpartyChannelId = event.counterpartyChannelId ?? end.counterparty.channelId;

        switch (event.type) {
            case 'ChannelOpenInit': {
                const connection = await this.queries.connection(source, end.connectionHops[0], height);
                if (!connection.ok) {
                    return connection;
                }
                const counterpartyConnection = connection.value.value.counterparty.connectionId;
                if (!counterpartyConnection) {
                    return err({ kind: 'ConnectionNotFound', chainId: destination.chainId, connectionId: end.connectionHops[0] });
                }
                return ok({
                    type: 'ChannelOpenTry',
                    portId: event.counterpartyPortId,
                    ordering: end.ordering,
                    connectionHops: [counterpartyConnection],
                    counterpartyPortId: event.portId,
                    counterpartyChannelId: event.channelId,
                    version: end.version,
                    counterpartyVersion: end.version,
                    proofInit: proof,
                    proofHeight: height
                });
            }
            case 'ChannelOpenTry':
                if (!counterpartyChannelId) {
                    return this.unknownCounterparty(event, destination);
                }
                return ok({
                    type: 'ChannelOpenAck',
                    portId: event.counterpartyPortId,
                    channelId: counterpartyChannelId,
                    counterpartyChannelId: event.channelId,
                    counterpartyVersion: end.version,
                    proofTry: proof,
                    proofHeight: height
                });
            case 'ChannelOpenAck':
                if (!counterpartyChannelId) {
                    return this.unknownCounterparty(event, destination);
                }
                return ok({
                    type: 'ChannelOpenConfirm',
                    portId: event.counterpartyPortId,
                    channelId: counterpartyChannelId,
                    proofAck: proof,
                    proofHeight: height
                });
            case 'ChannelCloseInit':
                if (!counterpartyChannelId) {
                    return this.unknownCounterparty(event, destination);
                }
                return ok({
                    type: 'ChannelCloseConfirm',
                    portId: event.counterpartyPortId,
                    channelId: counterpartyChannelId,
                    proofInit: proof,
                    proofHeight: height
                });
        }
    }

    private unknownCounterparty(event: ChannelHandshakeEvent, destination: Chain): Result<never, RelayerError> {
        logger.warn(`[DatagramBuilder] ${event.type} on ${event.portId}/${event.channelId} has no counterparty channel yet`);
        return err({
            kind: 'ChannelNotFound',
            chainId: destination.chainId,
            portId: event.counterpartyPortId,
            channelId: `counterparty of ${event.channelId}`
        });
    }

    private async connectionDatagram(
        event: ConnectionHandshakeEvent,
        source: Chain,
        height: Height
    ): Promise<Result<HandshakeDatagram | null, RelayerError>> {
        const connection = await this.queries.connection(source, event.connectionId, height);
        if (!connection.ok) {
            return connection;
        }
        const end = connection.value.value;
        const proof = connection.value.proof;

        if (event.type === 'ConnectionOpenAck') {
            if (!event.counterpartyConnectionId) {
                return err({ kind: 'ConnectionNotFound', chainId: source.chainId, connectionId: event.connectionId });
            }
            return ok({ type: 'ConnectionOpenConfirm', connectionId: event.counterpartyConnectionId, proofAck: proof, proofHeight: height });
        }

        // Try and Ack also prove the source's client of the destination
        const client = await this.queries.clientState(source, event.clientId, height);
        if (!client.ok) {
            return client;
        }
        const consensusHeight = client.value.value.latestHeight;
        const consensus = await this.queries.consensusState(source, event.clientId, consensusHeight, height);
        if (!consensus.ok) {
            return consensus;
        }
        if (consensus.value.value === null) {
            return err({ kind: 'ClientNotFound', chainId: source.chainId, clientId: event.clientId });
        }

        if (event.type === 'ConnectionOpenInit') {
            return ok({
                type: 'ConnectionOpenTry',
                clientId: event.counterpartyClientId,
                counterpartyClientId: event.clientId,
                counterpartyConnectionId: event.connectionId,
                clientState: client.value.value,
                versions: end.versions,
                delayPeriod: end.delayPeriod,
                proofInit: proof,
                proofClient: client.value.proof,
                proofConsensus: consensus.value.proof,
                proofHeight: height,
                consensusHeight
            });
        }

        if (!event.counterpartyConnectionId) {
            return err({ kind: 'ConnectionNotFound', chainId: source.chainId, connectionId: event.connectionId });
        }
        return ok({
            type: 'ConnectionOpenAck',
            connectionId: event.counterpartyConnectionId,
            counterpartyConnectionId: event.connectionId,
            version: end.versions[0] ?? '1',
            clientState: client.value.value,
            proofTry: proof,
            proofClient: client.value.proof,
            proofConsensus: consensus.value.proof,
            proofHeight: height,
            consensusHeight
        });
    }
}
