import { logger } from '../../../utils/logger';
import { err, ok } from '../../../types/result';
import { LATEST, compareHeights, hasTimedOut, packetCommitment } from '../../../types/ibc';
import type { Result } from '../../../types/result';
import type { ChannelSequences, Height, Packet, QueryHeight } from '../../../types/ibc';
import type { RelayerError } from '../../../types/errors';
import type { Chain } from '../chain/ChainRegistry';
import type { ChainStateQueries } from '../query/ChainStateQueries';
import type { VerifiedQueryEngine } from '../query/VerifiedQueryEngine';
import type { SendPacketEvent } from '../../../clients/ChainProvider';

/**
 * One direction of a channel: packets sent from `portId/channelId` on `source`
 * are delivered to `destination`.
 */
export interface PacketRelayPath {
    source: Chain;
    destination: Chain;
    portId: string;
    channelId: string;
}

export type PacketAction = 'NeedsRecv' | 'NeedsAck' | 'NeedsTimeout' | 'NoActionNeeded';

export interface PacketStatus {
    sequence: number;
    action: PacketAction;
    /** Whether the source still holds the packet commitment. */
    commitmentPresent: boolean;
    received: boolean;
    /** Acknowledgement commitment stored on the destination, if any. */
    acknowledgement: string | null;
    /** Whether the destination's client of the source reached the packet's creation height. */
    clientCaughtUp: boolean;
    /** Destination height the classification was made at. */
    destinationHeight: Height;
}

export class PacketLifecycleTracker {
    constructor(
        private readonly queries: ChainStateQueries,
        private readonly engine: VerifiedQueryEngine
    ) {}

    public async channelSequences(
        chain: Chain,
        portId: string,
        channelId: string,
        height: QueryHeight = LATEST
    ): Promise<Result<ChannelSequences, RelayerError>> {
        const send = await this.queries.nextSequenceSend(chain, portId, channelId, height);
        if (!send.ok) {
            return send;
        }
        // Pin the remaining counters to the height the first one was proven at
        const at = send.value.height;
        const recv = await this.queries.nextSequenceRecv(chain, portId, channelId, at);
        if (!recv.ok) {
            return recv;
        }
        const ack = await this.queries.nextSequenceAck(chain, portId, channelId, at);
        if (!ack.ok) {
            return ack;
        }
        return ok({
            nextSequenceSend: send.value.value,
            nextSequenceRecv: recv.value.value,
            nextSequenceAck: ack.value.value
        });
    }

    /**
     * Looks up the send event of `sequence` and classifies the packet.
     */
    public async packetStatus(path: PacketRelayPath, sequence: number): Promise<Result<PacketStatus | null, RelayerError>> {
        const events = await this.engine.queryUnverified(
            path.source,
            provider => provider.querySendPacketEvents(path.portId, path.channelId, [sequence]),
            'send_packet events'
        );
        if (!events.ok) {
            return events;
        }
        const event = events.value.find(candidate => candidate.packet.sequence === sequence);
        if (!event) {
            return ok(null);
        }
        return this.classify(path, event);
    }

    public async classify(path: PacketRelayPath, event: SendPacketEvent): Promise<Result<PacketStatus, RelayerError>> {
        const { source, destination } = path;
        const { packet } = event;

        const commitment = await this.queries.packetCommitment(
            source, packet.sourcePort, packet.sourceChannel, packet.sequence, LATEST
        );
        if (!commitment.ok) {
            return commitment;
        }

        const clock = await this.queries.currentClock(destination);
        if (!clock.ok) {
            return clock;
        }
        const destinationHeight = clock.value.height;

        if (commitment.value.value === null) {
            return ok(this.status(packet, 'NoActionNeeded', {
                commitmentPresent: false, received: false, acknowledgement: null, clientCaughtUp: true, destinationHeight
            }));
        }
        if (commitment.value.value !== packetCommitment(packet)) {
            return err({
                kind: 'PacketMismatch',
                chainId: source.chainId,
                sequence: packet.sequence,
                reason: 'send event does not match the stored packet commitment'
            });
        }

        const channel = await this.queries.channel(
            destination, packet.destinationPort, packet.destinationChannel, destinationHeight
        );
        if (!channel.ok) {
            return channel;
        }

        const caughtUp = await this.clientCaughtUp(destination, channel.value.value.connectionHops[0], event.height, destinationHeight);
        if (!caughtUp.ok) {
            return caughtUp;
        }

        const received = channel.value.value.ordering === 'ORDERED'
            ? await this.receivedOrdered(destination, packet, destinationHeight)
            : await this.receivedUnordered(destination, packet, destinationHeight);
        if (!received.ok) {
            return received;
        }

        const details = { commitmentPresent: true, clientCaughtUp: caughtUp.value, destinationHeight };

        if (received.value) {
            const ack = await this.queries.packetAcknowledgement(
                destination, packet.destinationPort, packet.destinationChannel, packet.sequence, destinationHeight
            );
            if (!ack.ok) {
                return ack;
            }
            const action: PacketAction = ack.value.value === null ? 'NoActionNeeded' : 'NeedsAck';
            return ok(this.status(packet, action, { ...details, received: true, acknowledgement: ack.value.value }));
        }

        const action: PacketAction = hasTimedOut(packet, destinationHeight, clock.value.timestampNs) ? 'NeedsTimeout' : 'NeedsRecv';
        return ok(this.status(packet, action, { ...details, received: false, acknowledgement: null }));
    }

    private status(packet: Packet, action: PacketAction, details: Omit<PacketStatus, 'sequence' | 'action'>): PacketStatus {
        logger.debug(`[PacketLifecycleTracker] ${packet.sourcePort}/${packet.sourceChannel}/${packet.sequence}: ${action}`, details);
        return { sequence: packet.sequence, action, ...details };
    }

    private async receivedOrdered(destination: Chain, packet: Packet, height: Height): Promise<Result<boolean, RelayerError>> {
        const nextRecv = await this.queries.nextSequenceRecv(destination, packet.destinationPort, packet.destinationChannel, height);
        return nextRecv.ok ? ok(nextRecv.value.value > packet.sequence) : nextRecv;
    }

    private async receivedUnordered(destination: Chain, packet: Packet, height: Height): Promise<Result<boolean, RelayerError>> {
        const receipt = await this.queries.packetReceipt(
            destination, packet.destinationPort, packet.destinationChannel, packet.sequence, height
        );
        return receipt.ok ? ok(receipt.value.value) : receipt;
    }

    private async clientCaughtUp(
        destination: Chain,
        connectionId: string,
        packetHeight: Height,
        height: Height
    ): Promise<Result<boolean, RelayerError>> {
        const connection = await this.queries.connection(destination, connectionId, height);
        if (!connection.ok) {
            return connection;
        }
        const client = await this.queries.clientState(destination, connection.value.value.clientId, height);
        if (!client.ok) {
            return client;
        }
        return ok(compareHeights(client.value.value.latestHeight, packetHeight) >= 0);
    }
}
