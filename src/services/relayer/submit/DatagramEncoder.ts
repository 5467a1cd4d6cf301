import { Any } from 'cosmjs-types/google/protobuf/any';
import { MsgUpdateClient } from 'cosmjs-types/ibc/core/client/v1/tx';
import { Channel, Order, Packet as ProtoPacket, State } from 'cosmjs-types/ibc/core/channel/v1/channel';
import {
    MsgAcknowledgement,
    MsgChannelCloseConfirm,
    MsgChannelOpenAck,
    MsgChannelOpenConfirm,
    MsgChannelOpenTry,
    MsgRecvPacket,
    MsgTimeout
} from 'cosmjs-types/ibc/core/channel/v1/tx';
import { Counterparty, Version } from 'cosmjs-types/ibc/core/connection/v1/connection';
import {
    MsgConnectionOpenAck,
    MsgConnectionOpenConfirm,
    MsgConnectionOpenTry
} from 'cosmjs-types/ibc/core/connection/v1/tx';
import type { EncodeObject } from '@cosmjs/proto-signing';
import type { Height as ProtoHeight } from 'cosmjs-types/ibc/core/client/v1/client';
import type { CommitmentProof } from '../../../crypto/commitment-tree';
import type { ClientState, Height, Packet } from '../../../types/ibc';
import type { Datagram } from '../datagram/types';

export const TENDERMINT_HEADER_TYPE_URL = '/ibc.lightclients.tendermint.v1.Header';
export const CLIENT_STATE_TYPE_URL = '/ibc.lightclients.tendermint.v1.ClientState';
export const COMMITMENT_PREFIX = 'ibc';

const CONNECTION_FEATURES = ['ORDER_ORDERED', 'ORDER_UNORDERED'];

function toProtoHeight(height: Height): ProtoHeight {
    return { revisionNumber: BigInt(height.revisionNumber), revisionHeight: BigInt(height.revisionHeight) };
}

function toProtoPacket(packet: Packet): ProtoPacket {
    return ProtoPacket.fromPartial({
        sequence: BigInt(packet.sequence),
        sourcePort: packet.sourcePort,
        sourceChannel: packet.sourceChannel,
        destinationPort: packet.destinationPort,
        destinationChannel: packet.destinationChannel,
        data: new Uint8Array(Buffer.from(packet.data, 'base64')),
        timeoutHeight: toProtoHeight(packet.timeoutHeight),
        timeoutTimestamp: BigInt(packet.timeoutTimestamp)
    });
}

/** Proofs travel as the UTF-8 JSON of the commitment proof. */
export function encodeProof(proof: CommitmentProof): Uint8Array {
    return new Uint8Array(Buffer.from(JSON.stringify(proof), 'utf8'));
}

function encodeClientState(clientState: ClientState): Any {
    return Any.fromPartial({
        typeUrl: CLIENT_STATE_TYPE_URL,
        value: new Uint8Array(Buffer.from(JSON.stringify(clientState), 'utf8'))
    });
}

function toVersion(identifier: string): Version {
    return Version.fromPartial({ identifier, features: CONNECTION_FEATURES });
}

/**
 * Maps a datagram to the cosmos-sdk message the target chain executes.
 */
export function encodeDatagram(datagram: Datagram, signer: string): EncodeObject {
    switch (datagram.type) {
        case 'UpdateClient':
            return {
                typeUrl: '/ibc.core.client.v1.MsgUpdateClient',
                value: MsgUpdateClient.fromPartial({
                    clientId: datagram.clientId,
                    clientMessage: Any.fromPartial({
                        typeUrl: TENDERMINT_HEADER_TYPE_URL,
                        value: new Uint8Array(Buffer.from(datagram.header, 'base64'))
                    }),
                    signer
                })
            };
        case 'RecvPacket':
            return {
                typeUrl: '/ibc.core.channel.v1.MsgRecvPacket',
                value: MsgRecvPacket.fromPartial({
                    packet: toProtoPacket(datagram.packet),
                    proofCommitment: encodeProof(datagram.proofCommitment),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    signer
                })
            };
        case 'Acknowledgement':
            return {
                typeUrl: '/ibc.core.channel.v1.MsgAcknowledgement',
                value: MsgAcknowledgement.fromPartial({
                    packet: toProtoPacket(datagram.packet),
                    acknowledgement: new Uint8Array(Buffer.from(datagram.acknowledgement, 'base64')),
                    proofAcked: encodeProof(datagram.proofAcked),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    signer
                })
            };
        case 'Timeout':
            return {
                typeUrl: '/ibc.core.channel.v1.MsgTimeout',
                value: MsgTimeout.fromPartial({
                    packet: toProtoPacket(datagram.packet),
                    proofUnreceived: encodeProof(datagram.proofUnreceived),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    nextSequenceRecv: BigInt(datagram.nextSequenceRecv),
                    signer
                })
            };
        case 'ChannelOpenTry':
            return {
                typeUrl: '/ibc.core.channel.v1.MsgChannelOpenTry',
                value: MsgChannelOpenTry.fromPartial({
                    portId: datagram.portId,
                    channel: Channel.fromPartial({
                        state: State.STATE_TRYOPEN,
                        ordering: datagram.ordering === 'ORDERED' ? Order.ORDER_ORDERED : Order.ORDER_UNORDERED,
                        counterparty: { portId: datagram.counterpartyPortId, channelId: datagram.counterpartyChannelId },
                        connectionHops: datagram.connectionHops,
                        version: datagram.version
                    }),
                    counterpartyVersion: datagram.counterpartyVersion,
                    proofInit: encodeProof(datagram.proofInit),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    signer
                })
            };
        case 'ChannelOpenAck':
            return {
                typeUrl: '/ibc.core.channel.v1.MsgChannelOpenAck',
                value: MsgChannelOpenAck.fromPartial({
                    portId: datagram.portId,
                    channelId: datagram.channelId,
                    counterpartyChannelId: datagram.counterpartyChannelId,
                    counterpartyVersion: datagram.counterpartyVersion,
                    proofTry: encodeProof(datagram.proofTry),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    signer
                })
            };
        case 'ChannelOpenConfirm':
            return {
                typeUrl: '/ibc.core.channel.v1.MsgChannelOpenConfirm',
                value: MsgChannelOpenConfirm.fromPartial({
                    portId: datagram.portId,
                    channelId: datagram.channelId,
                    proofAck: encodeProof(datagram.proofAck),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    signer
                })
            };
        case 'ChannelCloseConfirm':
            return {
                typeUrl: '/ibc.core.channel.v1.MsgChannelCloseConfirm',
                value: MsgChannelCloseConfirm.fromPartial({
                    portId: datagram.portId,
                    channelId: datagram.channelId,
                    proofInit: encodeProof(datagram.proofInit),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    signer
                })
            };
        case 'ConnectionOpenTry':
            return {
                typeUrl: '/ibc.core.connection.v1.MsgConnectionOpenTry',
                value: MsgConnectionOpenTry.fromPartial({
                    clientId: datagram.clientId,
                    clientState: encodeClientState(datagram.clientState),
                    counterparty: Counterparty.fromPartial({
                        clientId: datagram.counterpartyClientId,
                        connectionId: datagram.counterpartyConnectionId,
                        prefix: { keyPrefix: new Uint8Array(Buffer.from(COMMITMENT_PREFIX, 'utf8')) }
                    }),
                    delayPeriod: BigInt(datagram.delayPeriod),
                    counterpartyVersions: datagram.versions.map(toVersion),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    proofInit: encodeProof(datagram.proofInit),
                    proofClient: encodeProof(datagram.proofClient),
                    proofConsensus: encodeProof(datagram.proofConsensus),
                    consensusHeight: toProtoHeight(datagram.consensusHeight),
                    signer
                })
            };
        case 'ConnectionOpenAck':
            return {
                typeUrl: '/ibc.core.connection.v1.MsgConnectionOpenAck',
                value: MsgConnectionOpenAck.fromPartial({
                    connectionId: datagram.connectionId,
                    counterpartyConnectionId: datagram.counterpartyConnectionId,
                    version: toVersion(datagram.version),
                    clientState: encodeClientState(datagram.clientState),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    proofTry: encodeProof(datagram.proofTry),
                    proofClient: encodeProof(datagram.proofClient),
                    proofConsensus: encodeProof(datagram.proofConsensus),
                    consensusHeight: toProtoHeight(datagram.consensusHeight),
                    signer
                })
            };
        case 'ConnectionOpenConfirm':
            return {
                typeUrl: '/ibc.core.connection.v1.MsgConnectionOpenConfirm',
                value: MsgConnectionOpenConfirm.fromPartial({
                    connectionId: datagram.connectionId,
                    proofAck: encodeProof(datagram.proofAck),
                    proofHeight: toProtoHeight(datagram.proofHeight),
                    signer
                })
            };
    }
}
