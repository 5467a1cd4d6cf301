import type { CommitmentProof } from '../../../crypto/commitment-tree';
import type { ChannelOrder, ClientState, Height, Packet } from '../../../types/ibc';

// Events observed on the chain a datagram's proofs are read from

export interface SendPacketRelayEvent {
    type: 'SendPacket';
    height: Height;
    packet: Packet;
}

export interface WriteAcknowledgementRelayEvent {
    type: 'WriteAcknowledgement';
    height: Height;
    packet: Packet;
    /** Base64 encoded acknowledgement bytes. */
    acknowledgement: string;
}

/** A packet that timed out on the chain the proofs are read from. */
export interface TimeoutConditionEvent {
    type: 'TimeoutCondition';
    height: Height;
    packet: Packet;
}

export interface ChannelHandshakeEvent {
    type: 'ChannelOpenInit' | 'ChannelOpenTry' | 'ChannelOpenAck' | 'ChannelCloseInit';
    height: Height;
    portId: string;
    channelId: string;
    counterpartyPortId: string;
    counterpartyChannelId?: string;
}

export interface ConnectionHandshakeEvent {
    type: 'ConnectionOpenInit' | 'ConnectionOpenTry' | 'ConnectionOpenAck';
    height: Height;
    connectionId: string;
    clientId: string;
    counterpartyClientId: string;
    counterpartyConnectionId?: string;
}

export type RelayEvent =
    | SendPacketRelayEvent
    | WriteAcknowledgementRelayEvent
    | TimeoutConditionEvent
    | ChannelHandshakeEvent
    | ConnectionHandshakeEvent;

// Datagrams submitted to the target chain

export interface UpdateClientDatagram {
    type: 'UpdateClient';
    clientId: string;
    height: Height;
    /** Base64 encoded signed header. */
    header: string;
}

export interface RecvPacketDatagram {
    type: 'RecvPacket';
    packet: Packet;
    proofCommitment: CommitmentProof;
    proofHeight: Height;
}

export interface AcknowledgementDatagram {
    type: 'Acknowledgement';
    packet: Packet;
    acknowledgement: string;
    proofAcked: CommitmentProof;
    proofHeight: Height;
}

export interface TimeoutDatagram {
    type: 'Timeout';
    packet: Packet;
    /** Receipt absence for unordered channels, the receive counter for ordered ones. */
    proofUnreceived: CommitmentProof;
    proofHeight: Height;
    nextSequenceRecv: number;
}

export interface ChannelOpenTryDatagram {
    type: 'ChannelOpenTry';
    portId: string;
    ordering: ChannelOrder;
    connectionHops: string[];
    counterpartyPortId: string;
    counterpartyChannelId: string;
    version: string;
    counterpartyVersion: string;
    proofInit: CommitmentProof;
    proofHeight: Height;
}

export interface ChannelOpenAckDatagram {
    type: 'ChannelOpenAck';
    portId: string;
    channelId: string;
    counterpartyChannelId: string;
    counterpartyVersion: string;
    proofTry: CommitmentProof;
    proofHeight: Height;
}

export interface ChannelOpenConfirmDatagram {
    type: 'ChannelOpenConfirm';
    portId: string;
    channelId: string;
    proofAck: CommitmentProof;
    proofHeight: Height;
}

export interface ChannelCloseConfirmDatagram {
    type: 'ChannelCloseConfirm';
    portId: string;
    channelId: string;
    proofInit: CommitmentProof;
    proofHeight: Height;
}

export interface ConnectionOpenTryDatagram {
    type: 'ConnectionOpenTry';
    clientId: string;
    counterpartyClientId: string;
    counterpartyConnectionId: string;
    clientState: ClientState;
    versions: string[];
    delayPeriod: number;
    proofInit: CommitmentProof;
    proofClient: CommitmentProof;
    proofConsensus: CommitmentProof;
    proofHeight: Height;
    consensusHeight: Height;
}

export interface ConnectionOpenAckDatagram {
    type: 'ConnectionOpenAck';
    connectionId: string;
    counterpartyConnectionId: string;
    version: string;
    clientState: ClientState;
    proofTry: CommitmentProof;
    proofClient: CommitmentProof;
    proofConsensus: CommitmentProof;
    proofHeight: Height;
    consensusHeight: Height;
}

export interface ConnectionOpenConfirmDatagram {
    type: 'ConnectionOpenConfirm';
    connectionId: string;
    proofAck: CommitmentProof;
    proofHeight: Height;
}

export type PacketDatagram = RecvPacketDatagram | AcknowledgementDatagram | TimeoutDatagram;

export type HandshakeDatagram =
    | ChannelOpenTryDatagram
    | ChannelOpenAckDatagram
    | ChannelOpenConfirmDatagram
    | ChannelCloseConfirmDatagram
    | ConnectionOpenTryDatagram
    | ConnectionOpenAckDatagram
    | ConnectionOpenConfirmDatagram;

export type Datagram = UpdateClientDatagram | PacketDatagram | HandshakeDatagram;

export type DatagramType = Datagram['type'];
