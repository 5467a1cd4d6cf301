import type { CommitmentProof, MembershipProof, NeighbourLeaf } from '../crypto/commitment-tree';
import type { ChannelEnd, ClientState, ConnectionEnd, ConsensusState, Height, Packet } from '../types/ibc';

/**
 * Proven value as returned by a provider, before verification.
 * `value` is base64 encoded; null means the provider claims absence.
 */
export interface RawProvenValue {
    value: string | null;
    proof: CommitmentProof;
}

export interface ChainStatus {
    height: number;
    timestamp: Date;
}

export interface SendPacketEvent {
    height: Height;
    packet: Packet;
}

export interface WriteAcknowledgementEvent {
    height: Height;
    packet: Packet;
    /** Base64 encoded acknowledgement bytes. */
    acknowledgement: string;
}

/**
 * A network endpoint through which one chain's state is read. Nothing it returns
 * is trusted: proven lookups resolve to `unknown` and are validated and verified
 * by the query engine, and any thrown error is treated as a provider fault.
 */
export interface ChainProvider {
    readonly endpoint: string;

    getStatus(): Promise<ChainStatus>;

    queryChannel(portId: string, channelId: string, height: number): Promise<unknown>;
    queryConnection(connectionId: string, height: number): Promise<unknown>;
    queryClientState(clientId: string, height: number): Promise<unknown>;
    queryConsensusState(clientId: string, consensusHeight: Height, height: number): Promise<unknown>;
    queryPacketCommitment(portId: string, channelId: string, sequence: number, height: number): Promise<unknown>;
    queryPacketReceipt(portId: string, channelId: string, sequence: number, height: number): Promise<unknown>;
    queryPacketAcknowledgement(portId: string, channelId: string, sequence: number, height: number): Promise<unknown>;
    queryNextSequenceSend(portId: string, channelId: string, height: number): Promise<unknown>;
    queryNextSequenceRecv(portId: string, channelId: string, height: number): Promise<unknown>;
    queryNextSequenceAck(portId: string, channelId: string, height: number): Promise<unknown>;

    querySendPacketEvents(portId: string, channelId: string, sequences: number[]): Promise<SendPacketEvent[]>;
    queryWriteAcknowledgementEvents(portId: string, channelId: string, sequences: number[]): Promise<WriteAcknowledgementEvent[]>;
}

export class MalformedResponseError extends Error {
    constructor(endpoint: string, what: string) {
        super(`Malformed ${what} from ${endpoint}`);
        this.name = 'MalformedResponseError';
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isMembershipProof(value: unknown): value is MembershipProof {
    return isRecord(value)
        && value.type === 'membership'
        && typeof value.leafIndex === 'number'
        && typeof value.leafCount === 'number'
        && isStringArray(value.siblings);
}

function isNeighbour(value: unknown): value is NeighbourLeaf {
    return isRecord(value)
        && typeof value.path === 'string'
        && typeof value.valueHash === 'string'
        && isMembershipProof(value.proof);
}

export function isCommitmentProof(value: unknown): value is CommitmentProof {
    if (isMembershipProof(value)) {
        return true;
    }
    return isRecord(value)
        && value.type === 'non-membership'
        && typeof value.leafCount === 'number'
        && (value.left === undefined || isNeighbour(value.left))
        && (value.right === undefined || isNeighbour(value.right));
}

export function parseProvenValue(raw: unknown): RawProvenValue | null {
    if (!isRecord(raw) || !isCommitmentProof(raw.proof)) {
        return null;
    }
    if (raw.value !== null && typeof raw.value !== 'string') {
        return null;
    }
    return { value: raw.value, proof: raw.proof };
}

export function isHeight(value: unknown): value is Height {
    return isRecord(value)
        && Number.isInteger(value.revisionNumber)
        && Number.isInteger(value.revisionHeight);
}

export function isPacket(value: unknown): value is Packet {
    return isRecord(value)
        && Number.isInteger(value.sequence)
        && typeof value.sourcePort === 'string'
        && typeof value.sourceChannel === 'string'
        && typeof value.destinationPort === 'string'
        && typeof value.destinationChannel === 'string'
        && typeof value.data === 'string'
        && isHeight(value.timeoutHeight)
        && typeof value.timeoutTimestamp === 'string'
        && /^\d+$/.test(value.timeoutTimestamp);
}

export function isSendPacketEvent(value: unknown): value is SendPacketEvent {
    return isRecord(value) && isHeight(value.height) && isPacket(value.packet);
}

export function isWriteAcknowledgementEvent(value: unknown): value is WriteAcknowledgementEvent {
    return isRecord(value) && typeof value.acknowledgement === 'string' && isSendPacketEvent(value);
}

const CHANNEL_STATES: readonly string[] = ['INIT', 'TRYOPEN', 'OPEN', 'CLOSED'];
const CONNECTION_STATES: readonly string[] = ['INIT', 'TRYOPEN', 'OPEN'];

export function isChannelEnd(value: unknown): value is ChannelEnd {
    return isRecord(value)
        && typeof value.state === 'string' && CHANNEL_STATES.includes(value.state)
        && (value.ordering === 'ORDERED' || value.ordering === 'UNORDERED')
        && isRecord(value.counterparty)
        && typeof value.counterparty.portId === 'string'
        && (value.counterparty.channelId === undefined || typeof value.counterparty.channelId === 'string')
        && isStringArray(value.connectionHops) && value.connectionHops.length > 0
        && typeof value.version === 'string';
}

export function isConnectionEnd(value: unknown): value is ConnectionEnd {
    return isRecord(value)
        && typeof value.state === 'string' && CONNECTION_STATES.includes(value.state)
        && typeof value.clientId === 'string'
        && isRecord(value.counterparty)
        && typeof value.counterparty.clientId === 'string'
        && (value.counterparty.connectionId === undefined || typeof value.counterparty.connectionId === 'string')
        && typeof value.counterparty.prefix === 'string'
        && isStringArray(value.versions)
        && Number.isInteger(value.delayPeriod);
}

export function isClientState(value: unknown): value is ClientState {
    return isRecord(value)
        && typeof value.chainId === 'string'
        && isHeight(value.latestHeight)
        && (value.frozenHeight === undefined || isHeight(value.frozenHeight))
        && typeof value.trustingPeriodMs === 'number'
        && isRecord(value.trustLevel)
        && Number.isInteger(value.trustLevel.numerator)
        && Number.isInteger(value.trustLevel.denominator);
}

export function isConsensusState(value: unknown): value is ConsensusState {
    return isRecord(value)
        && typeof value.timestamp === 'string' && /^\d+$/.test(value.timestamp)
        && typeof value.root === 'string'
        && typeof value.nextValidatorsHash === 'string';
}
