import { createHash } from 'crypto';

export interface Height {
    revisionNumber: number;
    revisionHeight: number;
}

export const ZERO_HEIGHT: Height = { revisionNumber: 0, revisionHeight: 0 };

/** Sentinel asking a query to read and prove at the chain's current height. */
export const LATEST = 'latest' as const;
export type QueryHeight = Height | typeof LATEST;

export function compareHeights(a: Height, b: Height): number {
    if (a.revisionNumber !== b.revisionNumber) {
        return a.revisionNumber - b.revisionNumber;
    }
    return a.revisionHeight - b.revisionHeight;
}

export function isZeroHeight(height: Height): boolean {
    return height.revisionNumber === 0 && height.revisionHeight === 0;
}

export function formatHeight(height: Height): string {
    return `${height.revisionNumber}-${height.revisionHeight}`;
}

/**
 * Revision number encoded in a chain id of the form `{name}-{revision}`.
 */
export function revisionFromChainId(chainId: string): number {
    const match = /^.+[^-]-(\d+)$/.exec(chainId);
    return match ? Number(match[1]) : 0;
}

export type ChannelState = 'INIT' | 'TRYOPEN' | 'OPEN' | 'CLOSED';
export type ChannelOrder = 'ORDERED' | 'UNORDERED';
export type ConnectionState = 'INIT' | 'TRYOPEN' | 'OPEN';

export interface ChannelCounterparty {
    portId: string;
    channelId?: string;
}

export interface ChannelEnd {
    state: ChannelState;
    ordering: ChannelOrder;
    counterparty: ChannelCounterparty;
    connectionHops: string[];
    version: string;
}

export interface ConnectionCounterparty {
    clientId: string;
    connectionId?: string;
    prefix: string;
}

export interface ConnectionEnd {
    state: ConnectionState;
    clientId: string;
    counterparty: ConnectionCounterparty;
    versions: string[];
    delayPeriod: number;
}

export interface ClientState {
    chainId: string;
    latestHeight: Height;
    /** Set once misbehaviour is proven; never cleared. */
    frozenHeight?: Height;
    trustingPeriodMs: number;
    trustLevel: { numerator: number; denominator: number };
}

export interface ConsensusState {
    /** Block time in nanoseconds since the epoch. */
    timestamp: string;
    root: string;
    nextValidatorsHash: string;
}

export interface Packet {
    sequence: number;
    sourcePort: string;
    sourceChannel: string;
    destinationPort: string;
    destinationChannel: string;
    /** Base64 encoded opaque payload. */
    data: string;
    timeoutHeight: Height;
    /** Nanoseconds since the epoch; "0" disables the timestamp timeout. */
    timeoutTimestamp: string;
}

export interface ChannelSequences {
    nextSequenceSend: number;
    nextSequenceRecv: number;
    nextSequenceAck: number;
}

function sha256Hex(input: string | Buffer): string {
    return createHash('sha256').update(input).digest('hex');
}

/**
 * Value a source chain stores under the packet commitment path.
 */
export function packetCommitment(packet: Packet): string {
    const dataHash = sha256Hex(Buffer.from(packet.data, 'base64'));
    return sha256Hex(`${packet.timeoutTimestamp}|${formatHeight(packet.timeoutHeight)}|${dataHash}`);
}

/**
 * Value a destination chain stores under the acknowledgement path.
 */
export function acknowledgementCommitment(acknowledgement: string): string {
    return sha256Hex(Buffer.from(acknowledgement, 'base64'));
}

export function hasTimedOut(packet: Packet, height: Height, timestampNs: bigint): boolean {
    if (!isZeroHeight(packet.timeoutHeight) && compareHeights(height, packet.timeoutHeight) >= 0) {
        return true;
    }
    const timeoutTimestamp = BigInt(packet.timeoutTimestamp);
    return timeoutTimestamp !== BigInt(0) && timestampNs >= timeoutTimestamp;
}
