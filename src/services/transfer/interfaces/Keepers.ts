import type { Result } from '../../../types/result';
import type {
    CapabilityError,
    ChannelNotFoundError,
    InsufficientFundsError
} from '../../../types/errors';
import type { ChannelEnd, Height, Packet } from '../../../types/ibc';
import type { DenomTrace } from '../denom/DenomTrace';
import type { Acknowledgement, FungibleTokenPacketData } from '../types/TransferTypes';

/**
 * Host chain capabilities the transfer module depends on. Each concern is a
 * separate interface so a host can supply them from different subsystems.
 */

export interface Coin {
    denom: string;
    amount: bigint;
}

export interface BankKeeper {
    getBalance(address: string, denom: string): Promise<bigint>;
    sendCoins(from: string, to: string, coin: Coin): Promise<Result<void, InsufficientFundsError>>;
    /** Mints into a module account. */
    mintCoins(moduleAddress: string, coin: Coin): Promise<void>;
    /** Burns from a module account. */
    burnCoins(moduleAddress: string, coin: Coin): Promise<Result<void, InsufficientFundsError>>;
}

export interface AccountKeeper {
    getModuleAddress(moduleName: string): string;
}

/** Object capability handed out by the host; only its holder may use the named resource. */
export interface Capability {
    readonly index: number;
}

export interface PortKeeper {
    bindPort(portId: string): Promise<Result<Capability, CapabilityError>>;
    claimCapability(capability: Capability, name: string): Promise<Result<void, CapabilityError>>;
    getCapability(name: string): Promise<Capability | null>;
    authenticateCapability(capability: Capability, name: string): Promise<boolean>;
}

export interface OutgoingPacket {
    sourcePort: string;
    sourceChannel: string;
    /** Base64 encoded payload. */
    data: string;
    timeoutHeight: Height;
    timeoutTimestamp: string;
}

export interface ChannelKeeper {
    getChannel(portId: string, channelId: string): Promise<ChannelEnd | null>;
    /**
     * Allocates the next sequence of the channel, stores the packet commitment
     * and returns the packet.
     */
    sendPacket(
        capability: Capability,
        packet: OutgoingPacket
    ): Promise<Result<Packet, CapabilityError | ChannelNotFoundError>>;
}

export interface TransferParams {
    isSendEnabled(): boolean;
    isReceiveEnabled(): boolean;
    setSendEnabled(enabled: boolean): void;
    setReceiveEnabled(enabled: boolean): void;
}

export type SentPacketState = 'Sent' | 'AcknowledgedSuccess' | 'AcknowledgedError' | 'TimedOut';

export interface SentPacketRecord {
    state: SentPacketState;
    data: FungibleTokenPacketData;
}

export interface PacketKey {
    portId: string;
    channelId: string;
    sequence: number;
}

export interface PacketStateStore {
    getSent(key: PacketKey): Promise<SentPacketRecord | null>;
    setSent(key: PacketKey, record: SentPacketRecord): Promise<void>;
    getAcknowledgement(key: PacketKey): Promise<Acknowledgement | null>;
    /** Write-once; resolves to the acknowledgement stored first. */
    writeAcknowledgement(key: PacketKey, acknowledgement: Acknowledgement): Promise<Acknowledgement>;
}

export interface DenomTraceStore {
    getTrace(hash: string): Promise<DenomTrace | null>;
    setTrace(trace: DenomTrace): Promise<void>;
}

/**
 * Runs `work` as one unit: its writes are kept when it resolves to ok and
 * discarded when it resolves to an error or throws.
 */
export interface StateTransaction {
    atomically<T, E>(work: () => Promise<Result<T, E>>): Promise<Result<T, E>>;
}

export function channelCapabilityName(portId: string, channelId: string): string {
    return `capabilities/ports/${portId}/channels/${channelId}`;
}

export function portCapabilityName(portId: string): string {
    return `ports/${portId}`;
}
