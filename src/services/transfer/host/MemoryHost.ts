import { createHash } from 'crypto';
import { Mutex } from 'async-mutex';
import { bech32 } from 'bech32';
import { logger } from '../../../utils/logger';
import { err, ok } from '../../../types/result';
import { packetCommitment } from '../../../types/ibc';
import { denomTraceHash } from '../denom/DenomTrace';
import { channelCapabilityName, portCapabilityName } from '../interfaces/Keepers';
import { TRANSFER_VERSION } from '../types/TransferTypes';
import type { Result } from '../../../types/result';
import type { CapabilityError, ChannelNotFoundError, InsufficientFundsError } from '../../../types/errors';
import type { ChannelCounterparty, ChannelEnd, ChannelOrder, Packet } from '../../../types/ibc';
import type { DenomTrace } from '../denom/DenomTrace';
import type { Acknowledgement } from '../types/TransferTypes';
import type {
    AccountKeeper,
    BankKeeper,
    Capability,
    ChannelKeeper,
    Coin,
    DenomTraceStore,
    OutgoingPacket,
    PacketKey,
    PacketStateStore,
    PortKeeper,
    SentPacketRecord,
    StateTransaction,
    TransferParams
} from '../interfaces/Keepers';

interface ChannelRecord {
    end: ChannelEnd;
    nextSequenceSend: number;
}

interface HostState {
    balances: Map<string, Map<string, bigint>>;
    supply: Map<string, bigint>;
    capabilities: Map<string, number>;
    claimed: Set<string>;
    nextCapabilityIndex: number;
    channels: Map<string, ChannelRecord>;
    commitments: Map<string, string>;
    sent: Map<string, SentPacketRecord>;
    acknowledgements: Map<string, Acknowledgement>;
    traces: Map<string, DenomTrace>;
    sendEnabled: boolean;
    receiveEnabled: boolean;
}

function emptyState(): HostState {
    return {
        balances: new Map(),
        supply: new Map(),
        capabilities: new Map(),
        claimed: new Set(),
        nextCapabilityIndex: 1,
        channels: new Map(),
        commitments: new Map(),
        sent: new Map(),
        acknowledgements: new Map(),
        traces: new Map(),
        sendEnabled: true,
        receiveEnabled: true
    };
}

function channelKey(portId: string, channelId: string): string {
    return `${portId}/${channelId}`;
}

function packetKey(key: PacketKey): string {
    return `${key.portId}/${key.channelId}/${key.sequence}`;
}

export interface MemoryHostOptions {
    chainId: string;
    addressPrefix: string;
}

/**
 * In-process host chain state implementing every capability the transfer
 * module needs. Transactions snapshot the whole state and restore it when the
 * work fails; the mutex serialises transactions.
 */
export class MemoryHost implements BankKeeper, AccountKeeper, PortKeeper, ChannelKeeper, TransferParams,
    PacketStateStore, DenomTraceStore, StateTransaction {
    private state: HostState = emptyState();
    private readonly mutex = new Mutex();

    constructor(public readonly options: MemoryHostOptions) {}

    public async atomically<T, E>(work: () => Promise<Result<T, E>>): Promise<Result<T, E>> {
        return this.mutex.runExclusive(async () => {
            const snapshot = structuredClone(this.state);
            try {
                const result = await work();
                if (!result.ok) {
                    this.state = snapshot;
                }
                return result;
            } catch (error) {
                this.state = snapshot;
                throw error;
            }
        });
    }

    // Accounts

    public getModuleAddress(moduleName: string): string {
        const hash = createHash('sha256').update(`module/${moduleName}`).digest().subarray(0, 20);
        return bech32.encode(this.options.addressPrefix, bech32.toWords(hash));
    }

    // Bank

    public async getBalance(address: string, denom: string): Promise<bigint> {
        return this.state.balances.get(address)?.get(denom) ?? BigInt(0);
    }

    private adjust(address: string, denom: string, delta: bigint): void {
        const balances = this.state.balances.get(address) ?? new Map<string, bigint>();
        const next = (balances.get(denom) ?? BigInt(0)) + delta;
        if (next === BigInt(0)) {
            balances.delete(denom);
        } else {
            balances.set(denom, next);
        }
        this.state.balances.set(address, balances);
    }

    private async ensureFunds(address: string, coin: Coin): Promise<Result<void, InsufficientFundsError>> {
        const available = await this.getBalance(address, coin.denom);
        if (available < coin.amount) {
            return err({ kind: 'InsufficientFunds', address, denom: coin.denom, available, required: coin.amount });
        }
        return ok(undefined);
    }

    public async sendCoins(from: string, to: string, coin: Coin): Promise<Result<void, InsufficientFundsError>> {
        const funded = await this.ensureFunds(from, coin);
        if (!funded.ok) {
            return funded;
        }
        this.adjust(from, coin.denom, -coin.amount);
        this.adjust(to, coin.denom, coin.amount);
        return ok(undefined);
    }

    public async mintCoins(moduleAddress: string, coin: Coin): Promise<void> {
        this.adjust(moduleAddress, coin.denom, coin.amount);
        this.state.supply.set(coin.denom, (this.state.supply.get(coin.denom) ?? BigInt(0)) + coin.amount);
    }

    public async burnCoins(moduleAddress: string, coin: Coin): Promise<Result<void, InsufficientFundsError>> {
        const funded = await this.ensureFunds(moduleAddress, coin);
        if (!funded.ok) {
            return funded;
        }
        this.adjust(moduleAddress, coin.denom, -coin.amount);
        this.state.supply.set(coin.denom, (this.state.supply.get(coin.denom) ?? BigInt(0)) - coin.amount);
        return ok(undefined);
    }

    /** Credits genesis funds outside any transaction. */
    public fund(address: string, coin: Coin): void {
        this.adjust(address, coin.denom, coin.amount);
        this.state.supply.set(coin.denom, (this.state.supply.get(coin.denom) ?? BigInt(0)) + coin.amount);
    }

    public totalSupply(denom: string): bigint {
        return this.state.supply.get(denom) ?? BigInt(0);
    }

    // Capabilities

    private newCapability(name: string): Capability {
        const index = this.state.nextCapabilityIndex++;
        this.state.capabilities.set(name, index);
        return { index };
    }

    public async bindPort(portId: string): Promise<Result<Capability, CapabilityError>> {
        const name = portCapabilityName(portId);
        if (this.state.capabilities.has(name)) {
            return err({ kind: 'Capability', reason: `port ${portId} is already bound` });
        }
        return ok(this.newCapability(name));
    }

    public async claimCapability(capability: Capability, name: string): Promise<Result<void, CapabilityError>> {
        if (this.state.capabilities.get(name) !== capability.index) {
            return err({ kind: 'Capability', reason: `capability ${capability.index} is not ${name}` });
        }
        if (this.state.claimed.has(name)) {
            return err({ kind: 'Capability', reason: `${name} is already claimed` });
        }
        this.state.claimed.add(name);
        return ok(undefined);
    }

    public async getCapability(name: string): Promise<Capability | null> {
        const index = this.state.capabilities.get(name);
        return index !== undefined && this.state.claimed.has(name) ? { index } : null;
    }

    public async authenticateCapability(capability: Capability, name: string): Promise<boolean> {
        return this.state.claimed.has(name) && this.state.capabilities.get(name) === capability.index;
    }

    // Channels

    /**
     * Opens a channel end on this host and returns the capability the core
     * hands to the module owning the port.
     */
    public openChannel(
        portId: string,
        channelId: string,
        counterparty: ChannelCounterparty,
        ordering: ChannelOrder = 'UNORDERED',
        version: string = TRANSFER_VERSION
    ): Capability {
        this.state.channels.set(channelKey(portId, channelId), {
            end: { state: 'OPEN', ordering, counterparty, connectionHops: ['connection-0'], version },
            nextSequenceSend: 1
        });
        logger.debug(`[MemoryHost] Opened ${portId}/${channelId} on ${this.options.chainId}`);
        return this.newCapability(channelCapabilityName(portId, channelId));
    }

    public async getChannel(portId: string, channelId: string): Promise<ChannelEnd | null> {
        return this.state.channels.get(channelKey(portId, channelId))?.end ?? null;
    }

    public async sendPacket(
        capability: Capability,
        outgoing: OutgoingPacket
    ): Promise<Result<Packet, CapabilityError | ChannelNotFoundError>> {
        const record = this.state.channels.get(channelKey(outgoing.sourcePort, outgoing.sourceChannel));
        if (!record || !record.end.counterparty.channelId) {
            return err({ kind: 'ChannelNotFound', chainId: this.options.chainId, portId: outgoing.sourcePort, channelId: outgoing.sourceChannel });
        }
        const authenticated = await this.authenticateCapability(capability, channelCapabilityName(outgoing.sourcePort, outgoing.sourceChannel));
        if (!authenticated) {
            return err({ kind: 'Capability', reason: `capability does not authenticate ${outgoing.sourcePort}/${outgoing.sourceChannel}` });
        }

        const packet: Packet = {
            sequence: record.nextSequenceSend,
            sourcePort: outgoing.sourcePort,
            sourceChannel: outgoing.sourceChannel,
            destinationPort: record.end.counterparty.portId,
            destinationChannel: record.end.counterparty.channelId,
            data: outgoing.data,
            timeoutHeight: outgoing.timeoutHeight,
            timeoutTimestamp: outgoing.timeoutTimestamp
        };
        record.nextSequenceSend++;
        this.state.commitments.set(packetKey({ portId: packet.sourcePort, channelId: packet.sourceChannel, sequence: packet.sequence }), packetCommitment(packet));
        return ok(packet);
    }

    public packetCommitment(key: PacketKey): string | null {
        return this.state.commitments.get(packetKey(key)) ?? null;
    }

    // Params

    public isSendEnabled(): boolean {
        return this.state.sendEnabled;
    }

    public isReceiveEnabled(): boolean {
        return this.state.receiveEnabled;
    }

    public setSendEnabled(enabled: boolean): void {
        this.state.sendEnabled = enabled;
    }

    public setReceiveEnabled(enabled: boolean): void {
        this.state.receiveEnabled = enabled;
    }

    // Packet state

    public async getSent(key: PacketKey): Promise<SentPacketRecord | null> {
        return this.state.sent.get(packetKey(key)) ?? null;
    }

    public async setSent(key: PacketKey, record: SentPacketRecord): Promise<void> {
        this.state.sent.set(packetKey(key), record);
    }

    public async getAcknowledgement(key: PacketKey): Promise<Acknowledgement | null> {
        return this.state.acknowledgements.get(packetKey(key)) ?? null;
    }

    public async writeAcknowledgement(key: PacketKey, acknowledgement: Acknowledgement): Promise<Acknowledgement> {
        const existing = this.state.acknowledgements.get(packetKey(key));
        if (existing) {
            return existing;
        }
        this.state.acknowledgements.set(packetKey(key), acknowledgement);
        return acknowledgement;
    }

    // Denomination traces

    public async getTrace(hash: string): Promise<DenomTrace | null> {
        return this.state.traces.get(hash) ?? null;
    }

    public async setTrace(trace: DenomTrace): Promise<void> {
        const hash = denomTraceHash(trace);
        if (!this.state.traces.has(hash)) {
            this.state.traces.set(hash, trace);
        }
    }
}
