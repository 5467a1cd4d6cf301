import { logger } from '../../utils/logger';
import { err, ok } from '../../types/result';
import { describeError } from '../../types/errors';
import {
    escrowAddress,
    fullDenomPath,
    ibcDenom,
    parseDenomTrace,
    parseIbcDenomHash,
    receiverChainIsSource,
    senderChainIsSource
} from './denom/DenomTrace';
import {
    SUCCESS_ACKNOWLEDGEMENT,
    TRANSFER_MODULE,
    TRANSFER_VERSION,
    decodeAcknowledgement,
    decodePacketData,
    encodePacketData,
    isSuccessAcknowledgement
} from './types/TransferTypes';
import { channelCapabilityName, portCapabilityName } from './interfaces/Keepers';
import type { Result } from '../../types/result';
import type { TransferError } from '../../types/errors';
import type { ChannelOrder, Packet } from '../../types/ibc';
import type { DenomTrace } from './denom/DenomTrace';
import type { Acknowledgement, FungibleTokenPacketData, MsgTransfer } from './types/TransferTypes';
import type {
    AccountKeeper,
    BankKeeper,
    Capability,
    ChannelKeeper,
    Coin,
    DenomTraceStore,
    PacketKey,
    PacketStateStore,
    PortKeeper,
    SentPacketState,
    StateTransaction,
    TransferParams
} from './interfaces/Keepers';

export interface TransferKeepers {
    bank: BankKeeper;
    accounts: AccountKeeper;
    ports: PortKeeper;
    channels: ChannelKeeper;
    params: TransferParams;
    packets: PacketStateStore;
    traces: DenomTraceStore;
    transaction: StateTransaction;
}

export interface TransferHandlerOptions {
    chainId: string;
    /** Bech32 prefix of the host chain's addresses. */
    addressPrefix: string;
}

export interface SendTransferResult {
    packet: Packet;
    data: FungibleTokenPacketData;
}

export interface ReceiveResult {
    receiver: string;
    coin: Coin;
    trace: DenomTrace;
    /** True when the tokens were released from escrow rather than minted. */
    unescrowed: boolean;
}

export interface ReceiveOutcome {
    acknowledgement: Acknowledgement;
    /** Null when the packet was rejected or had been received before. */
    credit: ReceiveResult | null;
}

export type SettlementOutcome = 'completed' | 'refunded' | 'already-settled';

function sourceKey(packet: Packet): PacketKey {
    return { portId: packet.sourcePort, channelId: packet.sourceChannel, sequence: packet.sequence };
}

function destinationKey(packet: Packet): PacketKey {
    return { portId: packet.destinationPort, channelId: packet.destinationChannel, sequence: packet.sequence };
}

/**
 * Fungible token transfer application.
 *
 * Sending escrows tokens native to this side of the channel and burns vouchers
 * that are travelling back. Receiving does the reverse: tokens returning home
 * are released from escrow, anything else is minted as a voucher whose trace
 * gains the receiving `port/channel` hop. A sent packet is settled exactly once,
 * by a success acknowledgement, an error acknowledgement or a timeout; the last
 * two refund the sender.
 */
export class TransferProtocolHandler {
    private readonly moduleAddress: string;

    constructor(
        private readonly keepers: TransferKeepers,
        private readonly options: TransferHandlerOptions
    ) {
        this.moduleAddress = keepers.accounts.getModuleAddress(TRANSFER_MODULE);
    }

    public async bindPort(portId: string): Promise<Result<Capability, TransferError>> {
        const bound = await this.keepers.ports.bindPort(portId);
        if (!bound.ok) {
            return bound;
        }
        const claimed = await this.keepers.ports.claimCapability(bound.value, portCapabilityName(portId));
        if (!claimed.ok) {
            return claimed;
        }
        logger.info(`[TransferProtocolHandler] Bound port ${portId} on ${this.options.chainId}`);
        return ok(bound.value);
    }

    /**
     * Validates a channel being opened on this module's port and claims its
     * capability.
     */
    public async onChannelOpen(
        portId: string,
        channelId: string,
        ordering: ChannelOrder,
        version: string,
        capability: Capability
    ): Promise<Result<void, TransferError>> {
        if (ordering !== 'UNORDERED') {
            return err({ kind: 'InvalidChannelParameters', reason: `expected an unordered channel, got ${ordering}` });
        }
        if (version !== TRANSFER_VERSION) {
            return err({ kind: 'InvalidChannelParameters', reason: `expected version ${TRANSFER_VERSION}, got ${version}` });
        }
        const portCapability = await this.keepers.ports.getCapability(portCapabilityName(portId));
        if (!portCapability) {
            return err({ kind: 'Capability', reason: `port ${portId} is not bound by the transfer module` });
        }
        return this.keepers.ports.claimCapability(capability, channelCapabilityName(portId, channelId));
    }

    /**
     * Full denomination path of a coin held on this chain.
     */
    private async resolveDenom(denom: string): Promise<Result<DenomTrace, TransferError>> {
        const hash = parseIbcDenomHash(denom);
        if (hash) {
            const trace = await this.keepers.traces.getTrace(hash);
            return trace ? ok(trace) : err({ kind: 'InvalidDenomTrace', denom, reason: 'no trace recorded for this hash' });
        }
        return parseDenomTrace(denom);
    }

    public async sendTransfer(msg: MsgTransfer): Promise<Result<SendTransferResult, TransferError>> {
        if (!this.keepers.params.isSendEnabled()) {
            return err({ kind: 'SendDisabled' });
        }
        if (msg.token.amount <= BigInt(0)) {
            return err({ kind: 'InvalidPacketData', reason: 'amount must be positive' });
        }

        const resolved = await this.resolveDenom(msg.token.denom);
        if (!resolved.ok) {
            return resolved;
        }
        const fullPath = fullDenomPath(resolved.value);

        const channel = await this.keepers.channels.getChannel(msg.sourcePort, msg.sourceChannel);
        if (!channel) {
            return err({ kind: 'ChannelNotFound', chainId: this.options.chainId, portId: msg.sourcePort, channelId: msg.sourceChannel });
        }
        const capability = await this.keepers.ports.getCapability(channelCapabilityName(msg.sourcePort, msg.sourceChannel));
        if (!capability) {
            return err({ kind: 'Capability', reason: `module does not own channel ${msg.sourcePort}/${msg.sourceChannel}` });
        }

        const coin: Coin = { denom: msg.token.denom, amount: msg.token.amount };
        const data: FungibleTokenPacketData = {
            denom: fullPath,
            amount: msg.token.amount.toString(),
            sender: msg.sender,
            receiver: msg.receiver,
            ...(msg.memo ? { memo: msg.memo } : {})
        };

        return this.keepers.transaction.atomically<SendTransferResult, TransferError>(async () => {
            if (senderChainIsSource(msg.sourcePort, msg.sourceChannel, fullPath)) {
                const escrow = escrowAddress(this.options.addressPrefix, msg.sourcePort, msg.sourceChannel);
                const escrowed = await this.keepers.bank.sendCoins(msg.sender, escrow, coin);
                if (!escrowed.ok) {
                    return escrowed;
                }
            } else {
                const moved = await this.keepers.bank.sendCoins(msg.sender, this.moduleAddress, coin);
                if (!moved.ok) {
                    return moved;
                }
                const burned = await this.keepers.bank.burnCoins(this.moduleAddress, coin);
                if (!burned.ok) {
                    return burned;
                }
            }

            const sent = await this.keepers.channels.sendPacket(capability, {
                sourcePort: msg.sourcePort,
                sourceChannel: msg.sourceChannel,
                data: encodePacketData(data),
                timeoutHeight: msg.timeoutHeight,
                timeoutTimestamp: msg.timeoutTimestamp
            });
            if (!sent.ok) {
                return sent;
            }

            await this.keepers.packets.setSent(sourceKey(sent.value), { state: 'Sent', data });
            logger.info(`[TransferProtocolHandler] Sent ${coin.amount}${fullPath} from ${msg.sender} as packet ${sent.value.sequence}`, {
                channel: `${msg.sourcePort}/${msg.sourceChannel}`,
                escrowed: senderChainIsSource(msg.sourcePort, msg.sourceChannel, fullPath)
            });
            return ok({ packet: sent.value, data });
        });
    }

    /**
     * Handles an incoming packet. A packet is credited at most once: delivering
     * it again returns the acknowledgement written the first time and a null
     * credit. A rejected packet gets an error acknowledgement and nothing else
     * is written.
     */
    public async receivePacket(packet: Packet): Promise<ReceiveOutcome> {
        const key = destinationKey(packet);

        const credited = await this.keepers.transaction.atomically<ReceiveOutcome, TransferError>(async () => {
            const existing = await this.keepers.packets.getAcknowledgement(key);
            if (existing) {
                logger.debug(`[TransferProtocolHandler] Packet ${packet.sequence} already acknowledged`);
                return ok({ acknowledgement: existing, credit: null });
            }
            const result = await this.credit(packet);
            if (!result.ok) {
                return result;
            }
            const acknowledgement = await this.keepers.packets.writeAcknowledgement(key, SUCCESS_ACKNOWLEDGEMENT);
            return ok({ acknowledgement, credit: result.value });
        });
        if (credited.ok) {
            return credited.value;
        }

        const failure: Acknowledgement = { error: describeError(credited.error) };
        logger.warn(`[TransferProtocolHandler] Rejecting packet ${packet.sequence}: ${failure.error}`);
        const written = await this.keepers.transaction.atomically<Acknowledgement, never>(
            async () => ok(await this.keepers.packets.writeAcknowledgement(key, failure))
        );
        return { acknowledgement: written.ok ? written.value : failure, credit: null };
    }

    /** Acknowledgement-only form of `receivePacket`. */
    public async onRecvPacket(packet: Packet): Promise<Acknowledgement> {
        return (await this.receivePacket(packet)).acknowledgement;
    }

    private async credit(packet: Packet): Promise<Result<ReceiveResult, TransferError>> {
        if (!this.keepers.params.isReceiveEnabled()) {
            return err({ kind: 'ReceiveDisabled' });
        }
        const decoded = decodePacketData(packet.data);
        if (!decoded.ok) {
            return decoded;
        }
        const data = decoded.value;
        const incoming = parseDenomTrace(data.denom);
        if (!incoming.ok) {
            return incoming;
        }
        const amount = BigInt(data.amount);

        if (receiverChainIsSource(packet.sourcePort, packet.sourceChannel, data.denom)) {
            const unprefixed = data.denom.slice(`${packet.sourcePort}/${packet.sourceChannel}/`.length);
            const trace = parseDenomTrace(unprefixed);
            if (!trace.ok) {
                return trace;
            }
            const coin: Coin = { denom: ibcDenom(trace.value), amount };
            const escrow = escrowAddress(this.options.addressPrefix, packet.destinationPort, packet.destinationChannel);
            const released = await this.keepers.bank.sendCoins(escrow, data.receiver, coin);
            if (!released.ok) {
                return released;
            }
            logger.info(`[TransferProtocolHandler] Released ${amount}${fullDenomPath(trace.value)} from escrow to ${data.receiver}`);
            return ok({ receiver: data.receiver, coin, trace: trace.value, unescrowed: true });
        }

        const trace = parseDenomTrace(`${packet.destinationPort}/${packet.destinationChannel}/${data.denom}`);
        if (!trace.ok) {
            return trace;
        }
        const coin: Coin = { denom: ibcDenom(trace.value), amount };
        await this.keepers.traces.setTrace(trace.value);
        await this.keepers.bank.mintCoins(this.moduleAddress, coin);
        const delivered = await this.keepers.bank.sendCoins(this.moduleAddress, data.receiver, coin);
        if (!delivered.ok) {
            return delivered;
        }
        logger.info(`[TransferProtocolHandler] Minted ${amount}${coin.denom} for ${data.receiver}`, { trace: fullDenomPath(trace.value) });
        return ok({ receiver: data.receiver, coin, trace: trace.value, unescrowed: false });
    }

    /**
     * Settles a sent packet with the acknowledgement the counterparty wrote.
     * An error acknowledgement refunds the sender.
     */
    public async onAcknowledgementPacket(packet: Packet, acknowledgement: string): Promise<Result<SettlementOutcome, TransferError>> {
        const ack = decodeAcknowledgement(acknowledgement);
        if (!ack.ok) {
            return ack;
        }
        if (isSuccessAcknowledgement(ack.value)) {
            return this.settle(packet, 'AcknowledgedSuccess', false);
        }
        logger.warn(`[TransferProtocolHandler] Packet ${packet.sequence} failed on the counterparty: ${ack.value.error}`);
        return this.settle(packet, 'AcknowledgedError', true);
    }

    public onTimeoutPacket(packet: Packet): Promise<Result<SettlementOutcome, TransferError>> {
        return this.settle(packet, 'TimedOut', true);
    }

    private settle(packet: Packet, state: SentPacketState, refund: boolean): Promise<Result<SettlementOutcome, TransferError>> {
        const key = sourceKey(packet);
        return this.keepers.transaction.atomically<SettlementOutcome, TransferError>(async () => {
            const record = await this.keepers.packets.getSent(key);
            if (!record) {
                return err({ kind: 'PacketNotFound', portId: key.portId, channelId: key.channelId, sequence: key.sequence });
            }
            if (record.state !== 'Sent') {
                logger.debug(`[TransferProtocolHandler] Packet ${packet.sequence} already settled as ${record.state}`);
                return ok('already-settled');
            }

            if (refund) {
                const refunded = await this.refundPacketToken(packet, record.data);
                if (!refunded.ok) {
                    logger.error(`[TransferProtocolHandler] Refund of packet ${packet.sequence} failed: ${describeError(refunded.error)}`);
                    return refunded;
                }
            }

            await this.keepers.packets.setSent(key, { state, data: record.data });
            return ok(refund ? 'refunded' : 'completed');
        });
    }

    /**
     * Reverses what `sendTransfer` did for the packet: releases escrow or
     * re-mints the burned vouchers.
     */
    private async refundPacketToken(packet: Packet, data: FungibleTokenPacketData): Promise<Result<void, TransferError>> {
        const trace = parseDenomTrace(data.denom);
        if (!trace.ok) {
            return trace;
        }
        const coin: Coin = { denom: ibcDenom(trace.value), amount: BigInt(data.amount) };

        if (senderChainIsSource(packet.sourcePort, packet.sourceChannel, data.denom)) {
            const escrow = escrowAddress(this.options.addressPrefix, packet.sourcePort, packet.sourceChannel);
            return this.keepers.bank.sendCoins(escrow, data.sender, coin);
        }

        await this.keepers.bank.mintCoins(this.moduleAddress, coin);
        return this.keepers.bank.sendCoins(this.moduleAddress, data.sender, coin);
    }

    /**
     * Balance of `address`; `denom` may be a base denomination, an `ibc/{HASH}`
     * denomination or a full trace path.
     */
    public async queryBalance(address: string, denom: string): Promise<Result<Coin, TransferError>> {
        let bankDenom = denom;
        if (!parseIbcDenomHash(denom) && denom.includes('/')) {
            const trace = parseDenomTrace(denom);
            if (!trace.ok) {
                return trace;
            }
            bankDenom = ibcDenom(trace.value);
        }
        return ok({ denom: bankDenom, amount: await this.keepers.bank.getBalance(address, bankDenom) });
    }
}
