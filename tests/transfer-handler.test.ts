import { beforeEach, describe, expect, it } from 'vitest';
import { TransferProtocolHandler } from '../src/services/transfer/TransferProtocolHandler';
import { MemoryHost } from '../src/services/transfer/host/MemoryHost';
import { denomTraceHash, escrowAddress, ibcDenom } from '../src/services/transfer/denom/DenomTrace';
import { encodeAcknowledgement, encodePacketData } from '../src/services/transfer/types/TransferTypes';
import { packetCommitment } from '../src/types/ibc';
import { err, ok } from '../src/types/result';
import type { MsgTransfer } from '../src/services/transfer/types/TransferTypes';
import type { ChannelCounterparty, Packet } from '../src/types/ibc';

const ALICE = 'cosmos1alice';
const BOB = 'osmo1bob';
const VOUCHER = ibcDenom({ path: 'transfer/channel-1', baseDenom: 'uatom' });
const ESCROW_A = escrowAddress('cosmos', 'transfer', 'channel-0');

interface Side {
    host: MemoryHost;
    handler: TransferProtocolHandler;
}

async function createSide(chainId: string, addressPrefix: string, channelId: string, counterparty: ChannelCounterparty): Promise<Side> {
    const host = new MemoryHost({ chainId, addressPrefix });
    const handler = new TransferProtocolHandler(
        {
            bank: host,
            accounts: host,
            ports: host,
            channels: host,
            params: host,
            packets: host,
            traces: host,
            transaction: host
        },
        { chainId, addressPrefix }
    );
    const bound = await handler.bindPort('transfer');
    if (!bound.ok) {
        throw new Error('port binding failed');
    }
    const capability = host.openChannel('transfer', channelId, counterparty);
    const opened = await handler.onChannelOpen('transfer', channelId, 'UNORDERED', 'ics20-1', capability);
    if (!opened.ok) {
        throw new Error('channel open failed');
    }
    return { host, handler };
}

function transfer(overrides: Partial<MsgTransfer> = {}): MsgTransfer {
    return {
        sourcePort: 'transfer',
        sourceChannel: 'channel-0',
        token: { denom: 'uatom', amount: BigInt(100) },
        sender: ALICE,
        receiver: BOB,
        timeoutHeight: { revisionNumber: 1, revisionHeight: 1000 },
        timeoutTimestamp: '0',
        ...overrides
    };
}

async function sent(side: Side, msg: MsgTransfer): Promise<Packet> {
    const result = await side.handler.sendTransfer(msg);
    if (!result.ok) {
        throw new Error(`send failed: ${result.error.kind}`);
    }
    return result.value.packet;
}

describe('TransferProtocolHandler', () => {
    let a: Side;
    let b: Side;

    beforeEach(async () => {
        a = await createSide('chain-a-1', 'cosmos', 'channel-0', { portId: 'transfer', channelId: 'channel-1' });
        b = await createSide('chain-b-1', 'osmo', 'channel-1', { portId: 'transfer', channelId: 'channel-0' });
        a.host.fund(ALICE, { denom: 'uatom', amount: BigInt(1000) });
    });

    describe('channel setup', () => {
        it('rejects ordered channels and foreign versions', async () => {
            const ordered = a.host.openChannel('transfer', 'channel-5', { portId: 'transfer', channelId: 'channel-9' }, 'ORDERED');
            expect(await a.handler.onChannelOpen('transfer', 'channel-5', 'ORDERED', 'ics20-1', ordered)).toEqual(err({
                kind: 'InvalidChannelParameters',
                reason: 'expected an unordered channel, got ORDERED'
            }));

            const foreign = a.host.openChannel('transfer', 'channel-6', { portId: 'transfer', channelId: 'channel-9' });
            expect(await a.handler.onChannelOpen('transfer', 'channel-6', 'UNORDERED', 'ics27-1', foreign)).toEqual(err({
                kind: 'InvalidChannelParameters',
                reason: 'expected version ics20-1, got ics27-1'
            }));
        });

        it('refuses to bind the port twice', async () => {
            expect(await a.handler.bindPort('transfer')).toEqual(err({ kind: 'Capability', reason: 'port transfer is already bound' }));
        });
    });

    describe('sendTransfer', () => {
        it('escrows native tokens and commits the packet', async () => {
            const result = await a.handler.sendTransfer(transfer());

            expect(result.ok).toBe(true);
            if (!result.ok) return;
            const { packet, data } = result.value;
            expect(packet).toMatchObject({
                sequence: 1,
                sourcePort: 'transfer',
                sourceChannel: 'channel-0',
                destinationPort: 'transfer',
                destinationChannel: 'channel-1'
            });
            expect(data).toEqual({ denom: 'uatom', amount: '100', sender: ALICE, receiver: BOB });
            expect(packet.data).toBe(encodePacketData(data));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(900));
            expect(await a.host.getBalance(ESCROW_A, 'uatom')).toBe(BigInt(100));
            expect(a.host.packetCommitment({ portId: 'transfer', channelId: 'channel-0', sequence: 1 })).toBe(packetCommitment(packet));
        });

        it('assigns increasing sequences', async () => {
            const first = await sent(a, transfer());
            const second = await sent(a, transfer({ token: { denom: 'uatom', amount: BigInt(5) } }));

            expect([first.sequence, second.sequence]).toEqual([1, 2]);
        });

        it('leaves balances untouched when sending is disabled', async () => {
            a.host.setSendEnabled(false);

            expect(await a.handler.sendTransfer(transfer())).toEqual(err({ kind: 'SendDisabled' }));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(1000));
            expect(a.host.packetCommitment({ portId: 'transfer', channelId: 'channel-0', sequence: 1 })).toBeNull();
        });

        it('rejects a transfer the sender cannot cover', async () => {
            expect(await a.handler.sendTransfer(transfer({ token: { denom: 'uatom', amount: BigInt(5000) } }))).toEqual(err({
                kind: 'InsufficientFunds',
                address: ALICE,
                denom: 'uatom',
                available: BigInt(1000),
                required: BigInt(5000)
            }));
            expect((await sent(a, transfer())).sequence).toBe(1);
        });

        it('rolls back the escrow when the packet cannot be sent', async () => {
            const capability = a.host.openChannel('transfer', 'channel-3', { portId: 'transfer' });
            await a.handler.onChannelOpen('transfer', 'channel-3', 'UNORDERED', 'ics20-1', capability);

            const result = await a.handler.sendTransfer(transfer({ sourceChannel: 'channel-3' }));

            expect(result).toEqual(err({ kind: 'ChannelNotFound', chainId: 'chain-a-1', portId: 'transfer', channelId: 'channel-3' }));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(1000));
            expect(await a.host.getBalance(escrowAddress('cosmos', 'transfer', 'channel-3'), 'uatom')).toBe(BigInt(0));
        });

        it('rejects a voucher whose trace is unknown', async () => {
            const unknown = `ibc/${'A'.repeat(64)}`;

            expect(await a.handler.sendTransfer(transfer({ token: { denom: unknown, amount: BigInt(1) } }))).toEqual(err({
                kind: 'InvalidDenomTrace',
                denom: unknown,
                reason: 'no trace recorded for this hash'
            }));
        });
    });

    describe('receiving', () => {
        it('mints a voucher and records its trace', async () => {
            const packet = await sent(a, transfer());

            expect(await b.handler.onRecvPacket(packet)).toEqual({ result: 'AQ==' });
            expect(await b.host.getBalance(BOB, VOUCHER)).toBe(BigInt(100));
            expect(b.host.totalSupply(VOUCHER)).toBe(BigInt(100));
            expect(await b.host.getTrace(denomTraceHash({ path: 'transfer/channel-1', baseDenom: 'uatom' }))).toEqual({
                path: 'transfer/channel-1',
                baseDenom: 'uatom'
            });
        });

        it('returns the stored acknowledgement for a duplicate delivery', async () => {
            const packet = await sent(a, transfer());

            await b.handler.onRecvPacket(packet);
            expect(await b.handler.onRecvPacket(packet)).toEqual({ result: 'AQ==' });
            expect(await b.host.getBalance(BOB, VOUCHER)).toBe(BigInt(100));
        });

        it('credits a packet delivered twice only once', async () => {
            const packet = await sent(a, transfer());

            const first = await b.handler.receivePacket(packet);
            expect(first.credit?.coin).toEqual({ denom: VOUCHER, amount: BigInt(100) });

            expect(await b.handler.receivePacket(packet)).toEqual({ acknowledgement: { result: 'AQ==' }, credit: null });
            expect(await b.host.getBalance(BOB, VOUCHER)).toBe(BigInt(100));
            expect(b.host.totalSupply(VOUCHER)).toBe(BigInt(100));
        });

        it('mints rather than unescrows a denomination prefixed with the receiving channel', async () => {
            const packet: Packet = {
                sequence: 1,
                sourcePort: 'transfer',
                sourceChannel: 'channel-1',
                destinationPort: 'transfer',
                destinationChannel: 'channel-0',
                data: encodePacketData({ denom: 'transfer/channel-0/uatom', amount: '10', sender: BOB, receiver: ALICE }),
                timeoutHeight: { revisionNumber: 1, revisionHeight: 1000 },
                timeoutTimestamp: '0'
            };
            const doubled = { path: 'transfer/channel-0/transfer/channel-0', baseDenom: 'uatom' };

            expect(await a.handler.receivePacket(packet)).toEqual({
                acknowledgement: { result: 'AQ==' },
                credit: { receiver: ALICE, coin: { denom: ibcDenom(doubled), amount: BigInt(10) }, trace: doubled, unescrowed: false }
            });
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(1000));
        });

        it('releases escrow when a voucher returns home, stripping its hop', async () => {
            await b.handler.onRecvPacket(await sent(a, transfer()));

            const back = await b.handler.sendTransfer(transfer({
                sourceChannel: 'channel-1',
                token: { denom: VOUCHER, amount: BigInt(40) },
                sender: BOB,
                receiver: ALICE
            }));
            expect(back.ok).toBe(true);
            if (!back.ok) return;
            expect(back.value.data.denom).toBe('transfer/channel-1/uatom');
            expect(await b.host.getBalance(BOB, VOUCHER)).toBe(BigInt(60));
            expect(b.host.totalSupply(VOUCHER)).toBe(BigInt(60));

            const received = await a.handler.receivePacket(back.value.packet);
            expect(received).toEqual({
                acknowledgement: { result: 'AQ==' },
                credit: {
                    receiver: ALICE,
                    coin: { denom: 'uatom', amount: BigInt(40) },
                    trace: { path: '', baseDenom: 'uatom' },
                    unescrowed: true
                }
            });
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(940));
            expect(await a.host.getBalance(ESCROW_A, 'uatom')).toBe(BigInt(60));
        });

        it('acknowledges with an error when receiving is disabled, and keeps that acknowledgement', async () => {
            const packet = await sent(a, transfer());
            b.host.setReceiveEnabled(false);

            const failure = { error: 'fungible token transfers to this chain are disabled' };
            expect(await b.handler.onRecvPacket(packet)).toEqual(failure);
            expect(await b.host.getBalance(BOB, VOUCHER)).toBe(BigInt(0));

            b.host.setReceiveEnabled(true);
            expect(await b.handler.onRecvPacket(packet)).toEqual(failure);
        });

        it('acknowledges malformed packet data with an error', async () => {
            const packet = await sent(a, transfer());
            const malformed: Packet = {
                ...packet,
                data: encodePacketData({ denom: 'uatom', amount: '0', sender: ALICE, receiver: BOB })
            };

            expect(await b.handler.onRecvPacket(malformed)).toEqual({ error: 'invalid packet data: amount must be a positive integer' });
        });
    });

    describe('settlement', () => {
        it('completes on a success acknowledgement without refunding', async () => {
            const packet = await sent(a, transfer());

            expect(await a.handler.onAcknowledgementPacket(packet, encodeAcknowledgement({ result: 'AQ==' }))).toEqual(ok('completed'));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(900));
            expect(await a.handler.onTimeoutPacket(packet)).toEqual(ok('already-settled'));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(900));
        });

        it('refunds once on an error acknowledgement', async () => {
            const packet = await sent(a, transfer());
            const failure = encodeAcknowledgement({ error: 'receiver rejected' });

            expect(await a.handler.onAcknowledgementPacket(packet, failure)).toEqual(ok('refunded'));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(1000));
            expect(await a.host.getBalance(ESCROW_A, 'uatom')).toBe(BigInt(0));

            expect(await a.handler.onAcknowledgementPacket(packet, failure)).toEqual(ok('already-settled'));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(1000));
        });

        it('refunds once on timeout', async () => {
            const packet = await sent(a, transfer());

            expect(await a.handler.onTimeoutPacket(packet)).toEqual(ok('refunded'));
            expect(await a.handler.onTimeoutPacket(packet)).toEqual(ok('already-settled'));
            expect(await a.host.getBalance(ALICE, 'uatom')).toBe(BigInt(1000));
        });

        it('re-mints a burned voucher when its return trip times out', async () => {
            await b.handler.onRecvPacket(await sent(a, transfer()));
            const back = await sent(b, transfer({
                sourceChannel: 'channel-1',
                token: { denom: VOUCHER, amount: BigInt(40) },
                sender: BOB,
                receiver: ALICE
            }));

            expect(await b.handler.onTimeoutPacket(back)).toEqual(ok('refunded'));
            expect(await b.host.getBalance(BOB, VOUCHER)).toBe(BigInt(100));
            expect(b.host.totalSupply(VOUCHER)).toBe(BigInt(100));
        });

        it('rejects an acknowledgement it does not recognise and leaves the packet pending', async () => {
            const packet = await sent(a, transfer());
            const unknown = Buffer.from('{"result":"AA=="}').toString('base64');

            expect(await a.handler.onAcknowledgementPacket(packet, unknown)).toEqual(err({
                kind: 'UnknownAcknowledgement',
                reason: 'unexpected acknowledgement {"result":"AA=="}'
            }));
            expect(await a.handler.onTimeoutPacket(packet)).toEqual(ok('refunded'));
        });

        it('reports a packet this chain never sent', async () => {
            const packet = await sent(a, transfer());

            expect(await a.handler.onTimeoutPacket({ ...packet, sequence: 9 })).toEqual(err({
                kind: 'PacketNotFound',
                portId: 'transfer',
                channelId: 'channel-0',
                sequence: 9
            }));
        });
    });

    describe('queryBalance', () => {
        it('resolves full trace paths to the voucher denomination', async () => {
            await b.handler.onRecvPacket(await sent(a, transfer()));

            expect(await b.handler.queryBalance(BOB, 'transfer/channel-1/uatom')).toEqual(ok({ denom: VOUCHER, amount: BigInt(100) }));
            expect(await b.handler.queryBalance(BOB, VOUCHER)).toEqual(ok({ denom: VOUCHER, amount: BigInt(100) }));
            expect(await a.handler.queryBalance(ALICE, 'uatom')).toEqual(ok({ denom: 'uatom', amount: BigInt(900) }));
        });
    });
});
