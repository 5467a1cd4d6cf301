import { describe, expect, it } from 'vitest';
import { MsgUpdateClient } from 'cosmjs-types/ibc/core/client/v1/tx';
import { MsgChannelOpenTry, MsgRecvPacket, MsgTimeout } from 'cosmjs-types/ibc/core/channel/v1/tx';
import { Order, State } from 'cosmjs-types/ibc/core/channel/v1/channel';
import { CommitmentSnapshot } from '../src/crypto/commitment-tree';
import { TENDERMINT_HEADER_TYPE_URL, encodeDatagram, encodeProof } from '../src/services/relayer/submit/DatagramEncoder';
import type { CommitmentProof } from '../src/crypto/commitment-tree';
import type { Datagram } from '../src/services/relayer/datagram/types';
import type { ClientState, Packet } from '../src/types/ibc';

const SIGNER = 'cosmos1relayer';

function sampleProof(): CommitmentProof {
    const snapshot = new CommitmentSnapshot(new Map([['commitments/1', new Uint8Array([1, 2, 3])]]));
    const proof = snapshot.proveMembership('commitments/1');
    if (!proof) {
        throw new Error('no proof');
    }
    return proof;
}

const proof = sampleProof();
const proofHeight = { revisionNumber: 1, revisionHeight: 12 };
const packet: Packet = {
    sequence: 3,
    sourcePort: 'transfer',
    sourceChannel: 'channel-0',
    destinationPort: 'transfer',
    destinationChannel: 'channel-1',
    data: Buffer.from('hello').toString('base64'),
    timeoutHeight: { revisionNumber: 1, revisionHeight: 500 },
    timeoutTimestamp: '1700000000000000000'
};
const clientState: ClientState = {
    chainId: 'chain-b-1',
    latestHeight: { revisionNumber: 1, revisionHeight: 4 },
    trustingPeriodMs: 1000,
    trustLevel: { numerator: 1, denominator: 3 }
};

const datagrams: Array<[Datagram, string]> = [
    [{ type: 'UpdateClient', clientId: '07-tendermint-0', height: proofHeight, header: 'aGVhZGVy' }, '/ibc.core.client.v1.MsgUpdateClient'],
    [{ type: 'RecvPacket', packet, proofCommitment: proof, proofHeight }, '/ibc.core.channel.v1.MsgRecvPacket'],
    [{ type: 'Acknowledgement', packet, acknowledgement: 'e30=', proofAcked: proof, proofHeight }, '/ibc.core.channel.v1.MsgAcknowledgement'],
    [{ type: 'Timeout', packet, proofUnreceived: proof, proofHeight, nextSequenceRecv: 3 }, '/ibc.core.channel.v1.MsgTimeout'],
    [{
        type: 'ChannelOpenTry',
        portId: 'transfer',
        ordering: 'ORDERED',
        connectionHops: ['connection-1'],
        counterpartyPortId: 'transfer',
        counterpartyChannelId: 'channel-0',
        version: 'ics20-1',
        counterpartyVersion: 'ics20-1',
        proofInit: proof,
        proofHeight
    }, '/ibc.core.channel.v1.MsgChannelOpenTry'],
    [{
        type: 'ChannelOpenAck',
        portId: 'transfer',
        channelId: 'channel-1',
        counterpartyChannelId: 'channel-0',
        counterpartyVersion: 'ics20-1',
        proofTry: proof,
        proofHeight
    }, '/ibc.core.channel.v1.MsgChannelOpenAck'],
    [{ type: 'ChannelOpenConfirm', portId: 'transfer', channelId: 'channel-1', proofAck: proof, proofHeight }, '/ibc.core.channel.v1.MsgChannelOpenConfirm'],
    [{ type: 'ChannelCloseConfirm', portId: 'transfer', channelId: 'channel-1', proofInit: proof, proofHeight }, '/ibc.core.channel.v1.MsgChannelCloseConfirm'],
    [{
        type: 'ConnectionOpenTry',
        clientId: '07-tendermint-1',
        counterpartyClientId: '07-tendermint-0',
        counterpartyConnectionId: 'connection-0',
        clientState,
        versions: ['1'],
        delayPeriod: 0,
        proofInit: proof,
        proofClient: proof,
        proofConsensus: proof,
        proofHeight,
        consensusHeight: clientState.latestHeight
    }, '/ibc.core.connection.v1.MsgConnectionOpenTry'],
    [{
        type: 'ConnectionOpenAck',
        connectionId: 'connection-1',
        counterpartyConnectionId: 'connection-0',
        version: '1',
        clientState,
        proofTry: proof,
        proofClient: proof,
        proofConsensus: proof,
        proofHeight,
        consensusHeight: clientState.latestHeight
    }, '/ibc.core.connection.v1.MsgConnectionOpenAck'],
    [{ type: 'ConnectionOpenConfirm', connectionId: 'connection-1', proofAck: proof, proofHeight }, '/ibc.core.connection.v1.MsgConnectionOpenConfirm']
];

describe('encodeDatagram', () => {
    for (const [datagram, typeUrl] of datagrams) {
        it(`encodes ${datagram.type} as ${typeUrl}`, () => {
            const encoded = encodeDatagram(datagram, SIGNER);
            expect(encoded.typeUrl).toBe(typeUrl);
            expect(encoded.value.signer).toBe(SIGNER);
        });
    }

    it('wraps the signed header of a client update', () => {
        const msg = MsgUpdateClient.fromPartial(encodeDatagram(datagrams[0][0], SIGNER).value);

        expect(msg.clientId).toBe('07-tendermint-0');
        expect(msg.clientMessage?.typeUrl).toBe(TENDERMINT_HEADER_TYPE_URL);
        expect(Buffer.from(msg.clientMessage?.value ?? []).toString('utf8')).toBe('header');
    });

    it('carries packet fields and the proof height', () => {
        const msg = MsgRecvPacket.fromPartial(encodeDatagram(datagrams[1][0], SIGNER).value);

        expect(msg.packet?.sequence).toBe(BigInt(3));
        expect(msg.packet?.destinationChannel).toBe('channel-1');
        expect(Buffer.from(msg.packet?.data ?? []).toString('utf8')).toBe('hello');
        expect(msg.packet?.timeoutTimestamp).toBe(BigInt('1700000000000000000'));
        expect(msg.proofHeight?.revisionHeight).toBe(BigInt(12));
        expect(msg.proofCommitment).toEqual(encodeProof(proof));
    });

    it('includes the receive counter in a timeout', () => {
        const msg = MsgTimeout.fromPartial(encodeDatagram(datagrams[3][0], SIGNER).value);

        expect(msg.nextSequenceRecv).toBe(BigInt(3));
    });

    it('builds the channel end proposed by an open try', () => {
        const msg = MsgChannelOpenTry.fromPartial(encodeDatagram(datagrams[4][0], SIGNER).value);

        expect(msg.channel?.state).toBe(State.STATE_TRYOPEN);
        expect(msg.channel?.ordering).toBe(Order.ORDER_ORDERED);
        expect(msg.channel?.counterparty?.channelId).toBe('channel-0');
        expect(msg.channel?.connectionHops).toEqual(['connection-1']);
    });

    it('serializes proofs as JSON', () => {
        expect(JSON.parse(Buffer.from(encodeProof(proof)).toString('utf8'))).toEqual(proof);
    });
});
