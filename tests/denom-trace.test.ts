import { describe, expect, it } from 'vitest';
import { bech32 } from 'bech32';
import {
    denomTraceHash,
    escrowAddress,
    fullDenomPath,
    ibcDenom,
    isValidChannelId,
    isValidPortId,
    parseDenomTrace,
    parseIbcDenomHash,
    receiverChainIsSource,
    senderChainIsSource
} from '../src/services/transfer/denom/DenomTrace';
import { err, ok } from '../src/types/result';

const ATOM_OVER_CHANNEL_0 = '27394FB092D2ECCD56123C74F36E4C1F926001CEADA9CA97EA622B25F41E5EB2';

describe('parseDenomTrace', () => {
    it('treats a bare denomination as native', () => {
        expect(parseDenomTrace('uatom')).toEqual(ok({ path: '', baseDenom: 'uatom' }));
    });

    it('splits multi-hop paths into hops and base denomination', () => {
        expect(parseDenomTrace('transfer/channel-1/transfer/channel-0/uatom')).toEqual(ok({
            path: 'transfer/channel-1/transfer/channel-0',
            baseDenom: 'uatom'
        }));
    });

    it('keeps slashes that belong to the base denomination', () => {
        expect(parseDenomTrace('transfer/channel-0/gamm/pool/1')).toEqual(ok({
            path: 'transfer/channel-0',
            baseDenom: 'gamm/pool/1'
        }));
    });

    it('rejects malformed paths', () => {
        expect(parseDenomTrace('')).toEqual(err({ kind: 'InvalidDenomTrace', denom: '', reason: 'denomination is empty' }));
        expect(parseDenomTrace('transfer//uatom')).toEqual(err({
            kind: 'InvalidDenomTrace',
            denom: 'transfer//uatom',
            reason: 'denomination contains an empty path segment'
        }));
        expect(parseDenomTrace('transfer/channel-0')).toEqual(err({
            kind: 'InvalidDenomTrace',
            denom: 'transfer/channel-0',
            reason: 'base denomination is missing'
        }));
        expect(parseDenomTrace('transfer/channel-0/1bad')).toEqual(err({
            kind: 'InvalidDenomTrace',
            denom: 'transfer/channel-0/1bad',
            reason: 'invalid base denomination "1bad"'
        }));
    });

    it('rejects an unresolved voucher denomination as base', () => {
        const denom = `transfer/channel-0/ibc/${ATOM_OVER_CHANNEL_0}`;
        expect(parseDenomTrace(denom)).toEqual(err({
            kind: 'InvalidDenomTrace',
            denom,
            reason: 'base denomination is an unresolved ibc hash'
        }));
    });
});

describe('denomination hashing', () => {
    const trace = { path: 'transfer/channel-0', baseDenom: 'uatom' };

    it('hashes the full path into the voucher denomination', () => {
        expect(fullDenomPath(trace)).toBe('transfer/channel-0/uatom');
        expect(denomTraceHash(trace)).toBe(ATOM_OVER_CHANNEL_0);
        expect(ibcDenom(trace)).toBe(`ibc/${ATOM_OVER_CHANNEL_0}`);
    });

    it('keeps native denominations as they are', () => {
        expect(ibcDenom({ path: '', baseDenom: 'uatom' })).toBe('uatom');
    });

    it('extracts the hash of a voucher denomination', () => {
        expect(parseIbcDenomHash(`ibc/${ATOM_OVER_CHANNEL_0}`)).toBe(ATOM_OVER_CHANNEL_0);
        expect(parseIbcDenomHash(`ibc/${ATOM_OVER_CHANNEL_0.toLowerCase()}`)).toBeNull();
        expect(parseIbcDenomHash('uatom')).toBeNull();
    });
});

describe('source chain checks', () => {
    it('finds the sender is the source unless the token arrived over the channel', () => {
        expect(senderChainIsSource('transfer', 'channel-0', 'uatom')).toBe(true);
        expect(senderChainIsSource('transfer', 'channel-0', 'transfer/channel-0/uatom')).toBe(false);
        expect(senderChainIsSource('transfer', 'channel-0', 'transfer/channel-01/uatom')).toBe(true);
    });

    it('finds the receiver is the source when the token returns over its channel', () => {
        expect(receiverChainIsSource('transfer', 'channel-1', 'transfer/channel-1/uatom')).toBe(true);
        expect(receiverChainIsSource('transfer', 'channel-1', 'uatom')).toBe(false);
    });
});

describe('identifiers', () => {
    it('validates port and channel identifiers', () => {
        expect(isValidPortId('transfer')).toBe(true);
        expect(isValidPortId('t')).toBe(false);
        expect(isValidChannelId('channel-0')).toBe(true);
        expect(isValidChannelId('channel-00')).toBe(false);
        expect(isValidChannelId('connection-0')).toBe(false);
    });
});

describe('escrowAddress', () => {
    it('derives a 20 byte account under the chain prefix', () => {
        const address = escrowAddress('cosmos', 'transfer', 'channel-0');
        const decoded = bech32.decode(address);

        expect(decoded.prefix).toBe('cosmos');
        expect(bech32.fromWords(decoded.words)).toHaveLength(20);
    });

    it('is stable per channel and distinct across channels', () => {
        expect(escrowAddress('cosmos', 'transfer', 'channel-0')).toBe(escrowAddress('cosmos', 'transfer', 'channel-0'));
        expect(escrowAddress('cosmos', 'transfer', 'channel-0')).not.toBe(escrowAddress('cosmos', 'transfer', 'channel-1'));
    });
});
