import { createHash } from 'crypto';
import { bech32 } from 'bech32';
import { err, ok } from '../../../types/result';
import type { Result } from '../../../types/result';
import type { InvalidDenomTraceError } from '../../../types/errors';

/**
 * Channel hops a token took, outermost first, and the denomination it was
 * minted under on its native chain.
 *
 * `{ path: 'transfer/channel-1/transfer/channel-0', baseDenom: 'uatom' }`
 */
export interface DenomTrace {
    path: string;
    baseDenom: string;
}

const IDENTIFIER = /^[a-zA-Z0-9._+\-#[\]<>]+$/;
const CHANNEL_ID = /^channel-(0|[1-9][0-9]*)$/;
const BASE_DENOM = /^[a-zA-Z][a-zA-Z0-9/:._-]{2,127}$/;
const IBC_DENOM = /^ibc\/([0-9A-F]{64})$/;

export const ESCROW_ADDRESS_VERSION = 'ics20-1';

export function isValidPortId(portId: string): boolean {
    return portId.length >= 2 && portId.length <= 128 && IDENTIFIER.test(portId);
}

export function isValidChannelId(channelId: string): boolean {
    return channelId.length >= 8 && channelId.length <= 64 && CHANNEL_ID.test(channelId);
}

function invalid(denom: string, reason: string): Result<never, InvalidDenomTraceError> {
    return err({ kind: 'InvalidDenomTrace', denom, reason });
}

/**
 * Splits a full denomination path into its hops and base denomination. Leading
 * segments are consumed in `port/channel` pairs; whatever follows the last
 * pair is the base denomination, which may itself contain slashes.
 */
export function parseDenomTrace(fullPath: string): Result<DenomTrace, InvalidDenomTraceError> {
    if (fullPath.length === 0) {
        return invalid(fullPath, 'denomination is empty');
    }
    const segments = fullPath.split('/');
    if (segments.some(segment => segment.length === 0)) {
        return invalid(fullPath, 'denomination contains an empty path segment');
    }

    let index = 0;
    while (index + 1 < segments.length && isValidPortId(segments[index]) && isValidChannelId(segments[index + 1])) {
        index += 2;
    }
    if (index === segments.length) {
        return invalid(fullPath, 'base denomination is missing');
    }

    const baseDenom = segments.slice(index).join('/');
    if (!BASE_DENOM.test(baseDenom)) {
        return invalid(fullPath, `invalid base denomination "${baseDenom}"`);
    }
    if (IBC_DENOM.test(baseDenom)) {
        return invalid(fullPath, 'base denomination is an unresolved ibc hash');
    }

    return ok({ path: segments.slice(0, index).join('/'), baseDenom });
}

export function fullDenomPath(trace: DenomTrace): string {
    return trace.path ? `${trace.path}/${trace.baseDenom}` : trace.baseDenom;
}

export function denomTraceHash(trace: DenomTrace): string {
    return createHash('sha256').update(fullDenomPath(trace)).digest('hex').toUpperCase();
}

/**
 * Denomination the bank module holds the token under: the base denomination
 * for native tokens, `ibc/{HASH}` for vouchers.
 */
export function ibcDenom(trace: DenomTrace): string {
    return trace.path ? `ibc/${denomTraceHash(trace)}` : trace.baseDenom;
}

/** Hash part of an `ibc/{HASH}` denomination, or null for other denominations. */
export function parseIbcDenomHash(denom: string): string | null {
    const match = IBC_DENOM.exec(denom);
    return match ? match[1] : null;
}

export function hasPrefix(fullPath: string, portId: string, channelId: string): boolean {
    return fullPath.startsWith(`${portId}/${channelId}/`);
}

/**
 * Whether the sending chain is the token's source with respect to the
 * channel it is sent over: true unless the token arrived over that channel.
 */
export function senderChainIsSource(sourcePort: string, sourceChannel: string, fullPath: string): boolean {
    return !hasPrefix(fullPath, sourcePort, sourceChannel);
}

/**
 * Whether the receiving chain is the token's source: true when the token is
 * returning over the channel it left through, visible as the sender's
 * `port/channel` as outermost hop.
 */
export function receiverChainIsSource(sourcePort: string, sourceChannel: string, fullPath: string): boolean {
    return hasPrefix(fullPath, sourcePort, sourceChannel);
}

/**
 * Account holding tokens escrowed on `portId/channelId`.
 */
export function escrowAddress(prefix: string, portId: string, channelId: string): string {
    const preimage = Buffer.concat([
        Buffer.from(ESCROW_ADDRESS_VERSION, 'utf8'),
        Buffer.from([0]),
        Buffer.from(`${portId}/${channelId}`, 'utf8')
    ]);
    const address = createHash('sha256').update(preimage).digest().subarray(0, 20);
    return bech32.encode(prefix, bech32.toWords(address));
}
