import { err, ok } from '../../../types/result';
import { isRecord } from '../../../clients/ChainProvider';
import type { Result } from '../../../types/result';
import type { InvalidPacketDataError, UnknownAcknowledgementError } from '../../../types/errors';
import type { Height } from '../../../types/ibc';

export const TRANSFER_PORT = 'transfer';
export const TRANSFER_VERSION = 'ics20-1';
export const TRANSFER_MODULE = 'transfer';

/** Payload of a transfer packet. `amount` is a decimal string. */
export interface FungibleTokenPacketData {
    denom: string;
    amount: string;
    sender: string;
    receiver: string;
    memo?: string;
}

export interface MsgTransfer {
    sourcePort: string;
    sourceChannel: string;
    token: { denom: string; amount: bigint };
    sender: string;
    receiver: string;
    timeoutHeight: Height;
    /** Nanoseconds since the epoch; "0" for none. */
    timeoutTimestamp: string;
    memo?: string;
}

export const SUCCESS_RESULT = 'AQ==' as const;

export type Acknowledgement =
    | { result: typeof SUCCESS_RESULT }
    | { error: string };

export const SUCCESS_ACKNOWLEDGEMENT: Acknowledgement = { result: SUCCESS_RESULT };

export function isSuccessAcknowledgement(ack: Acknowledgement): ack is { result: typeof SUCCESS_RESULT } {
    return 'result' in ack;
}

const AMOUNT = /^[1-9][0-9]*$/;

/**
 * Keys are written in sorted order so every chain derives the same bytes and
 * therefore the same packet commitment.
 */
export function encodePacketData(data: FungibleTokenPacketData): string {
    const ordered: Record<string, string> = {
        amount: data.amount,
        denom: data.denom
    };
    if (data.memo) {
        ordered.memo = data.memo;
    }
    ordered.receiver = data.receiver;
    ordered.sender = data.sender;
    return Buffer.from(JSON.stringify(ordered), 'utf8').toString('base64');
}

function invalidData(reason: string): Result<never, InvalidPacketDataError> {
    return err({ kind: 'InvalidPacketData', reason });
}

export function decodePacketData(base64: string): Result<FungibleTokenPacketData, InvalidPacketDataError> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(Buffer.from(base64, 'base64').toString('utf8'));
    } catch (error) {
        return invalidData(`payload is not JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isRecord(parsed)) {
        return invalidData('payload is not an object');
    }

    const { denom, amount, sender, receiver, memo } = parsed;
    if (typeof denom !== 'string' || denom.length === 0) {
        return invalidData('denom is missing');
    }
    if (typeof amount !== 'string' || !AMOUNT.test(amount)) {
        return invalidData('amount must be a positive integer');
    }
    if (typeof sender !== 'string' || sender.trim().length === 0) {
        return invalidData('sender is missing');
    }
    if (typeof receiver !== 'string' || receiver.trim().length === 0) {
        return invalidData('receiver is missing');
    }
    if (memo !== undefined && typeof memo !== 'string') {
        return invalidData('memo must be a string');
    }

    return ok(memo ? { denom, amount, sender, receiver, memo } : { denom, amount, sender, receiver });
}

/** Wire bytes of an acknowledgement, base64 encoded. */
export function encodeAcknowledgement(ack: Acknowledgement): string {
    return Buffer.from(JSON.stringify(ack), 'utf8').toString('base64');
}

/**
 * Accepts exactly `{"result":"AQ=="}` or `{"error":"<message>"}`.
 */
export function decodeAcknowledgement(base64: string): Result<Acknowledgement, UnknownAcknowledgementError> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(Buffer.from(base64, 'base64').toString('utf8'));
    } catch (error) {
        return err({ kind: 'UnknownAcknowledgement', reason: `acknowledgement is not JSON: ${error instanceof Error ? error.message : String(error)}` });
    }
    if (!isRecord(parsed)) {
        return err({ kind: 'UnknownAcknowledgement', reason: 'acknowledgement is not an object' });
    }

    const entries = Object.entries(parsed);
    if (entries.length === 1) {
        const [key, value] = entries[0];
        if (key === 'result' && value === SUCCESS_RESULT) {
            return ok({ result: SUCCESS_RESULT });
        }
        if (key === 'error' && typeof value === 'string') {
            return ok({ error: value });
        }
    }
    return err({ kind: 'UnknownAcknowledgement', reason: `unexpected acknowledgement ${JSON.stringify(parsed)}` });
}
