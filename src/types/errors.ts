/**
 * Error taxonomy shared by the relayer and the transfer module.
 *
 * Every variant carries a `kind` discriminant and is returned by value inside a
 * `Result`. Provider faults never appear here: the query engine resolves them
 * by failing over, so callers only ever see terminal query errors.
 */

// Terminal query errors
export interface NoAvailableProviderError {
    readonly kind: 'NoAvailableProvider';
    readonly chainId: string;
    readonly lastFault?: string;
}

export interface LightClientUnavailableError {
    readonly kind: 'LightClientUnavailable';
    readonly chainId: string;
    readonly height: number;
    readonly reason: string;
}

export interface ClientFrozenError {
    readonly kind: 'ClientFrozen';
    readonly chainId: string;
    readonly clientId: string;
    readonly frozenHeight: number;
}

export interface ChainNotFoundError {
    readonly kind: 'ChainNotFound';
    readonly chainId: string;
}

export interface ChannelNotFoundError {
    readonly kind: 'ChannelNotFound';
    readonly chainId: string;
    readonly portId: string;
    readonly channelId: string;
}

export interface ConnectionNotFoundError {
    readonly kind: 'ConnectionNotFound';
    readonly chainId: string;
    readonly connectionId: string;
}

export interface ClientNotFoundError {
    readonly kind: 'ClientNotFound';
    readonly chainId: string;
    readonly clientId: string;
}

export interface PacketMismatchError {
    readonly kind: 'PacketMismatch';
    readonly chainId: string;
    readonly sequence: number;
    readonly reason: string;
}

export interface ClientUpdateStalledError {
    readonly kind: 'ClientUpdateStalled';
    readonly chainId: string;
    readonly clientId: string;
    readonly targetHeight: number;
}

// Module-policy and settlement errors of the transfer module
export interface SendDisabledError {
    readonly kind: 'SendDisabled';
}

export interface ReceiveDisabledError {
    readonly kind: 'ReceiveDisabled';
}

export interface InvalidDenomTraceError {
    readonly kind: 'InvalidDenomTrace';
    readonly denom: string;
    readonly reason: string;
}

export interface InvalidPacketDataError {
    readonly kind: 'InvalidPacketData';
    readonly reason: string;
}

export interface InsufficientFundsError {
    readonly kind: 'InsufficientFunds';
    readonly address: string;
    readonly denom: string;
    readonly available: bigint;
    readonly required: bigint;
}

export interface PacketNotFoundError {
    readonly kind: 'PacketNotFound';
    readonly portId: string;
    readonly channelId: string;
    readonly sequence: number;
}

export interface UnknownAcknowledgementError {
    readonly kind: 'UnknownAcknowledgement';
    readonly reason: string;
}

export interface CapabilityError {
    readonly kind: 'Capability';
    readonly reason: string;
}

export interface InvalidChannelParametersError {
    readonly kind: 'InvalidChannelParameters';
    readonly reason: string;
}

export type QueryError =
    | NoAvailableProviderError
    | LightClientUnavailableError;

export type RelayerError =
    | QueryError
    | ClientFrozenError
    | ChainNotFoundError
    | ChannelNotFoundError
    | ConnectionNotFoundError
    | ClientNotFoundError
    | PacketMismatchError
    | ClientUpdateStalledError;

export type TransferError =
    | SendDisabledError
    | ReceiveDisabledError
    | InvalidDenomTraceError
    | InvalidPacketDataError
    | InsufficientFundsError
    | PacketNotFoundError
    | UnknownAcknowledgementError
    | ChannelNotFoundError
    | CapabilityError
    | InvalidChannelParametersError;

export type ErrorKind = RelayerError['kind'] | TransferError['kind'];

export function describeError(error: RelayerError | TransferError): string {
    switch (error.kind) {
        case 'NoAvailableProvider':
            return `no available provider for chain ${error.chainId}${error.lastFault ? ` (last fault: ${error.lastFault})` : ''}`;
        case 'LightClientUnavailable':
            return `light client for chain ${error.chainId} cannot produce a trusted root at height ${error.height}: ${error.reason}`;
        case 'ClientFrozen':
            return `client ${error.clientId} on chain ${error.chainId} is frozen at height ${error.frozenHeight}`;
        case 'ChainNotFound':
            return `chain ${error.chainId} is not registered`;
        case 'ChannelNotFound':
            return `channel ${error.portId}/${error.channelId} not found on chain ${error.chainId}`;
        case 'ConnectionNotFound':
            return `connection ${error.connectionId} not found on chain ${error.chainId}`;
        case 'ClientNotFound':
            return `client ${error.clientId} not found on chain ${error.chainId}`;
        case 'PacketMismatch':
            return `packet ${error.sequence} on chain ${error.chainId} does not match its commitment: ${error.reason}`;
        case 'ClientUpdateStalled':
            return `client ${error.clientId} on chain ${error.chainId} did not reach height ${error.targetHeight}`;
        case 'SendDisabled':
            return 'fungible token transfers from this chain are disabled';
        case 'ReceiveDisabled':
            return 'fungible token transfers to this chain are disabled';
        case 'InvalidDenomTrace':
            return `invalid denomination trace "${error.denom}": ${error.reason}`;
        case 'InvalidPacketData':
            return `invalid packet data: ${error.reason}`;
        case 'InsufficientFunds':
            return `insufficient funds: ${error.address} holds ${error.available}${error.denom}, needs ${error.required}${error.denom}`;
        case 'PacketNotFound':
            return `no sent packet ${error.portId}/${error.channelId}/${error.sequence}`;
        case 'UnknownAcknowledgement':
            return `unrecognised acknowledgement: ${error.reason}`;
        case 'Capability':
            return `capability error: ${error.reason}`;
        case 'InvalidChannelParameters':
            return `invalid transfer channel: ${error.reason}`;
    }
}

/**
 * Thrown only at boundaries that cannot carry a Result (startup, express handlers).
 */
export class RelayerException extends Error {
    public readonly error: RelayerError | TransferError;

    constructor(error: RelayerError | TransferError) {
        super(describeError(error));
        this.name = error.kind;
        this.error = error;
    }
}
