import { err, ok } from '../../../types/result';
import { isChannelEnd, isClientState, isConnectionEnd, isConsensusState } from '../../../clients/ChainProvider';
import { paths } from './paths';
import type { Result } from '../../../types/result';
import type { ChannelEnd, ClientState, ConnectionEnd, ConsensusState, Height, QueryHeight } from '../../../types/ibc';
import type {
    ChannelNotFoundError,
    ClientNotFoundError,
    ConnectionNotFoundError,
    NoAvailableProviderError,
    QueryError
} from '../../../types/errors';
import type { ChainProvider } from '../../../clients/ChainProvider';
import type { Chain } from '../chain/ChainRegistry';
import type { Proven, ValueDecoder, VerifiedQueryEngine } from './VerifiedQueryEngine';

/**
 * Store values are UTF-8 JSON. Commitments and acknowledgement commitments are
 * stored as hex strings, sequence counters as positive integers, and receipts
 * as `true`.
 */
export function encodeStoreValue(value: unknown): Uint8Array {
    return new Uint8Array(Buffer.from(JSON.stringify(value), 'utf8'));
}

function parseJson(bytes: Uint8Array): Result<unknown, string> {
    try {
        return ok(JSON.parse(Buffer.from(bytes).toString('utf8')));
    } catch (error) {
        return err(error instanceof Error ? error.message : 'invalid JSON');
    }
}

function record<T>(what: string, guard: (value: unknown) => value is T): ValueDecoder<T | null> {
    return bytes => {
        if (bytes === null) {
            return ok(null);
        }
        const parsed = parseJson(bytes);
        if (!parsed.ok) {
            return parsed;
        }
        return guard(parsed.value) ? ok(parsed.value) : err(`not a ${what}`);
    };
}

const hexString: ValueDecoder<string | null> = bytes => {
    if (bytes === null) {
        return ok(null);
    }
    const parsed = parseJson(bytes);
    if (!parsed.ok) {
        return parsed;
    }
    return typeof parsed.value === 'string' && /^[0-9a-f]{64}$/.test(parsed.value)
        ? ok(parsed.value)
        : err('not a sha256 commitment');
};

const sequence: ValueDecoder<number | null> = bytes => {
    if (bytes === null) {
        return ok(null);
    }
    const parsed = parseJson(bytes);
    if (!parsed.ok) {
        return parsed;
    }
    return typeof parsed.value === 'number' && Number.isSafeInteger(parsed.value) && parsed.value >= 1
        ? ok(parsed.value)
        : err('not a sequence number');
};

const receipt: ValueDecoder<boolean> = bytes => ok(bytes !== null);

export interface ChainClock {
    height: Height;
    /** Latest block time in nanoseconds since the epoch. */
    timestampNs: bigint;
}

/**
 * Typed lookups over the verified query engine, one per provable record.
 */
export class ChainStateQueries {
    constructor(private readonly engine: VerifiedQueryEngine) {}

    public async channel(
        chain: Chain,
        portId: string,
        channelId: string,
        height: QueryHeight
    ): Promise<Result<Proven<ChannelEnd>, QueryError | ChannelNotFoundError>> {
        const result = await this.engine.queryDecoded(
            chain,
            (provider, _path, at) => provider.queryChannel(portId, channelId, at),
            paths.channelEnd(portId, channelId),
            height,
            record('channel end', isChannelEnd)
        );
        if (!result.ok) {
            return result;
        }
        const { value, proof } = result.value;
        if (value === null) {
            return err({ kind: 'ChannelNotFound', chainId: chain.chainId, portId, channelId });
        }
        return ok({ value, proof, height: result.value.height });
    }

    public async connection(
        chain: Chain,
        connectionId: string,
        height: QueryHeight
    ): Promise<Result<Proven<ConnectionEnd>, QueryError | ConnectionNotFoundError>> {
        const result = await this.engine.queryDecoded(
            chain,
            (provider, _path, at) => provider.queryConnection(connectionId, at),
            paths.connection(connectionId),
            height,
            record('connection end', isConnectionEnd)
        );
        if (!result.ok) {
            return result;
        }
        const { value, proof } = result.value;
        if (value === null) {
            return err({ kind: 'ConnectionNotFound', chainId: chain.chainId, connectionId });
        }
        return ok({ value, proof, height: result.value.height });
    }

    public async clientState(
        chain: Chain,
        clientId: string,
        height: QueryHeight
    ): Promise<Result<Proven<ClientState>, QueryError | ClientNotFoundError>> {
        const result = await this.engine.queryDecoded(
            chain,
            (provider, _path, at) => provider.queryClientState(clientId, at),
            paths.clientState(clientId),
            height,
            record('client state', isClientState)
        );
        if (!result.ok) {
            return result;
        }
        const { value, proof } = result.value;
        if (value === null) {
            return err({ kind: 'ClientNotFound', chainId: chain.chainId, clientId });
        }
        return ok({ value, proof, height: result.value.height });
    }

    /** Consensus state the client recorded for `consensusHeight`, or null. */
    public consensusState(
        chain: Chain,
        clientId: string,
        consensusHeight: Height,
        height: QueryHeight
    ): Promise<Result<Proven<ConsensusState | null>, QueryError>> {
        return this.engine.queryDecoded(
            chain,
            (provider, _path, at) => provider.queryConsensusState(clientId, consensusHeight, at),
            paths.consensusState(clientId, consensusHeight),
            height,
            record('consensus state', isConsensusState)
        );
    }

    public packetCommitment(
        chain: Chain,
        portId: string,
        channelId: string,
        seq: number,
        height: QueryHeight
    ): Promise<Result<Proven<string | null>, QueryError>> {
        return this.engine.queryDecoded(
            chain,
            (provider, _path, at) => provider.queryPacketCommitment(portId, channelId, seq, at),
            paths.packetCommitment(portId, channelId, seq),
            height,
            hexString
        );
    }

    public packetReceipt(
        chain: Chain,
        portId: string,
        channelId: string,
        seq: number,
        height: QueryHeight
    ): Promise<Result<Proven<boolean>, QueryError>> {
        return this.engine.queryDecoded(
            chain,
            (provider, _path, at) => provider.queryPacketReceipt(portId, channelId, seq, at),
            paths.packetReceipt(portId, channelId, seq),
            height,
            receipt
        );
    }

    public packetAcknowledgement(
        chain: Chain,
        portId: string,
        channelId: string,
        seq: number,
        height: QueryHeight
    ): Promise<Result<Proven<string | null>, QueryError>> {
        return this.engine.queryDecoded(
            chain,
            (provider, _path, at) => provider.queryPacketAcknowledgement(portId, channelId, seq, at),
            paths.packetAcknowledgement(portId, channelId, seq),
            height,
            hexString
        );
    }

    public nextSequenceSend(
        chain: Chain,
        portId: string,
        channelId: string,
        height: QueryHeight
    ): Promise<Result<Proven<number>, QueryError | ChannelNotFoundError>> {
        return this.counter(chain, portId, channelId, height, paths.nextSequenceSend(portId, channelId),
            (provider, at) => provider.queryNextSequenceSend(portId, channelId, at));
    }

    public nextSequenceRecv(
        chain: Chain,
        portId: string,
        channelId: string,
        height: QueryHeight
    ): Promise<Result<Proven<number>, QueryError | ChannelNotFoundError>> {
        return this.counter(chain, portId, channelId, height, paths.nextSequenceRecv(portId, channelId),
            (provider, at) => provider.queryNextSequenceRecv(portId, channelId, at));
    }

    public nextSequenceAck(
        chain: Chain,
        portId: string,
        channelId: string,
        height: QueryHeight
    ): Promise<Result<Proven<number>, QueryError | ChannelNotFoundError>> {
        return this.counter(chain, portId, channelId, height, paths.nextSequenceAck(portId, channelId),
            (provider, at) => provider.queryNextSequenceAck(portId, channelId, at));
    }

    private async counter(
        chain: Chain,
        portId: string,
        channelId: string,
        height: QueryHeight,
        path: string,
        read: (provider: ChainProvider, at: number) => Promise<unknown>
    ): Promise<Result<Proven<number>, QueryError | ChannelNotFoundError>> {
        const result = await this.engine.queryDecoded(chain, (provider, _path, at) => read(provider, at), path, height, sequence);
        if (!result.ok) {
            return result;
        }
        const { value, proof } = result.value;
        // Counters are written when the channel end is created
        if (value === null) {
            return err({ kind: 'ChannelNotFound', chainId: chain.chainId, portId, channelId });
        }
        return ok({ value, proof, height: result.value.height });
    }

    public async currentHeight(chain: Chain): Promise<Result<Height, NoAvailableProviderError>> {
        const clock = await this.currentClock(chain);
        return clock.ok ? ok(clock.value.height) : clock;
    }

    public async currentTimestamp(chain: Chain): Promise<Result<bigint, NoAvailableProviderError>> {
        const clock = await this.currentClock(chain);
        return clock.ok ? ok(clock.value.timestampNs) : clock;
    }

    /** Unproven: the provider's view of the chain head. */
    public currentClock(chain: Chain): Promise<Result<ChainClock, NoAvailableProviderError>> {
        return this.engine.queryUnverified(chain, async provider => {
            const status = await provider.getStatus();
            return {
                height: { revisionNumber: chain.revisionNumber, revisionHeight: status.height },
                timestampNs: BigInt(status.timestamp.getTime()) * BigInt(1_000_000)
            };
        }, 'status');
    }
}
